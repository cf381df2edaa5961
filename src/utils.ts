import { jsonrepair } from 'jsonrepair';

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export const toErrorMessage = (value: unknown): string => {
  if (value instanceof Error && typeof value.message === 'string') return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};

const tryParseJson = (value: string): unknown => {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
};

const stripSurroundingCodeFence = (value: string): string | undefined => {
  const match = /^```(?:json)?\s*([\s\S]*?)\s*```$/iu.exec(value);
  return match !== null ? match[1] : undefined;
};

// Returns the first balanced {...} or [...] segment, skipping over string literals.
const extractFirstJsonSegment = (value: string): string | undefined => {
  let start = -1;
  let depth = 0;
  let open = '';
  let inString = false;
  let escapeNext = false;
  // eslint-disable-next-line functional/no-loop-statements
  for (let i = 0; i < value.length; i += 1) {
    const ch = value[i] ?? '';
    if (inString) {
      if (escapeNext) {
        escapeNext = false;
      } else if (ch === '\\') {
        escapeNext = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      if (depth > 0) inString = true;
      continue;
    }
    if (depth === 0) {
      if (ch === '{' || ch === '[') {
        start = i;
        open = ch;
        depth = 1;
      }
      continue;
    }
    if (ch === open) depth += 1;
    if ((open === '{' && ch === '}') || (open === '[' && ch === ']')) {
      depth -= 1;
      if (depth === 0 && start !== -1) return value.slice(start, i + 1);
    }
  }
  return start !== -1 ? value.slice(start) : undefined;
};

export interface JsonParseOutcome {
  value?: unknown;
  repairs: string[];
  error?: string;
}

/**
 * Parse model-authored JSON. Tries the raw text first, then a fenced block,
 * then the first embedded object/array, running jsonrepair on each candidate.
 */
export const parseJsonValueDetailed = (raw: string): JsonParseOutcome => {
  const original = raw.trim();
  if (original.length === 0) return { repairs: [], error: 'empty' };

  const candidates: { text: string; steps: string[] }[] = [{ text: original, steps: [] }];
  const fenced = stripSurroundingCodeFence(original);
  if (fenced !== undefined) candidates.push({ text: fenced, steps: ['stripCodeFence'] });
  const embedded = extractFirstJsonSegment(fenced ?? original);
  if (embedded !== undefined) candidates.push({ text: embedded, steps: ['extractFirstSegment'] });

  const seen = new Set<string>();
  // eslint-disable-next-line functional/no-loop-statements
  for (const candidate of candidates) {
    if (seen.has(candidate.text)) continue;
    seen.add(candidate.text);
    const parsed = tryParseJson(candidate.text);
    if (parsed !== undefined) return { value: parsed, repairs: candidate.steps };
    try {
      const repaired = tryParseJson(jsonrepair(candidate.text));
      if (repaired !== undefined) return { value: repaired, repairs: [...candidate.steps, 'jsonrepair'] };
    } catch {
      /* jsonrepair gave up on this candidate; try the next one */
    }
  }
  return { repairs: [], error: 'parse_failed' };
};

export const parseJsonRecord = (raw: string): Record<string, unknown> | undefined => {
  const { value } = parseJsonValueDetailed(raw);
  return isPlainObject(value) ? value : undefined;
};

export const delay = (ms: number): Promise<void> => new Promise((resolve) => {
  if (ms <= 0) {
    resolve();
    return;
  }
  setTimeout(resolve, ms);
});

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timeout: NodeJS.Timeout | undefined;
  const timerPromise = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      reject(new Error(`${label} timed out after ${String(timeoutMs)}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timerPromise]);
  } finally {
    if (timeout !== undefined) clearTimeout(timeout);
  }
}

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Consistent warning logger routed through injectable sink to keep core silent
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    /* ignore sink failures to keep core resilient */
  }
}
