/**
 * Response Parser
 * Extracts the single JSON object a model reply is supposed to contain,
 * tolerating code fences, reasoning blocks and prose around it.
 */

export type ResponseParseErrorKind = 'NotFound' | 'NotAnObject';

export class ResponseParseError extends Error {
  constructor(
    message: string,
    public kind: ResponseParseErrorKind
  ) {
    super(message);
    this.name = 'ResponseParseError';
  }
}

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;
const LEADING_FENCE = /^\s*```[a-z0-9_-]*[ \t]*\r?\n?/i;
const TRAILING_FENCE = /\r?\n?[ \t]*```\s*$/;

type ParseAttempt = { ok: true; value: unknown } | { ok: false };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stripCodeFence(text: string): string {
  return text.replace(LEADING_FENCE, '').replace(TRAILING_FENCE, '').trim();
}

/**
 * Index of the brace closing the one at `start`, or -1. Braces inside JSON
 * string literals do not count.
 */
export function findMatchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Balanced brace pairs found in one pass from the first `{`, ordered by the
 * opening position. String state is tracked from that first brace on.
 */
function collectBracePairs(text: string, from: number): Array<[number, number]> {
  const pairs: Array<[number, number]> = [];
  const openStack: number[] = [];
  let inString = false;
  let escaped = false;

  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      openStack.push(i);
    } else if (ch === '}') {
      const start = openStack.pop();
      if (start !== undefined) pairs.push([start, i]);
    }
  }
  return pairs.sort((a, b) => a[0] - b[0]);
}

function scanForObject(text: string): ParseAttempt {
  const first = text.indexOf('{');
  if (first === -1) return { ok: false };

  for (const [start, end] of collectBracePairs(text, first)) {
    const attempt = tryParse(text.slice(start, end + 1));
    if (attempt.ok) return attempt;
  }
  return { ok: false };
}

export function parseModelResponse(rawText: string): Record<string, unknown> {
  const text = stripCodeFence(rawText.replace(THINK_BLOCK, ''));

  let attempt = tryParse(text);
  if (!attempt.ok) {
    attempt = scanForObject(text);
  }
  if (!attempt.ok) {
    throw new ResponseParseError('No JSON object found in model response', 'NotFound');
  }
  if (!isPlainObject(attempt.value)) {
    const actual = Array.isArray(attempt.value) ? 'array' : attempt.value === null ? 'null' : typeof attempt.value;
    throw new ResponseParseError(`Model response is a JSON ${actual}, not an object`, 'NotAnObject');
  }
  return attempt.value;
}
