type ScanState = 'outside' | 'string' | 'escaped';

/**
 * Span of a balanced `{...}` region, end exclusive.
 */
export interface JsonSpan {
  start: number;
  end: number;
  text: string;
}

/**
 * Finds the first brace-balanced object in `text`, honouring string literals:
 * a quote toggles the in-string state and a backslash inside a string escapes
 * the next character, so braces and escaped quotes inside strings are ignored.
 *
 * Returns null when there is no `{` or the depth never returns to zero.
 */
export function findBalancedObject(text: string, fromIndex = 0): JsonSpan | null {
  const start = text.indexOf('{', fromIndex);
  if (start === -1) return null;

  let state: ScanState = 'outside';
  let depth = 0;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    switch (state) {
      case 'escaped':
        state = 'string';
        break;

      case 'string':
        if (ch === '\\') state = 'escaped';
        else if (ch === '"') state = 'outside';
        break;

      case 'outside':
        if (ch === '"') {
          state = 'string';
        } else if (ch === '{') {
          depth++;
        } else if (ch === '}') {
          depth--;
          if (depth === 0) {
            return { start, end: i + 1, text: text.slice(start, i + 1) };
          }
        }
        break;
    }
  }

  return null;
}

/**
 * Parses JSON, returning the failure message instead of throwing.
 */
export function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
