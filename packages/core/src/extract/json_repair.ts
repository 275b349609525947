import { tryParseJson } from '@northstar/shared';

/** Keys a proposal object may carry, in snake_case as the model emits them. */
export const PROPOSAL_KEYS = [
  'proposal_id',
  'idea_summary',
  'rationale',
  'expected_impact',
  'technical_plan',
  'category',
  'confidence',
  'update_block',
] as const;

const KEY_PATTERN = PROPOSAL_KEYS.join('|');

export function containsProposalKey(text: string): boolean {
  return PROPOSAL_KEYS.some((key) => text.includes(`"${key}"`));
}

/**
 * Escapes raw text so it can sit between JSON string quotes.
 */
export function escapeJsonString(raw: string): string {
  return raw
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
}

/**
 * Treats the `update_block` string value as raw source text and re-escapes it
 * in place. The value ends at the first quote followed by another proposal
 * key, or else at the last quote before the closing brace.
 *
 * Returns null when there is no string-valued `update_block`.
 */
export function reescapeUpdateBlock(candidate: string): string | null {
  const key = /"update_block"\s*:\s*"/.exec(candidate);
  if (!key) return null;

  const valueStart = key.index + key[0].length;
  const rest = candidate.slice(valueStart);
  const nextKey = new RegExp(`"(?=\\s*,\\s*"(?:${KEY_PATTERN})"\\s*:)`).exec(rest);

  let valueEnd: number;
  if (nextKey) {
    valueEnd = valueStart + nextKey.index;
  } else {
    const closing = candidate.lastIndexOf('}');
    valueEnd = candidate.lastIndexOf('"', closing);
    if (valueEnd < valueStart) return null;
  }

  const raw = candidate.slice(valueStart, valueEnd);
  return candidate.slice(0, valueStart) + escapeJsonString(raw) + candidate.slice(valueEnd);
}

type ScanState = 'outside' | 'string' | 'escaped';

const CONTROL_ESCAPES: Record<string, string> = { '\n': '\\n', '\r': '\\r', '\t': '\\t' };

/**
 * Drops raw control characters that JSON does not allow. Inside strings,
 * raw newlines, carriage returns and tabs become their escape sequences;
 * outside strings they are kept as whitespace.
 */
export function sanitizeControlCharacters(text: string): string {
  let state: ScanState = 'outside';
  let out = '';

  for (const ch of text) {
    const isControl = ch < ' ';

    if (state === 'escaped') {
      state = 'string';
      if (!isControl) out += ch;
      else out = out.slice(0, -1); // lone backslash before a control char
      continue;
    }

    if (isControl) {
      if (state === 'string') out += CONTROL_ESCAPES[ch] ?? '';
      else if (ch in CONTROL_ESCAPES) out += ch;
      continue;
    }

    if (state === 'string') {
      if (ch === '\\') state = 'escaped';
      else if (ch === '"') state = 'outside';
    } else if (ch === '"') {
      state = 'string';
    }
    out += ch;
  }

  return out;
}

export type RepairResult =
  | { ok: true; value: unknown; repaired: 'none' | 'update_block' | 'control_characters' }
  | { ok: false; error: string };

/**
 * Parses a candidate, then retries after re-escaping `update_block`, then
 * once more after sanitizing control characters in the original text.
 */
export function parseWithRepair(candidate: string): RepairResult {
  const direct = tryParseJson(candidate);
  if (direct.ok) return { ok: true, value: direct.value, repaired: 'none' };

  let lastError = direct.error;

  const reescaped = reescapeUpdateBlock(candidate);
  if (reescaped !== null && reescaped !== candidate) {
    const attempt = tryParseJson(reescaped);
    if (attempt.ok) return { ok: true, value: attempt.value, repaired: 'update_block' };
    lastError = attempt.error;
  }

  // Sanitize the untouched candidate: a failed re-escape may have doubled valid escapes.
  const sanitized = sanitizeControlCharacters(candidate);
  if (sanitized !== candidate) {
    const attempt = tryParseJson(sanitized);
    if (attempt.ok) return { ok: true, value: attempt.value, repaired: 'control_characters' };
    lastError = attempt.error;
  }

  return { ok: false, error: lastError };
}
