import {
  NoJsonFoundError,
  RefusedByModelError,
  UnrepairableJsonError,
  findBalancedObject,
  isPlainObject,
  snippet,
  type ExtractionError,
  type ProposalFields,
} from '@northstar/shared';
import { containsProposalKey, parseWithRepair } from './json_repair';
import { normalizeProposal } from './proposal_schema';

export interface ExtractOptions {
  /** Non-JSON replies shorter than this are treated as refusals. Default: 20 */
  minLength?: number;
  /** Length of the raw-output snippet attached to errors. Default: 200 */
  snippetLength?: number;
}

export type ExtractResult =
  | { ok: true; proposal: ProposalFields }
  | { ok: false; error: ExtractionError };

const REFUSAL_PATTERNS: RegExp[] = [
  /\bI can't assist\b/i,
  /\bI cannot assist\b/i,
  /\bI'm sorry\b/i,
  /\bI am sorry\b/i,
  /\bunable to\b/i,
  /\bI can't help\b/i,
  /\bI cannot help\b/i,
  /\bI won't be able\b/i,
  /\bas an AI\b/i,
];

const OPENING_FENCE = /^```[\w-]*[ \t]*(?:\r?\n|$)/;

function withoutOpeningFence(text: string): string {
  return text.replace(OPENING_FENCE, '');
}

/**
 * Removes one leading and one trailing Markdown code fence, if present.
 */
export function stripCodeFence(text: string): string {
  let body = withoutOpeningFence(text.trim());
  if (body.endsWith('```')) body = body.slice(0, -3);
  return body.trim();
}

/**
 * Refusal text: does not open with `{` (after one optional fence) and either
 * reads like an apology or is too short to hold a proposal.
 */
export function isRefusal(text: string, minLength = 20): boolean {
  const body = withoutOpeningFence(text.trim()).trimStart();
  if (body.startsWith('{')) return false;
  const normalized = body.replace(/[\u2018\u2019]/g, "'");
  return body.length < minLength || REFUSAL_PATTERNS.some((pattern) => pattern.test(normalized));
}

/**
 * JSON candidates in priority order: the brace-balanced object (or a regex
 * match holding a proposal key when none balances), then the span from the
 * first `{` to the last `}`.
 */
export function findCandidates(body: string): string[] {
  const candidates: string[] = [];

  const balanced = findBalancedObject(body);
  if (balanced) {
    candidates.push(balanced.text);
  } else {
    for (const pattern of [/\{[\s\S]*?\}/, /\{[\s\S]*\}/]) {
      const match = pattern.exec(body);
      if (match && containsProposalKey(match[0])) {
        candidates.push(match[0]);
        break;
      }
    }
  }

  // Unescaped quotes in update_block can fool the scanner into closing early.
  const first = body.indexOf('{');
  const last = body.lastIndexOf('}');
  if (first !== -1 && last > first) {
    const widest = body.slice(first, last + 1);
    if (!candidates.includes(widest) && containsProposalKey(widest)) {
      candidates.push(widest);
    }
  }

  return candidates;
}

/**
 * Recovers a proposal from raw model output. Never throws: failures come back
 * as RefusedByModel, NoJsonFound or UnrepairableJson. Nothing is retried.
 */
export function extractProposal(raw: string, options: ExtractOptions = {}): ExtractResult {
  const minLength = options.minLength ?? 20;
  const excerpt = snippet(raw, options.snippetLength ?? 200);

  if (isRefusal(raw, minLength)) {
    return { ok: false, error: new RefusedByModelError({ snippet: excerpt }) };
  }

  const body = stripCodeFence(raw);
  const candidates = findCandidates(body);
  if (candidates.length === 0) {
    return { ok: false, error: new NoJsonFoundError({ snippet: excerpt }) };
  }

  let lastError = '';
  for (const candidate of candidates) {
    const parsed = parseWithRepair(candidate);
    if (!parsed.ok) {
      lastError = parsed.error;
      continue;
    }
    if (!isPlainObject(parsed.value)) {
      lastError = 'Parsed JSON is not an object';
      continue;
    }
    if (!('idea_summary' in parsed.value) && !('proposal_id' in parsed.value)) {
      return {
        ok: false,
        error: new NoJsonFoundError({
          snippet: excerpt,
          details: { reason: 'object has neither idea_summary nor proposal_id' },
        }),
      };
    }
    return { ok: true, proposal: normalizeProposal(parsed.value) };
  }

  return { ok: false, error: new UnrepairableJsonError(lastError, { snippet: excerpt }) };
}
