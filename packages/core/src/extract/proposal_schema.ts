import { z } from 'zod';
import type { ProposalFields } from '@northstar/shared';
import { stripDiffHeaders } from './update_block';

const DEFAULT_CONFIDENCE = 0.5;

/** Missing or scalar values become strings; anything else falls back to "". */
const text = z
  .preprocess(
    (v) => (v === undefined || v === null ? '' : typeof v === 'number' || typeof v === 'boolean' ? String(v) : v),
    z.string(),
  )
  .catch('');

/** Numbers, or numeric strings such as "0.8" or "5%". */
const numeric = (fallback: number) =>
  z
    .preprocess((v) => {
      if (v === undefined || v === null || v === '') return fallback;
      if (typeof v === 'string') return Number(v.trim().replace(/%$/, ''));
      return v;
    }, z.number().finite())
    .catch(fallback);

const PlanStepSchema = z
  .union([
    z.object({ file: text, action: text }),
    // A bare string step names the file only
    z.string().transform((file) => ({ file, action: '' })),
  ]);

export const ProposalPayloadSchema = z.object({
  proposal_id: z
    .union([z.string(), z.number()])
    .transform(String)
    .optional()
    .catch(undefined),
  idea_summary: text,
  rationale: text,
  category: text,
  expected_impact: z
    .object({ metric: text, delta_pct: numeric(0) })
    .catch({ metric: '', delta_pct: 0 }),
  technical_plan: z.array(PlanStepSchema).catch([]),
  update_block: z
    .union([z.string(), z.array(text).transform((lines) => lines.join('\n'))])
    .optional()
    .catch(undefined),
  confidence: numeric(DEFAULT_CONFIDENCE).transform((c) => Math.min(1, Math.max(0, c))),
});

export type ProposalPayload = z.input<typeof ProposalPayloadSchema>;

/**
 * Normalizes a parsed model object into proposal fields. Never fails: every
 * field has a fallback.
 */
export function normalizeProposal(value: Record<string, unknown>): ProposalFields {
  const payload = ProposalPayloadSchema.parse(value);
  const fields: ProposalFields = {
    ideaSummary: payload.idea_summary,
    rationale: payload.rationale,
    category: payload.category,
    expectedImpact: {
      metric: payload.expected_impact.metric,
      deltaPct: payload.expected_impact.delta_pct,
    },
    technicalPlan: payload.technical_plan,
    updateBlock: stripDiffHeaders(payload.update_block ?? ''),
    confidence: payload.confidence,
  };
  if (payload.proposal_id !== undefined) {
    fields.proposalId = payload.proposal_id;
  }
  return fields;
}

/**
 * Canonical JSON for a proposal, with the snake_case keys the extractor reads.
 */
export function serializeProposal(fields: ProposalFields): string {
  const payload = {
    ...(fields.proposalId !== undefined ? { proposal_id: fields.proposalId } : {}),
    idea_summary: fields.ideaSummary,
    rationale: fields.rationale,
    category: fields.category,
    expected_impact: { metric: fields.expectedImpact.metric, delta_pct: fields.expectedImpact.deltaPct },
    technical_plan: fields.technicalPlan.map(({ file, action }) => ({ file, action })),
    update_block: fields.updateBlock,
    confidence: fields.confidence,
  } satisfies ProposalPayload;
  return JSON.stringify(payload, null, 2);
}
