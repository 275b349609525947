import { z } from 'zod';
import {
  ERROR_CODES,
  type Experiment,
  type Proposal,
  type Repository,
} from '@northstar/shared';

export const LIFECYCLE_SCHEMA_VERSION = 1;

const ProposalSchema: z.ZodType<Proposal> = z.object({
  id: z.string(),
  externalId: z.string().optional(),
  ideaSummary: z.string(),
  rationale: z.string(),
  category: z.string(),
  expectedImpact: z.object({ metric: z.string(), deltaPct: z.number() }),
  technicalPlan: z.array(z.object({ file: z.string(), action: z.string() })),
  updateBlock: z.string(),
  confidence: z.number().min(0).max(1),
  status: z.enum(['pending', 'approved', 'rejected', 'executing', 'completed', 'failed']),
  repoId: z.string(),
  oauthSessionId: z.string().optional(),
  experimentId: z.string().optional(),
  rejectionReason: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const ExperimentSchema: z.ZodType<Experiment> = z.object({
  id: z.string(),
  proposalId: z.string().optional(),
  instruction: z.string(),
  updateBlock: z.string(),
  repoFullname: z.string(),
  filePath: z.string(),
  baseBranch: z.string(),
  rolloutPct: z.number(),
  status: z.enum(['running', 'completed', 'failed']),
  prUrl: z.string().nullable(),
  branch: z.string().nullable(),
  failure: z
    .object({ code: z.enum(ERROR_CODES), message: z.string(), retryable: z.boolean() })
    .optional(),
  filesModified: z.array(z.string()),
  diffSummary: z.string().optional(),
  attempts: z.number().int(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const RepositorySchema: z.ZodType<Repository> = z.object({
  repoFullname: z.string(),
  defaultBranch: z.string(),
  baseBranch: z.string(),
  isActive: z.boolean(),
  userId: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

/**
 * Persisted form of every lifecycle record, keyed by id (repositories by
 * owner/name).
 */
export const LifecycleDocumentSchema = z.object({
  schemaVersion: z.literal(LIFECYCLE_SCHEMA_VERSION),
  proposals: z.record(ProposalSchema),
  experiments: z.record(ExperimentSchema),
  repositories: z.record(RepositorySchema),
});

export type LifecycleDocument = z.infer<typeof LifecycleDocumentSchema>;

export function emptyDocument(): LifecycleDocument {
  return { schemaVersion: LIFECYCLE_SCHEMA_VERSION, proposals: {}, experiments: {}, repositories: {} };
}
