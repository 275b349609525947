import type { ErrorCode } from '../errors';

export type ProposalStatus =
  | 'pending'
  | 'approved'
  | 'rejected'
  | 'executing'
  | 'completed'
  | 'failed';

export type ExperimentStatus = 'running' | 'completed' | 'failed';

export interface ExpectedImpact {
  metric: string;
  /** Expected relative change, e.g. 0.05 for +5% */
  deltaPct: number;
}

export interface PlanStep {
  file: string;
  action: string;
}

/**
 * Fields recovered from model output, before lifecycle bookkeeping is attached.
 */
export interface ProposalFields {
  /** Identifier the model emitted, if any; never used as the record key */
  proposalId?: string;
  ideaSummary: string;
  rationale: string;
  category: string;
  expectedImpact: ExpectedImpact;
  /** Ordered plan; the first entry's file is the execution target */
  technicalPlan: PlanStep[];
  /** Fast-Apply block: partial source with +/- and elision markers */
  updateBlock: string;
  /** In [0, 1] */
  confidence: number;
}

/**
 * A candidate code change awaiting approval.
 */
export interface Proposal extends Omit<ProposalFields, 'proposalId'> {
  id: string;
  externalId?: string;
  status: ProposalStatus;
  repoId: string;
  oauthSessionId?: string;
  experimentId?: string;
  rejectionReason?: string;
  createdAt: string;
  updatedAt: string;
}

export interface ExperimentFailure {
  code: ErrorCode;
  message: string;
  retryable: boolean;
}

/**
 * One execution attempt of an approved proposal.
 * `prUrl` is non-null exactly when `status` is `completed`.
 */
export interface Experiment {
  id: string;
  proposalId?: string;
  instruction: string;
  updateBlock: string;
  repoFullname: string;
  filePath: string;
  baseBranch: string;
  rolloutPct: number;
  status: ExperimentStatus;
  prUrl: string | null;
  branch: string | null;
  failure?: ExperimentFailure;
  filesModified: string[];
  diffSummary?: string;
  attempts: number;
  createdAt: string;
  updatedAt: string;
}

export interface Repository {
  /** owner/name, unique */
  repoFullname: string;
  defaultBranch: string;
  baseBranch: string;
  /** At most one active repository per user */
  isActive: boolean;
  userId: string;
  createdAt: string;
  updatedAt: string;
}
