import type { ErrorCode } from '../errors';
import type { ExperimentStatus, ProposalStatus } from './lifecycle';

/**
 * Base interface for all pipeline events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the experiment (or proposal) the event belongs to */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when an execution attempt starts and its Experiment is running.
 */
export interface ExperimentStarted extends BaseEvent {
  type: 'ExperimentStarted';
  payload: {
    repoFullname: string;
    filePath: string;
    baseBranch: string;
    instruction: string;
    /** 1 for the first attempt, incremented on each retry of the same experiment */
    attempt: number;
  };
}

/** Emitted when the merge service returned merged file contents */
export interface MergeCompleted extends BaseEvent {
  type: 'MergeCompleted';
  payload: {
    filePath: string;
    originalChars: number;
    mergedChars: number;
    changed: boolean;
  };
}

/** Emitted once a unique branch has been created and checked out */
export interface BranchAllocated extends BaseEvent {
  type: 'BranchAllocated';
  payload: {
    branch: string;
    baseBranch: string;
    /** Number of names probed before a free one was found */
    probes: number;
  };
}

/** Emitted when a push was rejected and the branch re-probed */
export interface PushRetried extends BaseEvent {
  type: 'PushRetried';
  payload: {
    rejectedBranch: string;
    branch: string;
  };
}

/** Emitted after the commit reached the remote */
export interface ChangesPushed extends BaseEvent {
  type: 'ChangesPushed';
  payload: {
    branch: string;
    commitSha: string;
  };
}

/** Emitted when a pull request was found or created */
export interface PullRequestOpened extends BaseEvent {
  type: 'PullRequestOpened';
  payload: {
    url: string;
    head: string;
    base: string;
    /** False when an already-open pull request was reused */
    created: boolean;
  };
}

/** Emitted when the pipeline produced a pull request */
export interface ExperimentCompleted extends BaseEvent {
  type: 'ExperimentCompleted';
  payload: {
    prUrl: string;
    branch: string;
    durationMs: number;
  };
}

/** Emitted when any step failed; the Experiment is marked failed */
export interface ExperimentFailed extends BaseEvent {
  type: 'ExperimentFailed';
  payload: {
    code: ErrorCode;
    message: string;
    retryable: boolean;
    /** Branch left on the remote, if the failure happened after the push */
    branch: string | null;
    durationMs: number;
  };
}

/** Emitted when a proposal was recovered from model output */
export interface ProposalExtracted extends BaseEvent {
  type: 'ProposalExtracted';
  payload: {
    proposalId: string;
    repoId: string;
    targetFile: string | null;
    confidence: number;
  };
}

/** Emitted on every proposal status transition */
export interface ProposalStatusChanged extends BaseEvent {
  type: 'ProposalStatusChanged';
  payload: {
    from: ProposalStatus;
    to: ProposalStatus;
  };
}

/** Emitted on every experiment status transition */
export interface ExperimentStatusChanged extends BaseEvent {
  type: 'ExperimentStatusChanged';
  payload: {
    from: ExperimentStatus | null;
    to: ExperimentStatus;
  };
}

/**
 * Union of all pipeline event types.
 * Use the `type` field to discriminate between event types.
 */
export type PipelineEvent =
  | ExperimentStarted
  | MergeCompleted
  | BranchAllocated
  | PushRetried
  | ChangesPushed
  | PullRequestOpened
  | ExperimentCompleted
  | ExperimentFailed
  | ProposalExtracted
  | ProposalStatusChanged
  | ExperimentStatusChanged;

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common event metadata, spread into event literals:
 * `logger.log({ ...eventMeta(id), type: 'MergeCompleted', payload })`.
 */
export function eventMeta(
  runId: string,
  now: Date = new Date(),
): Pick<BaseEvent, 'schemaVersion' | 'timestamp' | 'runId'> {
  return { schemaVersion: EVENT_SCHEMA_VERSION, timestamp: now.toISOString(), runId };
}
