import {
  ConfigError,
  RecordNotFoundError,
  eventMeta,
  noopLogger,
  toAppError,
  type Config,
  type ExperimentStatus,
  type Logger,
  type Proposal,
  type ProposalStatus,
  type Repository,
} from '@northstar/shared';
import { extractProposal } from '../extract';
import type {
  ExecuteOptions,
  ExecutionOrchestrator,
  ExecutionRequest,
  ExecutionResult,
} from '../execution/orchestrator';
import { newRecordId } from './ids';
import type { LifecycleStore, ProposalPatch } from './store';

export type Executor = Pick<ExecutionOrchestrator, 'execute'>;

export interface LifecycleServiceDeps {
  config: Pick<Config, 'extraction' | 'execution'>;
  store: LifecycleStore;
  executor: Executor;
  logger?: Logger;
  now?: () => Date;
}

export interface RecordProposalOptions {
  /** owner/name of the repository the proposal targets */
  repoId: string;
  oauthSessionId?: string;
}

export interface ApproveOptions extends ExecuteOptions {
  /** Edited update block; frozen on the proposal once approved */
  updateBlock?: string;
  /** Defaults to the proposal's idea summary */
  instruction?: string;
}

export interface ConnectRepositoryOptions {
  repoFullname: string;
  userId: string;
  defaultBranch?: string;
  /** Branch pull requests target; defaults to the default branch */
  baseBranch?: string;
}

export interface ExecutedProposal {
  proposal: Proposal;
  result: ExecutionResult;
}

export interface LifecycleStats {
  proposals: Record<ProposalStatus, number>;
  experiments: Record<ExperimentStatus, number>;
  /** Completed experiments over finished ones; 0 when none finished */
  successRate: number;
}

/**
 * Proposal -> approval -> Experiment bookkeeping on top of a store, plus the
 * per-user repository connections execution targets.
 */
export class LifecycleService {
  private readonly config: LifecycleServiceDeps['config'];
  private readonly store: LifecycleStore;
  private readonly executor: Executor;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: LifecycleServiceDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.executor = deps.executor;
    this.logger = deps.logger ?? noopLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Extracts a proposal from raw model output and stores it as pending.
   * @throws the ExtractionError when nothing usable could be recovered
   */
  async recordProposal(raw: string, options: RecordProposalOptions): Promise<Proposal> {
    const extracted = extractProposal(raw, this.config.extraction);
    if (!extracted.ok) {
      await this.logger.warn(`Discarded model output for ${options.repoId}: ${extracted.error.code}`);
      throw extracted.error;
    }

    const { proposalId, ...fields } = extracted.proposal;
    const now = this.now();
    const proposal = await this.store.createProposal({
      ...fields,
      id: newRecordId(options.repoId, now),
      ...(proposalId !== undefined ? { externalId: proposalId } : {}),
      status: 'pending',
      repoId: options.repoId,
      ...(options.oauthSessionId !== undefined ? { oauthSessionId: options.oauthSessionId } : {}),
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
    });

    await this.logger.trace(
      {
        ...eventMeta(proposal.id, now),
        type: 'ProposalExtracted',
        payload: {
          proposalId: proposal.id,
          repoId: proposal.repoId,
          targetFile: targetFileOf(proposal),
          confidence: proposal.confidence,
        },
      },
      `Recorded proposal ${proposal.id}: ${proposal.ideaSummary}`,
    );
    return proposal;
  }

  /**
   * Approves a pending proposal and executes it. The proposal ends up
   * completed or failed according to the execution result.
   * @throws ConfigError, leaving the proposal pending, when no target file can be resolved
   */
  async approve(id: string, options: ApproveOptions = {}): Promise<ExecutedProposal> {
    const pending = await this.requireProposal(id);
    if (targetFileOf(pending) === null && !this.config.execution.defaultFile) {
      throw new ConfigError(`Proposal ${id} names no file to change and execution.defaultFile is not set`, {
        details: { proposalId: id },
      });
    }
    const approved = await this.moveProposal(pending, 'approved', {
      ...(options.updateBlock !== undefined ? { updateBlock: options.updateBlock } : {}),
    });
    const request = await this.requestFor(approved);

    return this.run(approved, options, {
      ...request,
      instruction: options.instruction ?? approved.ideaSummary,
    });
  }

  async reject(id: string, reason?: string): Promise<Proposal> {
    const proposal = await this.requireProposal(id);
    return this.moveProposal(proposal, 'rejected', reason !== undefined ? { rejectionReason: reason } : {});
  }

  /**
   * Re-runs the failed experiment of a failed proposal. When execution failed
   * before an experiment was recorded, the request is rebuilt from the proposal.
   */
  async retry(id: string, options: ExecuteOptions = {}): Promise<ExecutedProposal> {
    const proposal = await this.requireProposal(id);
    const experimentId = proposal.experimentId ?? proposal.id;
    const experiment = await this.store.getExperiment(experimentId);

    if (!experiment) {
      return this.run(proposal, options, await this.requestFor(proposal));
    }
    return this.run(proposal, options, {
      instruction: experiment.instruction,
      updateBlock: experiment.updateBlock,
      repoFullname: experiment.repoFullname,
      filePath: experiment.filePath,
      baseBranch: experiment.baseBranch,
      proposalId: proposal.id,
      experimentId: experiment.id,
      rolloutPct: experiment.rolloutPct,
    });
  }

  getProposal(id: string): Promise<Proposal | null> {
    return this.store.getProposal(id);
  }

  listProposals(status?: ProposalStatus): Promise<Proposal[]> {
    return this.store.listProposals(status !== undefined ? { status } : {});
  }

  /**
   * Connects a repository for a user. A user's first repository becomes the
   * active one.
   */
  async connectRepository(options: ConnectRepositoryOptions): Promise<Repository> {
    const existing = await this.store.getRepository(options.repoFullname);
    const defaultBranch = options.defaultBranch ?? existing?.defaultBranch ?? this.config.execution.defaultBaseBranch;
    const timestamp = this.now().toISOString();

    return this.store.connectRepository({
      repoFullname: options.repoFullname,
      defaultBranch,
      baseBranch: options.baseBranch ?? existing?.baseBranch ?? defaultBranch,
      userId: options.userId,
      createdAt: timestamp,
      updatedAt: timestamp,
    });
  }

  /**
   * Makes `repoFullname` the owner's only active repository.
   */
  activateRepository(repoFullname: string): Promise<Repository> {
    return this.store.activateRepository(repoFullname, this.now().toISOString());
  }

  async getActiveRepository(userId: string): Promise<Repository | null> {
    const owned = await this.store.listRepositories({ userId });
    return owned.find((r) => r.isActive) ?? null;
  }

  async stats(): Promise<LifecycleStats> {
    const proposals: Record<ProposalStatus, number> = {
      pending: 0,
      approved: 0,
      rejected: 0,
      executing: 0,
      completed: 0,
      failed: 0,
    };
    const experiments: Record<ExperimentStatus, number> = { running: 0, completed: 0, failed: 0 };

    for (const p of await this.store.listProposals()) proposals[p.status]++;
    for (const e of await this.store.listExperiments()) experiments[e.status]++;

    const finished = experiments.completed + experiments.failed;
    return { proposals, experiments, successRate: finished === 0 ? 0 : experiments.completed / finished };
  }

  private async requestFor(proposal: Proposal): Promise<ExecutionRequest> {
    const repository = await this.store.getRepository(proposal.repoId);
    const targetFile = targetFileOf(proposal);
    return {
      instruction: proposal.ideaSummary,
      updateBlock: proposal.updateBlock,
      repoFullname: proposal.repoId,
      ...(targetFile !== null ? { filePath: targetFile } : {}),
      ...(repository ? { baseBranch: repository.baseBranch } : {}),
      proposalId: proposal.id,
      experimentId: proposal.id,
    };
  }

  private async run(proposal: Proposal, options: ExecuteOptions, request: ExecutionRequest): Promise<ExecutedProposal> {
    const executing = await this.moveProposal(proposal, 'executing', { experimentId: request.experimentId });

    let result: ExecutionResult;
    try {
      result = await this.executor.execute(request, options.signal ? { signal: options.signal } : {});
    } catch (error) {
      // Thrown before the experiment could record a result
      await this.moveProposal(executing, 'failed', {});
      throw toAppError(error, { proposalId: proposal.id });
    }

    const finished = await this.moveProposal(executing, result.status, {});
    return { proposal: finished, result };
  }

  /** Compare-and-set against the stored status, so concurrent callers cannot both move a proposal. */
  private async moveProposal(proposal: Proposal, to: ProposalStatus, patch: ProposalPatch): Promise<Proposal> {
    const now = this.now();
    const updated = await this.store.transitionProposal(proposal.id, proposal.status, to, {
      ...patch,
      updatedAt: now.toISOString(),
    });
    await this.logger.log({
      ...eventMeta(proposal.id, now),
      type: 'ProposalStatusChanged',
      payload: { from: proposal.status, to },
    });
    return updated;
  }

  private async requireProposal(id: string): Promise<Proposal> {
    const proposal = await this.store.getProposal(id);
    if (!proposal) throw new RecordNotFoundError('Proposal', id);
    return proposal;
  }
}

/** First planned file, when the plan names one */
export function targetFileOf(proposal: Pick<Proposal, 'technicalPlan'>): string | null {
  const file = proposal.technicalPlan[0]?.file.trim();
  return file ? file : null;
}
