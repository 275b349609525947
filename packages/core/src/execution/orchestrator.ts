import { promises as fs } from 'fs';
import {
  AppError,
  BaseBranchMissingError,
  ConfigError,
  GitCommandError,
  NoChangeDetectedError,
  TargetFileNotFoundError,
  TimeoutError,
  eventMeta,
  isTimeoutReason,
  linkAbort,
  noopLogger,
  resolveInRepo,
  slugify,
  toAppError,
  type Config,
  type Experiment,
  type ExperimentStatus,
  type Logger,
} from '@northstar/shared';
import type { AdapterContext, MergeGateway, PullRequestProvider } from '@northstar/adapters';
import {
  BranchAllocator,
  Committer,
  type CloneContext,
  type TemporaryCloneWorkspace,
} from '@northstar/repo';
import type { ExperimentPatch, LifecycleStore } from '../lifecycle/store';
import { newRecordId } from '../lifecycle/ids';
import { PullRequestOpener } from './pull_request_opener';
import { buildPullRequestBody, previewChange, summarizeChange } from './change_preview';

export type CloneWorkspace = Pick<TemporaryCloneWorkspace, 'withClone'>;

export interface ExecutionRequest {
  /** Natural-language description of the change; drives the branch name and PR title */
  instruction: string;
  /** Fast-Apply update block */
  updateBlock: string;
  /** owner/name; defaults to `execution.defaultRepo` */
  repoFullname?: string;
  /** Repository-relative path; defaults to `execution.defaultFile` */
  filePath?: string;
  /** Defaults to `execution.defaultBaseBranch` */
  baseBranch?: string;
  proposalId?: string;
  /** Re-runs a failed experiment, or creates one under this id */
  experimentId?: string;
  rolloutPct?: number;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export type ExecutionResult =
  | {
      status: 'completed';
      experimentId: string;
      prUrl: string;
      branch: string;
      filesModified: string[];
      diffSummary: string;
    }
  | {
      status: 'failed';
      experimentId: string;
      error: AppError;
      /** Branch created for this attempt, if any; left in place on the remote */
      branch: string | null;
    };

export interface ExecutionOrchestratorDeps {
  config: Config;
  merge: MergeGateway;
  pullRequests: PullRequestProvider;
  workspace: CloneWorkspace;
  store: LifecycleStore;
  logger?: Logger;
  now?: () => Date;
}

interface Target {
  repoFullname: string;
  filePath: string;
  baseBranch: string;
}

interface StepOutcome {
  prUrl: string;
  branch: string;
  diffSummary: string;
}

/**
 * Turns an instruction and update block into a pull request:
 * clone, merge, branch, commit, push, open. Every attempt is recorded as an
 * Experiment before any side effect and finishes completed or failed.
 */
export class ExecutionOrchestrator {
  private readonly config: Config;
  private readonly merge: MergeGateway;
  private readonly opener: PullRequestOpener;
  private readonly workspace: CloneWorkspace;
  private readonly store: LifecycleStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: ExecutionOrchestratorDeps) {
    this.config = deps.config;
    this.merge = deps.merge;
    this.opener = new PullRequestOpener(deps.pullRequests);
    this.workspace = deps.workspace;
    this.store = deps.store;
    this.logger = deps.logger ?? noopLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async execute(request: ExecutionRequest, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const target = this.resolveTarget(request);
    const experiment = await this.startExperiment(request, target);
    const log = this.logger.child({ experiment: experiment.id, repo: target.repoFullname });
    const startedAt = Date.now();
    const deadlineMs = this.config.execution.deadlineMs;
    const linked = linkAbort(options.signal, deadlineMs);
    const progress: { branch: string | null } = { branch: null };

    await log.log({
      ...eventMeta(experiment.id, this.now()),
      type: 'ExperimentStarted',
      payload: { ...target, instruction: request.instruction, attempt: experiment.attempts },
    });

    try {
      const outcome = await this.workspace.withClone(
        target.repoFullname,
        (clone) => this.runSteps(experiment, target, { clone, log, signal: linked.signal, progress }),
        linked.signal,
      );

      await this.transition(experiment, 'completed', {
        prUrl: outcome.prUrl,
        branch: outcome.branch,
        filesModified: [target.filePath],
        diffSummary: outcome.diffSummary,
      }, log);
      await log.trace(
        {
          ...eventMeta(experiment.id, this.now()),
          type: 'ExperimentCompleted',
          payload: { prUrl: outcome.prUrl, branch: outcome.branch, durationMs: Date.now() - startedAt },
        },
        `Opened ${outcome.prUrl} from ${outcome.branch}`,
      );

      return {
        status: 'completed',
        experimentId: experiment.id,
        prUrl: outcome.prUrl,
        branch: outcome.branch,
        filesModified: [target.filePath],
        diffSummary: outcome.diffSummary,
      };
    } catch (caught) {
      const error = this.toFailure(caught, linked.signal, deadlineMs, {
        repo: target.repoFullname,
        branch: progress.branch,
        instruction: request.instruction,
      });

      await this.transition(experiment, 'failed', {
        branch: progress.branch,
        failure: { code: error.code, message: error.message, retryable: error.retryable },
      }, log);
      await log.log({
        ...eventMeta(experiment.id, this.now()),
        type: 'ExperimentFailed',
        payload: {
          code: error.code,
          message: error.message,
          retryable: error.retryable,
          branch: progress.branch,
          durationMs: Date.now() - startedAt,
        },
      });
      await log.error(error, `Experiment failed: ${error.message}`);

      return { status: 'failed', experimentId: experiment.id, error, branch: progress.branch };
    } finally {
      linked.dispose();
    }
  }

  private async runSteps(
    experiment: Experiment,
    target: Target,
    step: {
      clone: CloneContext;
      log: Logger;
      signal: AbortSignal;
      progress: { branch: string | null };
    },
  ): Promise<StepOutcome> {
    const { clone, log, signal, progress } = step;
    const { dir, git } = clone;
    const { instruction, updateBlock } = experiment;
    const ctx: AdapterContext = { runId: experiment.id, logger: log, abortSignal: signal };

    try {
      await git.checkout(target.baseBranch);
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new BaseBranchMissingError(target.baseBranch, { cause: error, details: { repo: target.repoFullname } });
      }
      throw error;
    }

    const absolutePath = resolveInRepo(dir, target.filePath);
    const original = await this.readTarget(absolutePath, target.filePath);
    checkpoint(signal);

    const merged = await this.merge.merge({ instruction, original, updateBlock }, ctx);
    await log.log({
      ...eventMeta(experiment.id, this.now()),
      type: 'MergeCompleted',
      payload: {
        filePath: target.filePath,
        originalChars: original.length,
        mergedChars: merged.length,
        changed: merged !== original,
      },
    });
    if (merged === original) {
      throw new NoChangeDetectedError({ details: { repo: target.repoFullname, file: target.filePath } });
    }
    checkpoint(signal);

    const prefix = this.config.git.branchPrefix;
    const slug = prefix ? `${prefix}/${slugify(instruction)}` : slugify(instruction);
    const allocator = new BranchAllocator(git, { maxProbes: this.config.git.maxBranchProbes, logger: log });
    const allocation = await allocator.allocate(target.baseBranch, slug);
    progress.branch = allocation.branch;
    await this.store.updateExperiment(experiment.id, { branch: allocation.branch, updatedAt: this.timestamp() });
    await log.log({
      ...eventMeta(experiment.id, this.now()),
      type: 'BranchAllocated',
      payload: { branch: allocation.branch, baseBranch: target.baseBranch, probes: allocation.probes },
    });

    await fs.writeFile(absolutePath, merged, 'utf8');

    const committer = new Committer(git, allocator, log);
    const pushed = await committer.commitAndPush({
      branch: allocation.branch,
      slug,
      message: `${this.config.execution.commitMessagePrefix}${instruction}`,
      // The rejected name belongs to another execution from here on.
      onRenamed: async (renamed, rejected) => {
        progress.branch = renamed;
        await this.store.updateExperiment(experiment.id, { branch: renamed, updatedAt: this.timestamp() });
        await log.log({
          ...eventMeta(experiment.id, this.now()),
          type: 'PushRetried',
          payload: { rejectedBranch: rejected, branch: renamed },
        });
      },
    });
    await log.log({
      ...eventMeta(experiment.id, this.now()),
      type: 'ChangesPushed',
      payload: { branch: pushed.branch, commitSha: pushed.sha },
    });
    checkpoint(signal);

    const preview = previewChange(target.filePath, original, merged);
    const pr = await this.opener.open(
      {
        repoFullname: target.repoFullname,
        head: pushed.branch,
        base: target.baseBranch,
        title: `${this.config.execution.prTitlePrefix}${instruction}`,
        body: buildPullRequestBody({
          instruction,
          filePath: target.filePath,
          rolloutPct: experiment.rolloutPct,
          preview,
          maxLines: this.config.execution.diffPreviewMaxLines,
        }),
      },
      ctx,
    );
    await log.log({
      ...eventMeta(experiment.id, this.now()),
      type: 'PullRequestOpened',
      payload: { url: pr.url, head: pushed.branch, base: target.baseBranch, created: pr.created },
    });

    return { prUrl: pr.url, branch: pushed.branch, diffSummary: summarizeChange(preview) };
  }

  private resolveTarget(request: ExecutionRequest): Target {
    const execution = this.config.execution;
    const repoFullname = request.repoFullname ?? execution.defaultRepo;
    const filePath = request.filePath ?? execution.defaultFile;
    if (!repoFullname) {
      throw new ConfigError('No target repository: pass repoFullname or set execution.defaultRepo');
    }
    if (!filePath) {
      throw new ConfigError('No target file: pass filePath or set execution.defaultFile');
    }
    return { repoFullname, filePath, baseBranch: request.baseBranch ?? execution.defaultBaseBranch };
  }

  /**
   * Creates the running Experiment, or moves an existing failed one back to
   * running for another attempt.
   */
  private async startExperiment(request: ExecutionRequest, target: Target): Promise<Experiment> {
    const existing = request.experimentId ? await this.store.getExperiment(request.experimentId) : null;
    const timestamp = this.timestamp();

    if (existing) {
      return this.store.transitionExperiment(existing.id, existing.status, 'running', {
        ...target,
        instruction: request.instruction,
        updateBlock: request.updateBlock,
        prUrl: null,
        branch: null,
        failure: undefined,
        attempts: existing.attempts + 1,
        updatedAt: timestamp,
      });
    }

    return this.store.createExperiment({
      id: request.experimentId ?? newRecordId(target.repoFullname, this.now()),
      ...(request.proposalId !== undefined ? { proposalId: request.proposalId } : {}),
      instruction: request.instruction,
      updateBlock: request.updateBlock,
      ...target,
      rolloutPct: request.rolloutPct ?? this.config.execution.defaultRolloutPct,
      status: 'running',
      prUrl: null,
      branch: null,
      filesModified: [],
      attempts: 1,
      createdAt: timestamp,
      updatedAt: timestamp,
    });
  }

  private async transition(
    experiment: Experiment,
    to: ExperimentStatus,
    patch: ExperimentPatch,
    log: Logger,
  ): Promise<void> {
    await this.store.transitionExperiment(experiment.id, 'running', to, { ...patch, updatedAt: this.timestamp() });
    await log.log({
      ...eventMeta(experiment.id, this.now()),
      type: 'ExperimentStatusChanged',
      payload: { from: 'running', to },
    });
  }

  private async readTarget(absolutePath: string, filePath: string): Promise<string> {
    try {
      return await fs.readFile(absolutePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
        throw new TargetFileNotFoundError(filePath, { cause: error });
      }
      throw error;
    }
  }

  private toFailure(
    error: unknown,
    signal: AbortSignal,
    deadlineMs: number,
    details: Record<string, unknown>,
  ): AppError {
    if (signal.aborted && isTimeoutReason(signal.reason)) {
      return new TimeoutError(`Execution exceeded its deadline of ${deadlineMs}ms`, { cause: error, details });
    }
    return toAppError(error, details);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function checkpoint(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new TimeoutError('Execution aborted', { cause: signal.reason });
  }
}
