import * as path from 'path';
import {
  ConsoleLogger,
  JsonlLogger,
  type Config,
  type Logger,
} from '@northstar/shared';
import {
  FastApplyMergeGateway,
  GitHubPullRequestProvider,
  type MergeGateway,
  type PullRequestProvider,
} from '@northstar/adapters';
import { TemporaryCloneWorkspace } from '@northstar/repo';
import { extractProposal, type ExtractResult } from './extract';
import {
  ExecutionOrchestrator,
  type CloneWorkspace,
  type ExecuteOptions,
  type ExecutionRequest,
  type ExecutionResult,
} from './execution';
import {
  InMemoryLifecycleStore,
  JsonFileLifecycleStore,
  LifecycleService,
  type LifecycleStore,
} from './lifecycle';

export interface PipelineOptions {
  logger?: Logger;
  store?: LifecycleStore;
  /** Replaces the Fast-Apply gateway, e.g. with a fake for dry runs */
  merge?: MergeGateway;
  /** Replaces the GitHub provider */
  pullRequests?: PullRequestProvider;
  workspace?: CloneWorkspace;
  /** Base for a relative `store.path`. Default: process.cwd() */
  cwd?: string;
  now?: () => Date;
}

export interface Pipeline {
  readonly config: Config;
  readonly logger: Logger;
  readonly store: LifecycleStore;
  readonly orchestrator: ExecutionOrchestrator;
  readonly lifecycle: LifecycleService;
  /** Recovers a proposal from raw model output */
  extract(raw: string): ExtractResult;
  /** Runs one instruction through merge, branch, push and pull request */
  execute(request: ExecutionRequest, options?: ExecuteOptions): Promise<ExecutionResult>;
}

export function createLogger(config: Config): Logger {
  const { level, eventsPath } = config.logging;
  return eventsPath
    ? new JsonlLogger(eventsPath, {}, new ConsoleLogger({ level }))
    : new ConsoleLogger({ level });
}

export function createStore(config: Config, cwd: string = process.cwd()): LifecycleStore {
  if (config.store.backend === 'memory') return new InMemoryLifecycleStore();
  return new JsonFileLifecycleStore(path.resolve(cwd, config.store.path));
}

/**
 * Wires the production collaborators from configuration. Any collaborator
 * can be replaced through `options`.
 */
export function createPipeline(config: Config, options: PipelineOptions = {}): Pipeline {
  const logger = options.logger ?? createLogger(config);
  const store = options.store ?? createStore(config, options.cwd);

  const orchestrator = new ExecutionOrchestrator({
    config,
    merge: options.merge ?? new FastApplyMergeGateway(config.merge),
    pullRequests: options.pullRequests ?? new GitHubPullRequestProvider(config.github),
    workspace: options.workspace ?? new TemporaryCloneWorkspace({ github: config.github, git: config.git, logger }),
    store,
    logger,
    now: options.now,
  });

  const lifecycle = new LifecycleService({ config, store, executor: orchestrator, logger, now: options.now });

  return {
    config,
    logger,
    store,
    orchestrator,
    lifecycle,
    extract: (raw) => extractProposal(raw, config.extraction),
    execute: (request, executeOptions) => orchestrator.execute(request, executeOptions),
  };
}
