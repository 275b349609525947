import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ConfigError,
  InvalidTransitionError,
  RecordNotFoundError,
  RefusedByModelError,
  defaultConfig,
  noopLogger,
  type Logger,
  type PipelineEvent,
} from '@northstar/shared';
import type { ExecutionRequest, ExecutionResult } from '../execution/orchestrator';
import { InMemoryLifecycleStore } from './store';
import { LifecycleService, targetFileOf } from './service';
import { TEST_NOW, makeExperiment, makeProposal } from '../__fixtures__/test-config';

const modelOutput = JSON.stringify({
  proposal_id: 'model-7',
  idea_summary: 'increase button contrast',
  rationale: 'Low contrast hurts conversions',
  category: 'ui',
  expected_impact: { metric: 'ctr', delta_pct: 0.05 },
  technical_plan: [{ file: 'src/Button.tsx', action: 'darken the primary color' }],
  update_block: "const color = '#111';",
  confidence: 0.8,
});

const completed = (request: ExecutionRequest): ExecutionResult => ({
  status: 'completed',
  experimentId: request.experimentId ?? 'exp-x',
  prUrl: 'https://github.com/acme/web/pull/1',
  branch: 'northstar/increase-button-contrast',
  filesModified: [request.filePath ?? ''],
  diffSummary: '2 lines changed (+1 -1)',
});

const fakeExecute = () => vi.fn(async (request: ExecutionRequest): Promise<ExecutionResult> => completed(request));

describe('LifecycleService', () => {
  let store: InMemoryLifecycleStore;
  let events: PipelineEvent[];
  let execute: ReturnType<typeof fakeExecute>;
  let service: LifecycleService;

  beforeEach(() => {
    store = new InMemoryLifecycleStore();
    events = [];
    const logger: Logger = {
      ...noopLogger,
      log: (event) => {
        events.push(event);
      },
      trace: (event) => {
        events.push(event);
      },
    };
    execute = fakeExecute();
    service = new LifecycleService({
      config: defaultConfig(),
      store,
      executor: { execute },
      logger,
      now: () => new Date(TEST_NOW),
    });
  });

  describe('recordProposal', () => {
    it('stores the extracted proposal as pending', async () => {
      const proposal = await service.recordProposal(modelOutput, { repoId: 'acme/web', oauthSessionId: 'session-1' });

      expect(proposal).toEqual({
        id: expect.stringMatching(/^exp-[0-9a-z]+-[0-9a-f]{8}$/),
        externalId: 'model-7',
        ideaSummary: 'increase button contrast',
        rationale: 'Low contrast hurts conversions',
        category: 'ui',
        expectedImpact: { metric: 'ctr', deltaPct: 0.05 },
        technicalPlan: [{ file: 'src/Button.tsx', action: 'darken the primary color' }],
        updateBlock: "const color = '#111';",
        confidence: 0.8,
        status: 'pending',
        repoId: 'acme/web',
        oauthSessionId: 'session-1',
        createdAt: TEST_NOW,
        updatedAt: TEST_NOW,
      });
      await expect(store.getProposal(proposal.id)).resolves.toEqual(proposal);
      expect(events[0]).toMatchObject({
        type: 'ProposalExtracted',
        payload: { proposalId: proposal.id, repoId: 'acme/web', targetFile: 'src/Button.tsx', confidence: 0.8 },
      });
    });

    it('stores nothing when the model refused', async () => {
      await expect(
        service.recordProposal("I'm sorry, I can't help with that.", { repoId: 'acme/web' }),
      ).rejects.toBeInstanceOf(RefusedByModelError);
      await expect(store.listProposals()).resolves.toEqual([]);
    });
  });

  describe('approve', () => {
    it('executes the proposal against its first planned file', async () => {
      await store.createProposal(makeProposal({ id: 'p1' }));

      const { proposal, result } = await service.approve('p1');

      expect(execute).toHaveBeenCalledWith(
        {
          instruction: 'increase button contrast',
          updateBlock: "const color = '#111';",
          repoFullname: 'acme/web',
          filePath: 'src/Button.tsx',
          proposalId: 'p1',
          experimentId: 'p1',
        },
        {},
      );
      expect(result.status).toBe('completed');
      expect(proposal).toMatchObject({ status: 'completed', experimentId: 'p1' });
      expect(
        events.filter((e) => e.type === 'ProposalStatusChanged').map((e) => e.payload),
      ).toEqual([
        { from: 'pending', to: 'approved' },
        { from: 'approved', to: 'executing' },
        { from: 'executing', to: 'completed' },
      ]);
    });

    it('freezes an edited update block and targets the connected base branch', async () => {
      await store.createProposal(makeProposal({ id: 'p1' }));
      await service.connectRepository({ repoFullname: 'acme/web', userId: 'u1', baseBranch: 'develop' });

      await service.approve('p1', { updateBlock: "const color = '#000';", instruction: 'darken buttons' });

      expect(execute).toHaveBeenCalledWith(
        expect.objectContaining({
          instruction: 'darken buttons',
          updateBlock: "const color = '#000';",
          baseBranch: 'develop',
        }),
        {},
      );
      await expect(store.getProposal('p1')).resolves.toMatchObject({ updateBlock: "const color = '#000';" });
    });

    it('marks the proposal failed when execution fails', async () => {
      await store.createProposal(makeProposal({ id: 'p1' }));
      execute.mockResolvedValueOnce({
        status: 'failed',
        experimentId: 'p1',
        error: new ConfigError('boom'),
        branch: null,
      });

      const { proposal } = await service.approve('p1');
      expect(proposal.status).toBe('failed');
    });

    it('marks the proposal failed and rethrows when execution cannot start', async () => {
      await store.createProposal(makeProposal({ id: 'p1' }));
      execute.mockRejectedValueOnce(new ConfigError('Target file path is empty'));

      await expect(service.approve('p1')).rejects.toThrow('Target file path is empty');
      await expect(store.getProposal('p1')).resolves.toMatchObject({ status: 'failed' });
    });

    it('leaves the proposal pending when no target file can be resolved', async () => {
      await store.createProposal(makeProposal({ id: 'p1', technicalPlan: [] }));

      await expect(service.approve('p1')).rejects.toBeInstanceOf(ConfigError);
      await expect(store.getProposal('p1')).resolves.toMatchObject({ status: 'pending' });
      expect(execute).not.toHaveBeenCalled();
    });

    it('executes a proposal exactly once under concurrent approvals', async () => {
      await store.createProposal(makeProposal({ id: 'p1' }));

      const settled = await Promise.allSettled([
        service.approve('p1', { updateBlock: 'first' }),
        service.approve('p1', { updateBlock: 'second' }),
      ]);

      expect(settled.map((s) => s.status)).toEqual(['fulfilled', 'rejected']);
      const [, loser] = settled;
      expect(loser.status === 'rejected' && loser.reason).toBeInstanceOf(InvalidTransitionError);
      expect(execute).toHaveBeenCalledTimes(1);
      expect(execute).toHaveBeenCalledWith(expect.objectContaining({ updateBlock: 'first' }), {});
      await expect(store.getProposal('p1')).resolves.toMatchObject({ status: 'completed', updateBlock: 'first' });
    });

    it('refuses proposals that are not pending', async () => {
      await store.createProposal(makeProposal({ id: 'p1', status: 'rejected' }));
      await expect(service.approve('p1')).rejects.toBeInstanceOf(InvalidTransitionError);
      expect(execute).not.toHaveBeenCalled();
    });

    it('fails for unknown proposals', async () => {
      await expect(service.approve('missing')).rejects.toBeInstanceOf(RecordNotFoundError);
    });
  });

  describe('reject', () => {
    it('records the reason', async () => {
      await store.createProposal(makeProposal({ id: 'p1' }));
      await expect(service.reject('p1', 'not now')).resolves.toMatchObject({
        status: 'rejected',
        rejectionReason: 'not now',
      });
    });
  });

  describe('retry', () => {
    it('re-runs the stored experiment of a failed proposal', async () => {
      await store.createProposal(makeProposal({ id: 'p1', status: 'failed', experimentId: 'p1' }));
      await store.createExperiment(
        makeExperiment({ id: 'p1', proposalId: 'p1', status: 'failed', baseBranch: 'develop', rolloutPct: 40 }),
      );

      const { proposal } = await service.retry('p1');

      expect(execute).toHaveBeenCalledWith(
        {
          instruction: 'increase button contrast',
          updateBlock: "const color = '#111';",
          repoFullname: 'acme/web',
          filePath: 'src/Button.tsx',
          baseBranch: 'develop',
          proposalId: 'p1',
          experimentId: 'p1',
          rolloutPct: 40,
        },
        {},
      );
      expect(proposal.status).toBe('completed');
    });

    it('rebuilds the request when the failed run never recorded an experiment', async () => {
      await store.createProposal(makeProposal({ id: 'p1' }));
      execute.mockRejectedValueOnce(new ConfigError('Target file path is empty'));
      await expect(service.approve('p1')).rejects.toBeInstanceOf(ConfigError);

      const { proposal } = await service.retry('p1');

      expect(execute).toHaveBeenLastCalledWith(
        {
          instruction: 'increase button contrast',
          updateBlock: "const color = '#111';",
          repoFullname: 'acme/web',
          filePath: 'src/Button.tsx',
          proposalId: 'p1',
          experimentId: 'p1',
        },
        {},
      );
      expect(proposal.status).toBe('completed');
    });

    it('only retries failed proposals', async () => {
      await store.createProposal(makeProposal({ id: 'p1', status: 'completed' }));
      await expect(service.retry('p1')).rejects.toThrow("Proposal cannot move from 'completed' to 'executing'");
    });
  });

  describe('repositories', () => {
    it("activates a user's first repository", async () => {
      const first = await service.connectRepository({ repoFullname: 'acme/web', userId: 'u1' });
      const second = await service.connectRepository({ repoFullname: 'acme/api', userId: 'u1', defaultBranch: 'trunk' });

      expect(first).toMatchObject({ isActive: true, defaultBranch: 'main', baseBranch: 'main' });
      expect(second).toMatchObject({ isActive: false, defaultBranch: 'trunk', baseBranch: 'trunk' });
    });

    it('keeps at most one active repository per user', async () => {
      await service.connectRepository({ repoFullname: 'acme/web', userId: 'u1' });
      await service.connectRepository({ repoFullname: 'acme/api', userId: 'u1' });
      await service.connectRepository({ repoFullname: 'other/site', userId: 'u2' });

      await service.activateRepository('acme/api');

      await expect(service.getActiveRepository('u1')).resolves.toMatchObject({ repoFullname: 'acme/api' });
      await expect(store.getRepository('acme/web')).resolves.toMatchObject({ isActive: false });
      await expect(service.getActiveRepository('u2')).resolves.toMatchObject({ repoFullname: 'other/site' });
    });

    it('leaves one active repository after concurrent activations', async () => {
      await service.connectRepository({ repoFullname: 'u/a', userId: 'u' });
      await service.connectRepository({ repoFullname: 'u/b', userId: 'u' });
      await service.connectRepository({ repoFullname: 'u/c', userId: 'u' });

      await Promise.all([service.activateRepository('u/b'), service.activateRepository('u/c')]);

      const active = (await store.listRepositories({ userId: 'u' })).filter((r) => r.isActive);
      expect(active.map((r) => r.repoFullname)).toEqual(['u/c']);
    });

    it('activates only one of several repositories connected at once', async () => {
      await Promise.all([
        service.connectRepository({ repoFullname: 'u/a', userId: 'u' }),
        service.connectRepository({ repoFullname: 'u/b', userId: 'u' }),
      ]);

      const active = (await store.listRepositories({ userId: 'u' })).filter((r) => r.isActive);
      expect(active).toHaveLength(1);
    });

    it('keeps activity and creation time when a repository reconnects', async () => {
      await service.connectRepository({ repoFullname: 'acme/web', userId: 'u1' });
      await service.connectRepository({ repoFullname: 'acme/api', userId: 'u1' });
      await service.activateRepository('acme/api');

      const again = await service.connectRepository({ repoFullname: 'acme/web', userId: 'u1', baseBranch: 'develop' });

      expect(again).toMatchObject({ isActive: false, baseBranch: 'develop', createdAt: TEST_NOW });
      await expect(service.getActiveRepository('u1')).resolves.toMatchObject({ repoFullname: 'acme/api' });
    });

    it('fails to activate an unknown repository', async () => {
      await expect(service.activateRepository('acme/none')).rejects.toBeInstanceOf(RecordNotFoundError);
    });
  });

  it('counts records per status', async () => {
    await store.createProposal(makeProposal({ id: 'a' }));
    await store.createProposal(makeProposal({ id: 'b', status: 'completed' }));
    await store.createExperiment(makeExperiment({ id: 'e1', status: 'completed' }));
    await store.createExperiment(makeExperiment({ id: 'e2', status: 'completed' }));
    await store.createExperiment(makeExperiment({ id: 'e3', status: 'failed' }));
    await store.createExperiment(makeExperiment({ id: 'e4', status: 'running' }));

    await expect(service.stats()).resolves.toEqual({
      proposals: { pending: 1, approved: 0, rejected: 0, executing: 0, completed: 1, failed: 0 },
      experiments: { running: 1, completed: 2, failed: 1 },
      successRate: 2 / 3,
    });
  });
});

describe('targetFileOf', () => {
  it('returns null without a planned file', () => {
    expect(targetFileOf({ technicalPlan: [] })).toBeNull();
    expect(targetFileOf({ technicalPlan: [{ file: '  ', action: 'x' }] })).toBeNull();
    expect(targetFileOf({ technicalPlan: [{ file: 'src/a.ts', action: 'x' }] })).toBe('src/a.ts');
  });
});
