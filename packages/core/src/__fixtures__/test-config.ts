import { defaultConfig, type Config, type Experiment, type Proposal } from '@northstar/shared';

export const TEST_NOW = '2026-03-01T12:00:00.000Z';

/**
 * Defaulted config with credentials filled in and short timeouts.
 */
export function configForTest(remoteUrlTemplate = 'https://github.com/{repo}.git'): Config {
  return defaultConfig({
    merge: { apiKey: 'test-secret', baseUrl: 'https://merge.test/v1', timeoutMs: 5_000 },
    github: { token: 'test-token', remoteUrlTemplate, timeoutMs: 5_000 },
    git: { timeoutMs: 30_000 },
    execution: { defaultRepo: 'acme/web', defaultFile: 'src/Button.tsx', deadlineMs: 60_000 },
    store: { backend: 'memory' },
  });
}

export function makeProposal(overrides: Partial<Proposal> = {}): Proposal {
  return {
    id: 'exp-1',
    ideaSummary: 'increase button contrast',
    rationale: 'Low contrast hurts conversions',
    category: 'ui',
    expectedImpact: { metric: 'ctr', deltaPct: 0.05 },
    technicalPlan: [{ file: 'src/Button.tsx', action: 'darken the primary color' }],
    updateBlock: "const color = '#111';",
    confidence: 0.8,
    status: 'pending',
    repoId: 'acme/web',
    createdAt: TEST_NOW,
    updatedAt: TEST_NOW,
    ...overrides,
  };
}

export function makeExperiment(overrides: Partial<Experiment> = {}): Experiment {
  return {
    id: 'exp-1',
    instruction: 'increase button contrast',
    updateBlock: "const color = '#111';",
    repoFullname: 'acme/web',
    filePath: 'src/Button.tsx',
    baseBranch: 'main',
    rolloutPct: 20,
    status: 'running',
    prUrl: null,
    branch: null,
    filesModified: [],
    attempts: 1,
    createdAt: TEST_NOW,
    updatedAt: TEST_NOW,
    ...overrides,
  };
}
