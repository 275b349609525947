import { describe, it, expect } from 'vitest';
import * as adapters from './index';

describe('adapters package', () => {
  it('exports name', () => {
    expect(adapters.name).toBe('@northstar/adapters');
  });

  it('exports the gateways, providers and fakes', () => {
    expect(adapters.FastApplyMergeGateway).toBeTypeOf('function');
    expect(adapters.GitHubPullRequestProvider).toBeTypeOf('function');
    expect(adapters.FakeMergeGateway).toBeTypeOf('function');
    expect(adapters.FakePullRequestProvider).toBeTypeOf('function');
  });
});
