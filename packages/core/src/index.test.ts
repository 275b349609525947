import { describe, it, expect } from 'vitest';
import { name, createPipeline, extractProposal, LifecycleService, ConfigLoader } from './index';

describe('core package', () => {
  it('exports name', () => {
    expect(name).toBe('@northstar/core');
  });

  it('exports the public surface', () => {
    expect(typeof createPipeline).toBe('function');
    expect(typeof extractProposal).toBe('function');
    expect(typeof LifecycleService).toBe('function');
    expect(typeof ConfigLoader.load).toBe('function');
  });
});
