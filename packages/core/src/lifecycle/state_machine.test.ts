import { describe, it, expect } from 'vitest';
import { InvalidTransitionError, type ProposalStatus } from '@northstar/shared';
import {
  assertExperimentTransition,
  assertProposalTransition,
  canTransitionExperiment,
  canTransitionProposal,
} from './state_machine';

describe('proposal transitions', () => {
  it.each<[ProposalStatus, ProposalStatus]>([
    ['pending', 'approved'],
    ['pending', 'rejected'],
    ['approved', 'executing'],
    ['executing', 'completed'],
    ['executing', 'failed'],
    ['failed', 'executing'],
  ])('allows %s -> %s', (from, to) => {
    expect(canTransitionProposal(from, to)).toBe(true);
  });

  it.each<[ProposalStatus, ProposalStatus]>([
    ['pending', 'executing'],
    ['rejected', 'approved'],
    ['completed', 'executing'],
    ['approved', 'rejected'],
    ['failed', 'completed'],
  ])('refuses %s -> %s', (from, to) => {
    expect(canTransitionProposal(from, to)).toBe(false);
  });

  it('throws InvalidTransitionError naming both states', () => {
    expect(() => assertProposalTransition('exp-1', 'rejected', 'approved')).toThrow(
      new InvalidTransitionError('Proposal', 'rejected', 'approved'),
    );
  });
});

describe('experiment transitions', () => {
  it('allows a failed experiment to run again but not a completed one', () => {
    expect(canTransitionExperiment('failed', 'running')).toBe(true);
    expect(canTransitionExperiment('completed', 'running')).toBe(false);
  });

  it('throws on a completed experiment failing', () => {
    expect(() => assertExperimentTransition('exp-1', 'completed', 'failed')).toThrow(
      "Experiment cannot move from 'completed' to 'failed'",
    );
  });
});
