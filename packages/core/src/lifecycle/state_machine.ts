import {
  InvalidTransitionError,
  type ExperimentStatus,
  type ProposalStatus,
} from '@northstar/shared';

const PROPOSAL_TRANSITIONS: Record<ProposalStatus, readonly ProposalStatus[]> = {
  pending: ['approved', 'rejected'],
  approved: ['executing'],
  executing: ['completed', 'failed'],
  // Retry re-runs the same experiment
  failed: ['executing'],
  rejected: [],
  completed: [],
};

const EXPERIMENT_TRANSITIONS: Record<ExperimentStatus, readonly ExperimentStatus[]> = {
  running: ['completed', 'failed'],
  failed: ['running'],
  completed: [],
};

export function canTransitionProposal(from: ProposalStatus, to: ProposalStatus): boolean {
  return PROPOSAL_TRANSITIONS[from].includes(to);
}

export function canTransitionExperiment(from: ExperimentStatus, to: ExperimentStatus): boolean {
  return EXPERIMENT_TRANSITIONS[from].includes(to);
}

export function assertProposalTransition(id: string, from: ProposalStatus, to: ProposalStatus): void {
  if (!canTransitionProposal(from, to)) {
    throw new InvalidTransitionError('Proposal', from, to, { details: { proposalId: id } });
  }
}

export function assertExperimentTransition(
  id: string,
  from: ExperimentStatus,
  to: ExperimentStatus,
): void {
  if (!canTransitionExperiment(from, to)) {
    throw new InvalidTransitionError('Experiment', from, to, { details: { experimentId: id } });
  }
}
