import {
  DuplicateRecordError,
  InvalidTransitionError,
  RecordNotFoundError,
  type Experiment,
  type ExperimentStatus,
  type Proposal,
  type ProposalStatus,
  type Repository,
} from '@northstar/shared';
import { emptyDocument, type LifecycleDocument } from './schema';
import { assertExperimentTransition, assertProposalTransition } from './state_machine';

export interface ProposalFilter {
  status?: ProposalStatus;
  repoId?: string;
}

export interface ExperimentFilter {
  proposalId?: string;
  status?: ExperimentStatus;
}

export interface RepositoryFilter {
  userId?: string;
}

export type ProposalPatch = Partial<Omit<Proposal, 'id' | 'createdAt'>>;
export type ExperimentPatch = Partial<Omit<Experiment, 'id' | 'createdAt'>>;

/** A repository being connected; activity is decided by the store. */
export type RepositoryConnection = Omit<Repository, 'isActive'>;

/**
 * Persistence for proposals, experiments and connected repositories.
 * Records are returned as copies; mutate them through the update methods.
 */
export interface LifecycleStore {
  createProposal(proposal: Proposal): Promise<Proposal>;
  getProposal(id: string): Promise<Proposal | null>;
  updateProposal(id: string, patch: ProposalPatch): Promise<Proposal>;
  /**
   * Moves a proposal from `from` to `to` and applies `patch` in one step.
   * @throws InvalidTransitionError when the stored status is not `from` or the move is not allowed
   */
  transitionProposal(id: string, from: ProposalStatus, to: ProposalStatus, patch?: ProposalPatch): Promise<Proposal>;
  listProposals(filter?: ProposalFilter): Promise<Proposal[]>;

  createExperiment(experiment: Experiment): Promise<Experiment>;
  getExperiment(id: string): Promise<Experiment | null>;
  updateExperiment(id: string, patch: ExperimentPatch): Promise<Experiment>;
  transitionExperiment(
    id: string,
    from: ExperimentStatus,
    to: ExperimentStatus,
    patch?: ExperimentPatch,
  ): Promise<Experiment>;
  listExperiments(filter?: ExperimentFilter): Promise<Experiment[]>;

  upsertRepository(repository: Repository): Promise<Repository>;
  /**
   * Inserts or updates a repository. A new connection is active when its owner
   * has no active repository yet; an existing one keeps its activity and createdAt.
   */
  connectRepository(repository: RepositoryConnection): Promise<Repository>;
  /** Activates `repoFullname` and deactivates every other repository of its owner. */
  activateRepository(repoFullname: string, updatedAt: string): Promise<Repository>;
  getRepository(repoFullname: string): Promise<Repository | null>;
  listRepositories(filter?: RepositoryFilter): Promise<Repository[]>;
}

const byCreatedAt = <T extends { createdAt: string }>(a: T, b: T) => a.createdAt.localeCompare(b.createdAt);

/**
 * Store over a single lifecycle document. Mutations are serialized so that
 * concurrent callers never interleave a read-modify-write.
 */
export abstract class DocumentLifecycleStore implements LifecycleStore {
  private tail: Promise<unknown> = Promise.resolve();

  protected abstract read(): Promise<LifecycleDocument>;
  protected abstract write(doc: LifecycleDocument): Promise<void>;

  private mutate<T>(fn: (doc: LifecycleDocument) => T): Promise<T> {
    const next = this.tail.then(async () => {
      // Work on a copy so a failed write leaves the stored document untouched.
      const doc = structuredClone(await this.read());
      const result = fn(doc);
      await this.write(doc);
      return structuredClone(result);
    });
    // Keep the chain alive after a failed mutation; the caller still sees the rejection.
    this.tail = next.catch(() => undefined);
    return next;
  }

  private async query<T>(fn: (doc: LifecycleDocument) => T): Promise<T> {
    await this.tail;
    return structuredClone(fn(await this.read()));
  }

  createProposal(proposal: Proposal): Promise<Proposal> {
    return this.mutate((doc) => {
      if (doc.proposals[proposal.id]) throw new DuplicateRecordError('Proposal', proposal.id);
      doc.proposals[proposal.id] = structuredClone(proposal);
      return doc.proposals[proposal.id];
    });
  }

  getProposal(id: string): Promise<Proposal | null> {
    return this.query((doc) => doc.proposals[id] ?? null);
  }

  updateProposal(id: string, patch: ProposalPatch): Promise<Proposal> {
    return this.mutate((doc) => {
      const current = doc.proposals[id];
      if (!current) throw new RecordNotFoundError('Proposal', id);
      doc.proposals[id] = { ...current, ...structuredClone(patch) };
      return doc.proposals[id];
    });
  }

  transitionProposal(
    id: string,
    from: ProposalStatus,
    to: ProposalStatus,
    patch: ProposalPatch = {},
  ): Promise<Proposal> {
    return this.mutate((doc) => {
      const current = doc.proposals[id];
      if (!current) throw new RecordNotFoundError('Proposal', id);
      if (current.status !== from) {
        throw new InvalidTransitionError('Proposal', current.status, to, { details: { proposalId: id, expected: from } });
      }
      assertProposalTransition(id, from, to);
      doc.proposals[id] = { ...current, ...structuredClone(patch), status: to };
      return doc.proposals[id];
    });
  }

  listProposals(filter: ProposalFilter = {}): Promise<Proposal[]> {
    return this.query((doc) =>
      Object.values(doc.proposals)
        .filter((p) => filter.status === undefined || p.status === filter.status)
        .filter((p) => filter.repoId === undefined || p.repoId === filter.repoId)
        .sort(byCreatedAt),
    );
  }

  createExperiment(experiment: Experiment): Promise<Experiment> {
    return this.mutate((doc) => {
      if (doc.experiments[experiment.id]) throw new DuplicateRecordError('Experiment', experiment.id);
      doc.experiments[experiment.id] = structuredClone(experiment);
      return doc.experiments[experiment.id];
    });
  }

  getExperiment(id: string): Promise<Experiment | null> {
    return this.query((doc) => doc.experiments[id] ?? null);
  }

  updateExperiment(id: string, patch: ExperimentPatch): Promise<Experiment> {
    return this.mutate((doc) => {
      const current = doc.experiments[id];
      if (!current) throw new RecordNotFoundError('Experiment', id);
      doc.experiments[id] = { ...current, ...structuredClone(patch) };
      return doc.experiments[id];
    });
  }

  transitionExperiment(
    id: string,
    from: ExperimentStatus,
    to: ExperimentStatus,
    patch: ExperimentPatch = {},
  ): Promise<Experiment> {
    return this.mutate((doc) => {
      const current = doc.experiments[id];
      if (!current) throw new RecordNotFoundError('Experiment', id);
      if (current.status !== from) {
        throw new InvalidTransitionError('Experiment', current.status, to, {
          details: { experimentId: id, expected: from },
        });
      }
      assertExperimentTransition(id, from, to);
      doc.experiments[id] = { ...current, ...structuredClone(patch), status: to };
      return doc.experiments[id];
    });
  }

  listExperiments(filter: ExperimentFilter = {}): Promise<Experiment[]> {
    return this.query((doc) =>
      Object.values(doc.experiments)
        .filter((e) => filter.proposalId === undefined || e.proposalId === filter.proposalId)
        .filter((e) => filter.status === undefined || e.status === filter.status)
        .sort(byCreatedAt),
    );
  }

  upsertRepository(repository: Repository): Promise<Repository> {
    return this.mutate((doc) => {
      doc.repositories[repository.repoFullname] = structuredClone(repository);
      return doc.repositories[repository.repoFullname];
    });
  }

  connectRepository(repository: RepositoryConnection): Promise<Repository> {
    return this.mutate((doc) => {
      const existing = doc.repositories[repository.repoFullname];
      const sameOwner = existing !== undefined && existing.userId === repository.userId;
      const ownerHasActive = Object.values(doc.repositories).some(
        (r) => r.userId === repository.userId && r.isActive && r.repoFullname !== repository.repoFullname,
      );
      doc.repositories[repository.repoFullname] = {
        ...structuredClone(repository),
        isActive: sameOwner ? existing.isActive : !ownerHasActive,
        createdAt: existing?.createdAt ?? repository.createdAt,
      };
      return doc.repositories[repository.repoFullname];
    });
  }

  activateRepository(repoFullname: string, updatedAt: string): Promise<Repository> {
    return this.mutate((doc) => {
      const target = doc.repositories[repoFullname];
      if (!target) throw new RecordNotFoundError('Repository', repoFullname);
      for (const other of Object.values(doc.repositories)) {
        if (other.userId === target.userId && other.isActive && other.repoFullname !== repoFullname) {
          doc.repositories[other.repoFullname] = { ...other, isActive: false, updatedAt };
        }
      }
      doc.repositories[repoFullname] = { ...target, isActive: true, updatedAt };
      return doc.repositories[repoFullname];
    });
  }

  getRepository(repoFullname: string): Promise<Repository | null> {
    return this.query((doc) => doc.repositories[repoFullname] ?? null);
  }

  listRepositories(filter: RepositoryFilter = {}): Promise<Repository[]> {
    return this.query((doc) =>
      Object.values(doc.repositories)
        .filter((r) => filter.userId === undefined || r.userId === filter.userId)
        .sort(byCreatedAt),
    );
  }
}

export class InMemoryLifecycleStore extends DocumentLifecycleStore {
  private doc: LifecycleDocument = emptyDocument();

  protected async read(): Promise<LifecycleDocument> {
    return this.doc;
  }

  protected async write(doc: LifecycleDocument): Promise<void> {
    this.doc = doc;
  }
}
