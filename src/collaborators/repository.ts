/**
 * Repository provisioner collaborator contract.
 *
 * Implementations own the repository host's state. The pipeline re-derives
 * the handle from the task identifier on every run and never caches it.
 */

import { ArtifactSet } from '../domain/artifact';
import { RepositoryHandle } from '../domain/repository';

export type ProvisionErrorKind =
  | 'NameCollisionExhausted'
  | 'AuthenticationRejected'
  | 'RateLimited'
  | 'NotFound'
  | 'NetworkFailure';

const RETRYABLE_KINDS: ReadonlySet<ProvisionErrorKind> = new Set<ProvisionErrorKind>(['RateLimited', 'NetworkFailure']);

export class ProvisionError extends Error {
  constructor(
    readonly kind: ProvisionErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ProvisionError';
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export interface RepositoryProvisioner {
  /**
   * Round 1: create a fresh, uniquely named repository for the task and
   * push every file in one commit. Resolves only after the commit is
   * acknowledged.
   */
  createAndPush(taskId: string, artifacts: ArtifactSet): Promise<RepositoryHandle>;

  /**
   * Round 2: resolve the task's repository and replace its tree with the
   * new set in one commit. Rejects with NotFound; never creates.
   */
  locateAndPush(taskId: string, artifacts: ArtifactSet): Promise<RepositoryHandle>;

  /** Resolve the task's repository without writing. Rejects with NotFound. */
  locate(taskId: string): Promise<RepositoryHandle>;

  /** Current tree of the repository at its head commit. */
  readArtifacts(handle: RepositoryHandle): Promise<ArtifactSet>;
}
