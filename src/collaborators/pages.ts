/**
 * Static-site publisher collaborator contract.
 */

import { RepositoryHandle } from '../domain/repository';

export class PublishError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PublishError';
  }
}

export interface PagesPublisher {
  /**
   * Enable static hosting for the repository and return its public URL.
   * Idempotent: repeated calls succeed and return the same URL.
   */
  publish(handle: RepositoryHandle): Promise<string>;
}
