/**
 * In-memory repository host.
 *
 * Reference implementation of RepositoryProvisioner and PagesPublisher for
 * local runs and tests. Each push replaces the whole tree in a single commit,
 * so a reader never observes a partially written set.
 */

import { createHash } from 'crypto';
import { ArtifactSet, cloneArtifactSet } from '../domain/artifact';
import { RepositoryHandle, repositoryNameCandidates, repositoryNameForTask } from '../domain/repository';
import { ProvisionError, RepositoryProvisioner } from './repository';
import { PagesPublisher, PublishError } from './pages';

export interface InMemoryRepositoryHostOptions {
  owner?: string;
  /** Prefix joined to every repository name. */
  namePrefix?: string;
  /** Names tried (base name first) before NameCollisionExhausted. */
  maxNameCandidates?: number;
  /** Base URL repositories are browsable under. */
  baseUrl?: string;
  /** Sites are served from https://<owner>.<pagesDomain>/<name>/. */
  pagesDomain?: string;
}

/** A commit in a stored repository. */
export interface StoredCommit {
  sha: string;
  parent: string | null;
  message: string;
  tree: ArtifactSet;
  committedAt: string;
}

interface StoredRepository {
  owner: string;
  name: string;
  /** Task identifier recorded at creation; used by locate. */
  taskId: string;
  defaultBranch: string;
  createdAt: string;
  commits: StoredCommit[];
  pagesUrl?: string;
}

export class InMemoryRepositoryHost implements RepositoryProvisioner, PagesPublisher {
  private readonly repositories = new Map<string, StoredRepository>();
  private readonly owner: string;
  private readonly namePrefix: string;
  private readonly maxNameCandidates: number;
  private readonly baseUrl: string;
  private readonly pagesDomain: string;
  private sequence = 0;

  constructor(options: InMemoryRepositoryHostOptions = {}) {
    this.owner = options.owner ?? 'pagewright';
    this.namePrefix = options.namePrefix ?? '';
    this.maxNameCandidates = options.maxNameCandidates ?? 5;
    this.baseUrl = (options.baseUrl ?? 'https://git.local').replace(/\/+$/, '');
    this.pagesDomain = options.pagesDomain ?? 'pages.local';
  }

  async createAndPush(taskId: string, artifacts: ArtifactSet): Promise<RepositoryHandle> {
    const baseName = repositoryNameForTask(taskId, this.namePrefix);
    const name = repositoryNameCandidates(baseName, this.maxNameCandidates).find(
      (candidate) => !this.repositories.has(candidate),
    );
    if (!name) {
      throw new ProvisionError(
        'NameCollisionExhausted',
        `No free repository name for task "${taskId}" after ${this.maxNameCandidates} candidates`,
      );
    }

    const repository: StoredRepository = {
      owner: this.owner,
      name,
      taskId,
      defaultBranch: 'main',
      createdAt: new Date().toISOString(),
      commits: [],
    };
    this.commit(repository, artifacts, 'Initial build');
    this.repositories.set(name, repository);
    return this.toHandle(repository);
  }

  async locateAndPush(taskId: string, artifacts: ArtifactSet): Promise<RepositoryHandle> {
    const repository = this.find(taskId);
    this.commit(repository, artifacts, 'Revision');
    return this.toHandle(repository);
  }

  async locate(taskId: string): Promise<RepositoryHandle> {
    return this.toHandle(this.find(taskId));
  }

  async readArtifacts(handle: RepositoryHandle): Promise<ArtifactSet> {
    const repository = this.repositories.get(handle.name);
    if (!repository) {
      throw new ProvisionError('NotFound', `Repository ${handle.owner}/${handle.name} does not exist`);
    }
    const head = repository.commits[repository.commits.length - 1];
    return head ? cloneArtifactSet(head.tree) : new Map();
  }

  async publish(handle: RepositoryHandle): Promise<string> {
    const repository = this.repositories.get(handle.name);
    if (!repository) {
      throw new PublishError(`Repository ${handle.owner}/${handle.name} does not exist`);
    }
    if (!repository.pagesUrl) {
      repository.pagesUrl = `https://${repository.owner}.${this.pagesDomain}/${repository.name}/`;
    }
    return repository.pagesUrl;
  }

  /** Remove a repository out of band (as an operator deleting it would). */
  deleteRepository(name: string): boolean {
    return this.repositories.delete(name);
  }

  /** Names of all stored repositories, in creation order. */
  listRepositories(): string[] {
    return [...this.repositories.keys()];
  }

  /** Commit history of a repository, oldest first. Trees are copies. */
  getCommits(name: string): StoredCommit[] {
    const repository = this.repositories.get(name);
    if (!repository) return [];
    return repository.commits.map((c) => ({ ...c, tree: cloneArtifactSet(c.tree) }));
  }

  /** Most recently created repository recorded for the task. */
  private find(taskId: string): StoredRepository {
    const baseName = repositoryNameForTask(taskId, this.namePrefix);
    const matches = repositoryNameCandidates(baseName, this.maxNameCandidates)
      .map((candidate) => this.repositories.get(candidate))
      .filter((repo): repo is StoredRepository => repo !== undefined && repo.taskId === taskId);

    const latest = matches[matches.length - 1];
    if (!latest) {
      throw new ProvisionError('NotFound', `No repository found for task "${taskId}"`);
    }
    return latest;
  }

  private commit(repository: StoredRepository, artifacts: ArtifactSet, message: string): StoredCommit {
    const parent = repository.commits[repository.commits.length - 1]?.sha ?? null;
    const committedAt = new Date().toISOString();
    const tree = cloneArtifactSet(artifacts);

    const hash = createHash('sha1');
    hash.update(`${parent ?? ''}\n${message}\n${committedAt}\n${++this.sequence}\n`);
    for (const [path, content] of tree) {
      hash.update(`${path}\0${createHash('sha1').update(content).digest('hex')}\n`);
    }

    const commit: StoredCommit = { sha: hash.digest('hex'), parent, message, tree, committedAt };
    repository.commits.push(commit);
    return commit;
  }

  private toHandle(repository: StoredRepository): RepositoryHandle {
    const head = repository.commits[repository.commits.length - 1];
    return {
      owner: repository.owner,
      name: repository.name,
      defaultBranch: repository.defaultBranch,
      htmlUrl: `${this.baseUrl}/${repository.owner}/${repository.name}`,
      cloneUrl: `${this.baseUrl}/${repository.owner}/${repository.name}.git`,
      createdAt: repository.createdAt,
      headCommit: head ? head.sha : '',
    };
  }
}
