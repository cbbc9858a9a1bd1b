/**
 * Repository handle and the deterministic task → repository naming contract.
 */

/** Location of a remote repository, as reported by the provisioner. */
export interface RepositoryHandle {
  owner: string;
  name: string;
  defaultBranch: string;
  /** Browsable URL of the repository. */
  htmlUrl: string;
  /** Clone/push endpoint. */
  cloneUrl: string;
  createdAt: string;
  /** Commit acknowledged by the most recent push. */
  headCommit: string;
}

const MAX_REPOSITORY_NAME_LENGTH = 100;

/**
 * Derive the base repository name for a task identifier.
 *
 * Lower-cases, replaces runs of characters outside [a-z0-9-] with "-",
 * collapses repeated dashes and trims them from both ends. An optional
 * prefix is joined with "-". An empty result becomes "app".
 */
export function repositoryNameForTask(taskId: string, prefix = ''): string {
  const slug = (value: string) =>
    value
      .toLowerCase()
      .replace(/[^a-z0-9-]+/g, '-')
      .replace(/-+/g, '-')
      .replace(/^-|-$/g, '');

  const parts = [slug(prefix), slug(taskId)].filter((p) => p.length > 0);
  const name = parts.join('-').slice(0, MAX_REPOSITORY_NAME_LENGTH).replace(/-$/, '');
  return name.length > 0 ? name : 'app';
}

/**
 * Candidate names in collision-mangling order: the base name, then
 * `<base>-2`, `<base>-3`, … up to `maxCandidates` names in total.
 */
export function repositoryNameCandidates(baseName: string, maxCandidates: number): string[] {
  const names = [baseName];
  for (let i = 2; i <= maxCandidates; i++) {
    names.push(`${baseName}-${i}`);
  }
  return names;
}
