/**
 * Artifact sets: the complete file contents of a generated application.
 *
 * Insertion order is preserved and is the order files are committed in.
 */

import { DecodedAttachment } from './task';

/** Ordered mapping of relative file path to content. */
export type ArtifactSet = Map<string, Buffer>;

/** Publishing policy enforced by the pipeline on every generated set. */
export interface ArtifactPolicy {
  /** Entry-point document that must be present. */
  entryPoint: string;
  /** Accepted license document names, compared case-insensitively. */
  licenseNames: readonly string[];
}

export const DEFAULT_ARTIFACT_POLICY: Readonly<ArtifactPolicy> = {
  entryPoint: 'index.html',
  licenseNames: ['LICENSE', 'LICENSE.md', 'LICENSE.txt'],
};

/** Build an artifact set from path/content pairs; strings are stored as UTF-8. */
export function createArtifactSet(
  entries: Iterable<readonly [string, string | Buffer]>,
): ArtifactSet {
  const set: ArtifactSet = new Map();
  for (const [path, content] of entries) {
    set.set(path, typeof content === 'string' ? Buffer.from(content, 'utf8') : content);
  }
  return set;
}

/** Deep copy so callers cannot mutate a set held elsewhere. */
export function cloneArtifactSet(set: ArtifactSet): ArtifactSet {
  const copy: ArtifactSet = new Map();
  for (const [path, content] of set) {
    copy.set(path, Buffer.from(content));
  }
  return copy;
}

/**
 * Return null when the path is a safe relative path, otherwise the reason
 * it is rejected.
 */
export function checkArtifactPath(path: string): string | null {
  if (path.length === 0) return 'empty path';
  if (path.includes('\0')) return `path contains NUL: ${JSON.stringify(path)}`;
  if (path.includes('\\')) return `path uses backslash separators: ${path}`;
  if (path.startsWith('/') || /^[A-Za-z]:/.test(path)) return `path is absolute: ${path}`;
  for (const segment of path.split('/')) {
    if (segment === '' || segment === '.' || segment === '..') {
      return `path contains an invalid segment: ${path}`;
    }
  }
  return null;
}

/** Validate an artifact set against the policy. Returns the list of violations. */
export function validateArtifactSet(
  set: ArtifactSet,
  policy: ArtifactPolicy = DEFAULT_ARTIFACT_POLICY,
): string[] {
  const violations: string[] = [];

  if (set.size === 0) {
    violations.push('artifact set is empty');
  }

  for (const path of set.keys()) {
    const problem = checkArtifactPath(path);
    if (problem) violations.push(problem);
  }

  if (!set.has(policy.entryPoint)) {
    violations.push(`missing entry point: ${policy.entryPoint}`);
  }

  const licenseNames = policy.licenseNames.map((n) => n.toLowerCase());
  const hasLicense = [...set.keys()].some((p) => licenseNames.includes(p.toLowerCase()));
  if (!hasLicense) {
    violations.push(`missing license document (one of: ${policy.licenseNames.join(', ')})`);
  }

  return violations;
}

/** Outcome of merging attachments into a generated set. */
export interface AttachmentMergeResult {
  artifacts: ArtifactSet;
  /** Attachment names that were not merged, with the reason. */
  skipped: Array<{ name: string; reason: string }>;
}

/**
 * Add decoded attachments to a generated set. Generated files win over
 * attachments with the same path; unsafe names are skipped.
 */
export function mergeAttachments(
  generated: ArtifactSet,
  attachments: readonly DecodedAttachment[],
): AttachmentMergeResult {
  const artifacts = cloneArtifactSet(generated);
  const skipped: Array<{ name: string; reason: string }> = [];

  for (const attachment of attachments) {
    const problem = checkArtifactPath(attachment.name);
    if (problem) {
      skipped.push({ name: attachment.name, reason: problem });
      continue;
    }
    if (artifacts.has(attachment.name)) {
      skipped.push({ name: attachment.name, reason: 'generated file with the same path takes precedence' });
      continue;
    }
    artifacts.set(attachment.name, Buffer.from(attachment.bytes));
  }

  return { artifacts, skipped };
}
