import { LOG_PATTERNS, MIRROR_MESSAGE_PREFIX } from "../constants";

import type { Commit, CommitKey } from "../types";

/**
 * Parses a strict ISO 8601 date-time with offset and returns its epoch second,
 * or `null` when the value is not one.
 */
export function parseTimestamp(value: string): number | null {
  if (!LOG_PATTERNS.ISO_TIMESTAMP.test(value)) {
    return null;
  }
  const millis = Date.parse(value);
  if (Number.isNaN(millis)) {
    return null;
  }
  return Math.floor(millis / 1000);
}

export function isValidTimestamp(value: string): boolean {
  return parseTimestamp(value) !== null;
}

export function isValidSha(value: string): boolean {
  return LOG_PATTERNS.SHA.test(value);
}

/**
 * Identity of a commit for set operations. `syncTargetSha` is left out so a
 * source commit and its mirror share one key.
 */
export function commitKey(commit: Commit): CommitKey {
  const epoch = parseTimestamp(commit.timestamp);
  return `${commit.projectId}:${commit.sha}@${epoch ?? commit.timestamp}`;
}

export function mirrorMessage(commit: Commit): string {
  return `${MIRROR_MESSAGE_PREFIX} ${commit.projectId}:${commit.sha}`;
}

export function describeCommit(commit: Commit): string {
  return `${commit.projectId}:${commit.sha}`;
}

export function indexByKey(commits: Iterable<Commit>): Map<CommitKey, Commit> {
  const index = new Map<CommitKey, Commit>();
  for (const commit of commits) {
    const key = commitKey(commit);
    if (!index.has(key)) {
      index.set(key, commit);
    }
  }
  return index;
}

/** Oldest first; ties broken by project id, then sha. */
export function compareChronologically(a: Commit, b: Commit): number {
  const byTime = (parseTimestamp(a.timestamp) ?? 0) - (parseTimestamp(b.timestamp) ?? 0);
  if (byTime !== 0) return byTime;
  if (a.projectId !== b.projectId) return a.projectId < b.projectId ? -1 : 1;
  if (a.sha !== b.sha) return a.sha < b.sha ? -1 : 1;
  return 0;
}
