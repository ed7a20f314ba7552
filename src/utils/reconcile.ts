import { CommitCollisionError, ReconcileInvariantError } from "../errors";

import { compareChronologically, indexByKey } from "./commit";

import type { Commit, ReconcileResult } from "../types";

function shaSet(commits: Iterable<Commit>): Set<string> {
  const shas = new Set<string>();
  for (const commit of commits) {
    shas.add(commit.sha);
  }
  return shas;
}

/**
 * Throws when one sha shows up under more than one project id.
 */
export function assertNoCollisions(commits: Iterable<Commit>): void {
  const owners = new Map<string, Set<string>>();
  for (const commit of commits) {
    const projects = owners.get(commit.sha) ?? new Set<string>();
    projects.add(commit.projectId);
    owners.set(commit.sha, projects);
  }

  for (const [sha, projects] of owners) {
    if (projects.size > 1) {
      throw new CommitCollisionError(sha, [...projects].sort());
    }
  }
}

/**
 * Splits source and synced commits into what has to be mirrored and what is
 * mirrored but gone from every source. Pure; no git access.
 */
export function reconcile(sourceCommits: Iterable<Commit>, syncedCommits: Iterable<Commit>): ReconcileResult {
  const source = indexByKey(sourceCommits);
  const synced = indexByKey(syncedCommits);

  assertNoCollisions(source.values());

  const toCreate: Commit[] = [];
  let alreadySynced = 0;
  for (const [key, commit] of source) {
    if (synced.has(key)) {
      alreadySynced++;
    } else {
      toCreate.push(commit);
    }
  }

  const toRemove: Commit[] = [];
  for (const [key, commit] of synced) {
    if (!source.has(key)) {
      toRemove.push(commit);
    }
  }

  // sha-level difference must agree with key-level difference
  const syncedShas = shaSet(synced.values());
  const expected = [...shaSet(source.values())].filter((sha) => !syncedShas.has(sha)).sort();
  const actual = [...shaSet(toCreate)].sort();
  if (expected.length !== actual.length || expected.some((sha, i) => sha !== actual[i])) {
    throw new ReconcileInvariantError(expected, actual);
  }

  toCreate.sort(compareChronologically);

  return { toCreate, toRemove, alreadySynced };
}
