import type { ORPHAN_POLICIES } from "../constants";
import type { Logger } from "../services/logger.service";

/**
 * What to do with mirror commits whose original can no longer be found in any
 * configured source repository.
 */
export type OrphanPolicy = (typeof ORPHAN_POLICIES)[number];

/**
 * A commit as read from a source repository, or reconstructed from a mirror
 * commit in the sync repository.
 */
export interface Commit {
  projectId: string;
  /** Full hash of the original commit in its source repository. */
  sha: string;
  /** Author date in strict ISO 8601, offset included. */
  timestamp: string;
  /** Hash of the mirror commit itself. Only set on commits read from the sync repository. */
  syncTargetSha?: string;
}

/**
 * Identity of a commit: project, sha and the instant of its timestamp.
 * Built by `commitKey()`; never compare `Commit` objects directly.
 */
export type CommitKey = string;

/**
 * What the sync pipeline needs from a repository. `GitService` is the git
 * implementation.
 */
export interface CommitRepository {
  readonly repoPath: string;
  assertRepository(): Promise<void>;
  readSourceCommits(projectId: string, includeEmails: ReadonlySet<string>): AsyncGenerator<Commit>;
  readSyncedCommits(): AsyncGenerator<Commit>;
  createMirrorCommit(commit: Commit): Promise<void>;
  summarizeCommit(sha: string): Promise<string>;
  dropCommit(sha: string): Promise<void>;
  getGitDir(): Promise<string>;
}

export interface ProjectConfig {
  id: string;
  gitRoot: string;
}

export interface Config {
  includeEmails: string[];
  projects: ProjectConfig[];
  syncRepo: string;
  orphanPolicy: OrphanPolicy;
  dryRun?: boolean;
  debug?: boolean;
  logger?: Logger;
}

/** The mapping as written in the config file, before validation. */
export interface ConfigFile {
  "include-emails": string[];
  projects: Array<{ id: string; "git-root": string }>;
  "sync-repo": string;
  "orphan-policy"?: OrphanPolicy;
}

export interface ReconcileResult {
  toCreate: Commit[];
  toRemove: Commit[];
  alreadySynced: number;
}

export type SyncStatus = "completed" | "declined" | "dry-run";

export interface SyncResult {
  status: SyncStatus;
  sourceCommits: number;
  alreadySynced: number;
  created: Commit[];
  removed: Commit[];
  /** Orphans found; equals `removed` unless the run was declined or dry. */
  orphaned: Commit[];
}
