import { ERROR_MESSAGES } from "../constants";

import type { Commit } from "../types";

export class CommitMirrorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class GitError extends CommitMirrorError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, `GIT_${code}`, cause);
  }
}

export class GitOperationError extends GitError {
  constructor(
    public readonly operation: string,
    public readonly repoPath: string,
    details: string,
    cause?: Error,
  ) {
    super(`Git operation '${operation}' failed in '${repoPath}': ${details}`, "OPERATION_FAILED", cause);
  }
}

export class RepositoryNotFoundError extends GitError {
  constructor(public readonly repoPath: string) {
    super(`Not a git repository: '${repoPath}'`, "REPOSITORY_NOT_FOUND");
  }
}

export class LogParseError extends GitError {
  constructor(
    public readonly line: string,
    public readonly reason: string,
  ) {
    super(`Could not parse log line (${reason}):\n\n${line}`, "LOG_PARSE_FAILED");
  }
}

export class HistoryRewriteError extends GitError {
  constructor(
    public readonly targetSha: string,
    reason: string,
    cause?: Error,
  ) {
    super(`Cannot remove commit '${targetSha}' from history: ${reason}`, "HISTORY_REWRITE_FAILED", cause);
  }
}

export class ConfigError extends CommitMirrorError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, `CONFIG_${code}`, cause);
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(public readonly path: string) {
    super(`Config file not found: ${path}`, "NOT_FOUND");
  }
}

export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Invalid configuration for '${field}': ${reason}`, "VALIDATION_FAILED");
  }
}

export class SyncError extends CommitMirrorError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, `SYNC_${code}`, cause);
  }
}

export class CommitCollisionError extends SyncError {
  constructor(
    public readonly sha: string,
    public readonly projectIds: string[],
  ) {
    super(`Commit ${sha} appears in more than one project: ${projectIds.join(", ")}`, "COMMIT_COLLISION");
  }
}

export class ReconcileInvariantError extends SyncError {
  constructor(
    public readonly expected: string[],
    public readonly actual: string[],
  ) {
    super(
      `Commits to create do not match the sha difference (expected ${expected.length}, got ${actual.length})`,
      "INVARIANT_VIOLATED",
    );
  }
}

export class OrphanedCommitsError extends SyncError {
  constructor(public readonly orphans: Commit[]) {
    super(
      `${orphans.length} mirror commit(s) no longer exist in any source: ` +
        orphans.map((c) => `${c.projectId}:${c.sha}`).join(", "),
      "ORPHANED_COMMITS",
    );
  }
}

export class SyncLockedError extends SyncError {
  constructor(public readonly lockPath: string) {
    super(`Another run holds the lock at '${lockPath}'. Remove it if no run is active.`, "LOCKED");
  }
}

/**
 * Extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

export function isNoCommitsError(error: Error | string): boolean {
  const message = typeof error === "string" ? error : error.message;
  return ERROR_MESSAGES.NO_COMMITS_YET.some((pattern) => message.includes(pattern));
}
