import * as path from "path";

import simpleGit from "simple-git";

import { GIT_FORMATS, UNSAFE_GIT_ENV } from "../constants";
import {
  GitOperationError,
  HistoryRewriteError,
  RepositoryNotFoundError,
  getErrorMessage,
  isNoCommitsError,
  toError,
} from "../errors";
import { isValidSha, mirrorMessage } from "../utils/commit";
import { parseSourceLine, parseSyncLine, splitLogLines } from "../utils/log-parser";

import { Logger } from "./logger.service";

import type { Commit, CommitRepository } from "../types";
import type { SimpleGit } from "simple-git";

const UNSAFE_ENV_KEYS: ReadonlySet<string> = new Set(UNSAFE_GIT_ENV.KEYS);

function isUnsafeEnvKey(key: string): boolean {
  const upper = key.toUpperCase();
  return UNSAFE_ENV_KEYS.has(upper) || UNSAFE_GIT_ENV.PREFIXES.some((prefix) => upper.startsWith(prefix));
}

/** The current environment without editor, pager and helper overrides, with both dates pinned. */
function commitEnvironment(timestamp: string): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && !isUnsafeEnvKey(key)) {
      env[key] = value;
    }
  }
  return { ...env, GIT_AUTHOR_DATE: timestamp, GIT_COMMITTER_DATE: timestamp };
}

export class GitService implements CommitRepository {
  private git: SimpleGit | null = null;
  private logger: Logger;

  constructor(
    public readonly repoPath: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? Logger.createDefault();
  }

  private createGit(): SimpleGit {
    try {
      return simpleGit(path.resolve(this.repoPath));
    } catch {
      throw new RepositoryNotFoundError(this.repoPath);
    }
  }

  private getGit(): SimpleGit {
    if (!this.git) {
      this.git = this.createGit();
    }
    return this.git;
  }

  private async run(operation: string, args: string[], git: SimpleGit = this.getGit()): Promise<string> {
    this.logger.debug(`git ${args.join(" ")} (in ${this.repoPath})`);
    try {
      return await git.raw(args);
    } catch (error) {
      throw new GitOperationError(operation, this.repoPath, getErrorMessage(error), toError(error));
    }
  }

  async assertRepository(): Promise<void> {
    const isRepo = await this.getGit().checkIsRepo();
    if (!isRepo) {
      throw new RepositoryNotFoundError(this.repoPath);
    }
  }

  async getGitDir(): Promise<string> {
    const output = await this.run("rev-parse", ["rev-parse", "--absolute-git-dir"]);
    return output.trim();
  }

  /**
   * `git log` on a branch without commits fails; for our purposes that is an
   * empty history.
   */
  private async readLog(format: string): Promise<string[]> {
    try {
      const output = await this.run("log", ["log", format]);
      return splitLogLines(output);
    } catch (error) {
      if (error instanceof GitOperationError && isNoCommitsError(error)) {
        this.logger.debug(`No commits yet in ${this.repoPath}`);
        return [];
      }
      throw error;
    }
  }

  async *readSourceCommits(projectId: string, includeEmails: ReadonlySet<string>): AsyncGenerator<Commit> {
    await this.assertRepository();
    const lines = await this.readLog(GIT_FORMATS.SOURCE_LOG);

    for (const line of lines) {
      const entry = parseSourceLine(line);
      if (includeEmails.has(entry.email)) {
        yield { projectId, sha: entry.sha, timestamp: entry.timestamp };
      }
    }
  }

  async *readSyncedCommits(): AsyncGenerator<Commit> {
    await this.assertRepository();
    const lines = await this.readLog(GIT_FORMATS.SYNC_LOG);

    for (const line of lines) {
      const commit = parseSyncLine(line);
      if (commit) {
        yield commit;
      }
    }
  }

  async createMirrorCommit(commit: Commit): Promise<void> {
    // Separate instance so the pinned dates stay off later commands
    const git = this.createGit().env(commitEnvironment(commit.timestamp));
    await this.run("commit", ["commit", "--allow-empty", "--no-verify", `--message=${mirrorMessage(commit)}`], git);
  }

  async summarizeCommit(sha: string): Promise<string> {
    const output = await this.run("log", ["log", "-1", "--date=iso-strict", GIT_FORMATS.SUMMARY, sha]);
    return output.trim();
  }

  /**
   * Drops exactly `sha` from the current branch by replaying its descendants
   * onto its parent. A failed rebase is aborted so the branch is left as it was.
   */
  async dropCommit(sha: string): Promise<void> {
    if (!isValidSha(sha)) {
      throw new HistoryRewriteError(sha, "not a commit hash");
    }

    const parentsLine = await this.run("rev-list", ["rev-list", "--parents", "-n", "1", sha]);
    const parents = parentsLine.trim().split(/\s+/).slice(1);

    if (parents.length === 0) {
      throw new HistoryRewriteError(sha, "it is a root commit");
    }
    if (parents.length > 1) {
      throw new HistoryRewriteError(sha, "it is a merge commit");
    }

    try {
      await this.run("rebase", [
        "rebase",
        "--rebase-merges",
        "--keep-empty",
        "--committer-date-is-author-date",
        "--onto",
        parents[0],
        sha,
      ]);
    } catch (error) {
      await this.abortRebase();
      throw new HistoryRewriteError(sha, getErrorMessage(error), toError(error));
    }
  }

  private async abortRebase(): Promise<void> {
    try {
      await this.run("rebase", ["rebase", "--abort"]);
    } catch (abortError) {
      this.logger.warn(`Could not abort rebase in ${this.repoPath}: ${getErrorMessage(abortError)}`);
    }
  }
}
