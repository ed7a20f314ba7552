import { LOG_PATTERNS } from "../constants";
import { LogParseError } from "../errors";

import { isValidTimestamp } from "./commit";

import type { Commit } from "../types";

export interface SourceLogEntry {
  sha: string;
  email: string;
  timestamp: string;
}

export function splitLogLines(output: string): string[] {
  return output.split(/\r?\n/).filter((line) => line.length > 0);
}

/**
 * Parses one `%H,%ae,%aI` line. Anything else is fatal: a line we cannot read
 * means the log format is not what we asked git for.
 */
export function parseSourceLine(line: string): SourceLogEntry {
  const match = LOG_PATTERNS.SOURCE_LINE.exec(line);
  if (!match?.groups) {
    throw new LogParseError(line, "expected 'hash,email,timestamp'");
  }

  const { sha, email, timestamp } = match.groups;
  if (!isValidTimestamp(timestamp)) {
    throw new LogParseError(line, `invalid timestamp '${timestamp}'`);
  }

  return { sha, email, timestamp };
}

/**
 * Parses one `%H,%aI,%s` line of the sync repository. Returns `null` for
 * commits that are not mirror commits.
 */
export function parseSyncLine(line: string): Commit | null {
  const match = LOG_PATTERNS.SYNC_LINE.exec(line);
  if (!match?.groups) {
    return null;
  }

  const { target, timestamp, projectId, sha } = match.groups;
  if (!isValidTimestamp(timestamp)) {
    throw new LogParseError(line, `invalid timestamp '${timestamp}'`);
  }

  return { projectId, sha, timestamp, syncTargetSha: target };
}
