import * as fs from "fs/promises";
import * as path from "path";

import simpleGit from "simple-git";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CommitSyncService } from "../../services/commit-sync.service";
import { createMockLogger, createTempDirectory } from "../test-utils";

import type { OrphanPolicy, SyncResult } from "../../types";
import type { ConfirmFn } from "../../utils/interactive";
import type { SimpleGit } from "simple-git";

async function initRepository(dir: string): Promise<SimpleGit> {
  await fs.mkdir(dir, { recursive: true });
  const git = simpleGit(dir);
  await git.init();
  await git.addConfig("user.name", "Test User");
  await git.addConfig("user.email", "a@x.com");
  await git.addConfig("commit.gpgsign", "false");
  return git;
}

async function commitAt(git: SimpleGit, date: string, message: string, author?: string): Promise<string> {
  const authorArgs = author ? [`--author=${author}`] : [];
  await git.raw(["commit", "--allow-empty", "--no-verify", `--date=${date}`, "-m", message, ...authorArgs]);
  return (await git.revparse(["HEAD"])).trim();
}

async function logLines(git: SimpleGit, args: string[]): Promise<string[]> {
  const output = await git.raw(["log", ...args]);
  return output.split("\n").filter((line) => line.length > 0);
}

describe("mirroring between real repositories", () => {
  const savedEnv = { ...process.env };
  let tempDir: string;
  let alphaDir: string;
  let timelineDir: string;
  let alphaGit: SimpleGit;
  let timelineGit: SimpleGit;
  const confirmRemoval = vi.fn<ConfirmFn>();

  function run(orphanPolicy: OrphanPolicy): Promise<SyncResult> {
    const service = new CommitSyncService(
      {
        includeEmails: ["a@x.com"],
        projects: [{ id: "alpha", gitRoot: alphaDir }],
        syncRepo: timelineDir,
        orphanPolicy,
        logger: createMockLogger(),
      },
      { confirmRemoval },
    );
    return service.sync();
  }

  beforeEach(async () => {
    tempDir = await createTempDirectory("commit-mirror-e2e-");
    alphaDir = path.join(tempDir, "alpha");
    timelineDir = path.join(tempDir, "timeline");
    alphaGit = await initRepository(alphaDir);
    timelineGit = await initRepository(timelineDir);
  });

  afterEach(async () => {
    process.env = { ...savedEnv };
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should treat repositories without commits as empty", async () => {
    const empty = await run("abort");

    expect(empty.sourceCommits).toBe(0);
    expect(empty.created).toEqual([]);

    const sha = await commitAt(alphaGit, "2024-03-10T08:15:00-07:00", "first");
    const result = await run("abort");

    expect(result.created.map((commit) => commit.sha)).toEqual([sha]);
    expect(await logLines(timelineGit, ["--format=%s"])).toEqual([`Synced from alpha:${sha}`]);
  }, 30000);

  it("should mirror included commits once with both dates pinned", async () => {
    process.env.EDITOR = "true";
    process.env.GIT_PAGER = "cat";
    await commitAt(timelineGit, "2023-12-31T00:00:00+00:00", "Initial commit");
    const first = await commitAt(alphaGit, "2024-01-01T10:00:00-07:00", "first");
    await commitAt(alphaGit, "2024-01-01T12:00:00+00:00", "not mine", "Other <b@y.com>");
    const second = await commitAt(alphaGit, "2024-01-02T08:00:00+02:00", "second");

    const result = await run("abort");

    expect(result.status).toBe("completed");
    expect(result.created.map((commit) => commit.sha)).toEqual([first, second]);
    const lines = await logLines(timelineGit, ["--format=%aI|%cI|%s"]);
    expect(lines).toHaveLength(3);
    expect(lines.slice(0, 2)).toEqual([
      `2024-01-02T08:00:00+02:00|2024-01-02T08:00:00+02:00|Synced from alpha:${second}`,
      `2024-01-01T10:00:00-07:00|2024-01-01T10:00:00-07:00|Synced from alpha:${first}`,
    ]);

    const rerun = await run("abort");

    expect(rerun.created).toEqual([]);
    expect(rerun.alreadySynced).toBe(2);
    expect(await logLines(timelineGit, ["--format=%s"])).toHaveLength(3);
  }, 30000);

  it("should remove an orphaned mirror below a merge and keep the merge", async () => {
    await commitAt(timelineGit, "2023-12-31T00:00:00+00:00", "Initial commit");
    const first = await commitAt(alphaGit, "2024-01-01T10:00:00-07:00", "first");
    const second = await commitAt(alphaGit, "2024-01-02T08:00:00+02:00", "second");
    await run("confirm-and-remove");

    const branch = (await timelineGit.revparse(["--abbrev-ref", "HEAD"])).trim();
    await timelineGit.raw(["checkout", "-b", "side"]);
    await fs.writeFile(path.join(timelineDir, "notes.md"), "notes\n");
    await timelineGit.add("notes.md");
    await timelineGit.raw(["commit", "--no-verify", "-m", "Side work"]);
    await timelineGit.raw(["checkout", branch]);
    await timelineGit.raw(["merge", "--no-ff", "--no-edit", "-m", "Merge side work", "side"]);

    await alphaGit.raw(["reset", "--hard", "HEAD~1"]);
    confirmRemoval.mockResolvedValue(true);

    const result = await run("confirm-and-remove");

    expect(result.status).toBe("completed");
    expect(result.orphaned.map((commit) => commit.sha)).toEqual([second]);
    expect(result.removed.map((commit) => commit.sha)).toEqual([second]);
    expect(result.created).toEqual([]);
    expect(confirmRemoval).toHaveBeenCalledWith([
      expect.stringMatching(new RegExp(`^[a-f0-9]+ 2024-01-02T08:00:00\\+02:00 Synced from alpha:${second}$`)),
    ]);
    expect(await logLines(timelineGit, ["--topo-order", "--format=%s"])).toEqual([
      "Merge side work",
      "Side work",
      `Synced from alpha:${first}`,
      "Initial commit",
    ]);
    expect(await logLines(timelineGit, ["--format=%aI|%cI|%s", "--grep=Synced from"])).toEqual([
      `2024-01-01T10:00:00-07:00|2024-01-01T10:00:00-07:00|Synced from alpha:${first}`,
    ]);
    const [mergeLine] = await logLines(timelineGit, ["-1", "--format=%P"]);
    expect(mergeLine.split(" ")).toHaveLength(2);

    const rerun = await run("confirm-and-remove");

    expect(rerun.orphaned).toEqual([]);
    expect(rerun.created).toEqual([]);
    expect(confirmRemoval).toHaveBeenCalledTimes(1);
  }, 30000);
});
