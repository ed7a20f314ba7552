import { describe, expect, it } from "vitest";

import { TEST_TIMESTAMPS, createCommit } from "../../__tests__/test-utils";
import { CommitCollisionError, ReconcileInvariantError } from "../../errors";
import { commitKey } from "../commit";
import { assertNoCollisions, reconcile } from "../reconcile";

describe("reconcile", () => {
  it("should create every source commit when nothing is synced", () => {
    const commit = createCommit();

    const result = reconcile([commit], []);

    expect(result.toCreate).toEqual([commit]);
    expect(result.toRemove).toEqual([]);
    expect(result.alreadySynced).toBe(0);
  });

  it("should do nothing when the mirror already exists", () => {
    const source = createCommit();
    const mirror = createCommit({ syncTargetSha: "bbb222" });

    const result = reconcile([source], [mirror]);

    expect(result.toCreate).toEqual([]);
    expect(result.toRemove).toEqual([]);
    expect(result.alreadySynced).toBe(1);
  });

  it("should report mirrors whose original is gone", () => {
    const mirror = createCommit({ syncTargetSha: "bbb222" });

    const result = reconcile([], [mirror]);

    expect(result.toCreate).toEqual([]);
    expect(result.toRemove).toEqual([mirror]);
  });

  it("should keep the mirror record, with its hash, in the removal list", () => {
    const kept = createCommit({ sha: "ccc333", timestamp: TEST_TIMESTAMPS.second });
    const keptMirror = { ...kept, syncTargetSha: "d1" };
    const orphan = createCommit({ syncTargetSha: "d2" });

    const result = reconcile([kept], [keptMirror, orphan]);

    expect(result.toRemove).toEqual([orphan]);
    expect(result.toRemove[0].syncTargetSha).toBe("d2");
  });

  it("should order commits to create oldest first", () => {
    const newest = createCommit({ sha: "c3", timestamp: TEST_TIMESTAMPS.third });
    const middle = createCommit({ sha: "c2", timestamp: TEST_TIMESTAMPS.second });
    const oldest = createCommit({ sha: "c1", timestamp: TEST_TIMESTAMPS.first });

    const result = reconcile([newest, middle, oldest], []);

    expect(result.toCreate.map((c) => c.sha)).toEqual(["c1", "c2", "c3"]);
  });

  it("should collapse duplicate source entries", () => {
    const commit = createCommit();

    const result = reconcile([commit, { ...commit }], []);

    expect(result.toCreate).toHaveLength(1);
  });

  it("should keep both differences disjoint and cover the source set", () => {
    const source = [
      createCommit({ sha: "a1" }),
      createCommit({ sha: "a2", timestamp: TEST_TIMESTAMPS.second }),
      createCommit({ projectId: "beta", sha: "b1", timestamp: TEST_TIMESTAMPS.third }),
    ];
    const synced = [
      { ...source[1], syncTargetSha: "e1" },
      createCommit({ sha: "gone", syncTargetSha: "e2" }),
    ];

    const { toCreate, toRemove, alreadySynced } = reconcile(source, synced);

    const createKeys = new Set(toCreate.map(commitKey));
    const removeKeys = new Set(toRemove.map(commitKey));
    expect([...createKeys].filter((key) => removeKeys.has(key))).toEqual([]);
    expect(toCreate.length + alreadySynced).toBe(source.length);
    expect([...createKeys].sort()).toEqual([commitKey(source[0]), commitKey(source[2])].sort());
    expect(toRemove.map((c) => c.sha)).toEqual(["gone"]);
  });

  it("should fail when two projects share a sha", () => {
    const alpha = createCommit({ sha: "abc123" });
    const beta = createCommit({ projectId: "beta", sha: "abc123" });

    expect(() => reconcile([alpha, beta], [])).toThrow(CommitCollisionError);
  });

  it("should fail when a mirror of one project matches a sha of another", () => {
    const source = createCommit({ projectId: "beta", sha: "abc123" });
    const mirror = createCommit({ projectId: "alpha", sha: "abc123", syncTargetSha: "bbb222" });

    expect(() => reconcile([source], [mirror])).toThrow(ReconcileInvariantError);
  });

  it("should fail when a mirror carries a different date for the same sha", () => {
    const source = createCommit();
    const mirror = createCommit({ timestamp: TEST_TIMESTAMPS.second, syncTargetSha: "bbb222" });

    expect(() => reconcile([source], [mirror])).toThrow(ReconcileInvariantError);
  });
});

describe("assertNoCollisions", () => {
  it("should name every project that owns the sha", () => {
    const commits = [
      createCommit({ projectId: "gamma", sha: "abc123" }),
      createCommit({ projectId: "alpha", sha: "abc123" }),
    ];

    try {
      assertNoCollisions(commits);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CommitCollisionError);
      expect((error as CommitCollisionError).projectIds).toEqual(["alpha", "gamma"]);
      expect((error as CommitCollisionError).message).toBe(
        "Commit abc123 appears in more than one project: alpha, gamma",
      );
    }
  });

  it("should accept the same sha twice in one project", () => {
    expect(() => assertNoCollisions([createCommit(), createCommit()])).not.toThrow();
  });
});
