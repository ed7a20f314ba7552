import { OrphanedCommitsError } from "../errors";
import { commitKey, describeCommit, indexByKey } from "../utils/commit";
import { createRemovalPrompt } from "../utils/interactive";
import { reconcile } from "../utils/reconcile";
import { acquireRunLock } from "../utils/run-lock";
import { PhaseTimer, Timer, formatSummaryTable } from "../utils/timing";

import { GitService } from "./git.service";
import { Logger } from "./logger.service";

import type { Commit, CommitRepository, Config, ReconcileResult, SyncResult } from "../types";
import type { ConfirmFn } from "../utils/interactive";

export type RepositoryFactory = (repoPath: string, logger: Logger) => CommitRepository;

export interface CommitSyncOptions {
  createRepository?: RepositoryFactory;
  confirmRemoval?: ConfirmFn;
}

const PHASES = {
  READ_SOURCES: "Read source logs",
  READ_SYNC: "Read sync log",
  REMOVE: "Remove orphaned mirrors",
  CREATE: "Create mirror commits",
} as const;

export class CommitSyncService {
  private logger: Logger;
  private createRepository: RepositoryFactory;
  private confirmRemoval: ConfirmFn;

  constructor(
    public readonly config: Config,
    options: CommitSyncOptions = {},
  ) {
    this.logger = config.logger ?? Logger.createDefault(undefined, config.debug);
    this.createRepository = options.createRepository ?? ((repoPath, logger) => new GitService(repoPath, logger));
    this.confirmRemoval = options.confirmRemoval ?? createRemovalPrompt(this.logger);
  }

  async sync(): Promise<SyncResult> {
    const totalTimer = new Timer();
    const phaseTimer = new PhaseTimer();

    const syncRepo = this.createRepository(this.config.syncRepo, this.logger.child("sync"));
    await syncRepo.assertRepository();

    const lock = await acquireRunLock(await syncRepo.getGitDir());
    this.logger.debug(`Acquired lock ${lock.lockPath}`);

    let result: SyncResult;
    try {
      result = await this.runPipeline(syncRepo, phaseTimer);
    } finally {
      await lock.release();
    }

    this.logger.table(formatSummaryTable(result, totalTimer.stop(), phaseTimer.getResults()));
    return result;
  }

  private async runPipeline(syncRepo: CommitRepository, phaseTimer: PhaseTimer): Promise<SyncResult> {
    phaseTimer.startPhase(PHASES.READ_SOURCES);
    const sourceCommits = await this.readSourceCommits();
    phaseTimer.setPhaseCount(PHASES.READ_SOURCES, sourceCommits.length);

    phaseTimer.startPhase(PHASES.READ_SYNC);
    const syncedCommits = await collect(syncRepo.readSyncedCommits());
    phaseTimer.setPhaseCount(PHASES.READ_SYNC, syncedCommits.length);
    phaseTimer.endPhase();

    const plan = reconcile(sourceCommits, syncedCommits);
    this.logger.info(
      `${sourceCommits.length} source commit(s), ${plan.alreadySynced} already synced, ` +
        `${plan.toCreate.length} to create, ${plan.toRemove.length} orphaned.`,
    );

    const base = {
      sourceCommits: sourceCommits.length,
      alreadySynced: plan.alreadySynced,
      orphaned: plan.toRemove,
    };

    if (this.config.dryRun) {
      this.reportPlan(plan);
      return { ...base, status: "dry-run", created: [], removed: [] };
    }

    let removed: Commit[] = [];
    if (plan.toRemove.length > 0) {
      if (this.config.orphanPolicy === "abort") {
        throw new OrphanedCommitsError(plan.toRemove);
      }

      const confirmed = await this.confirmRemoval(await this.summarize(syncRepo, plan.toRemove));
      if (!confirmed) {
        this.logger.info("Removal declined. Nothing was changed.");
        return { ...base, status: "declined", created: [], removed: [] };
      }

      phaseTimer.startPhase(PHASES.REMOVE);
      removed = await this.removeOrphans(syncRepo, plan.toRemove);
      phaseTimer.setPhaseCount(PHASES.REMOVE, removed.length);
    }

    phaseTimer.startPhase(PHASES.CREATE);
    for (const commit of plan.toCreate) {
      await syncRepo.createMirrorCommit(commit);
      this.logger.debug(`Created mirror for ${describeCommit(commit)} at ${commit.timestamp}`);
    }
    phaseTimer.setPhaseCount(PHASES.CREATE, plan.toCreate.length);
    phaseTimer.endPhase();

    if (plan.toCreate.length > 0) {
      this.logger.info(`Created ${plan.toCreate.length} mirror commit(s).`);
    }

    return { ...base, status: "completed", created: plan.toCreate, removed };
  }

  private async readSourceCommits(): Promise<Commit[]> {
    const includeEmails: ReadonlySet<string> = new Set(this.config.includeEmails);
    const commits: Commit[] = [];

    for (const project of this.config.projects) {
      const repo = this.createRepository(project.gitRoot, this.logger.child(project.id));
      const projectCommits = await collect(repo.readSourceCommits(project.id, includeEmails));
      this.logger.debug(`${project.id}: ${projectCommits.length} commit(s) by included authors`);
      commits.push(...projectCommits);
    }

    return commits;
  }

  private async summarize(syncRepo: CommitRepository, orphans: Commit[]): Promise<string[]> {
    const summaries: string[] = [];
    for (const orphan of orphans) {
      summaries.push(
        orphan.syncTargetSha ? await syncRepo.summarizeCommit(orphan.syncTargetSha) : describeCommit(orphan),
      );
    }
    return summaries;
  }

  /**
   * Every rewrite changes the hashes of later commits, so the sync log is read
   * again before each drop and the orphan looked up by its key. Orphans that
   * are already gone (an earlier, interrupted run) are skipped.
   */
  private async removeOrphans(syncRepo: CommitRepository, orphans: Commit[]): Promise<Commit[]> {
    const removed: Commit[] = [];

    for (const orphan of orphans) {
      const current = indexByKey(await collect(syncRepo.readSyncedCommits())).get(commitKey(orphan));
      if (!current?.syncTargetSha) {
        this.logger.debug(`Mirror for ${describeCommit(orphan)} is already gone`);
        continue;
      }

      await syncRepo.dropCommit(current.syncTargetSha);
      this.logger.info(`Removed mirror for ${describeCommit(orphan)} (${current.syncTargetSha})`);
      removed.push(current);
    }

    return removed;
  }

  private reportPlan(plan: ReconcileResult): void {
    for (const commit of plan.toCreate) {
      this.logger.info(`[dry-run] would create mirror for ${describeCommit(commit)} at ${commit.timestamp}`);
    }
    for (const commit of plan.toRemove) {
      this.logger.warn(`[dry-run] orphaned mirror for ${describeCommit(commit)} (${commit.syncTargetSha ?? "?"})`);
    }
  }
}

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const collected: T[] = [];
  for await (const item of items) {
    collected.push(item);
  }
  return collected;
}
