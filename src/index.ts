#!/usr/bin/env node

import { ConfigLoaderService } from "./services/config-loader.service";
import { CommitSyncService } from "./services/commit-sync.service";
import { Logger } from "./services/logger.service";
import { parseArguments } from "./utils/cli";

async function main(): Promise<void> {
  const options = parseArguments();
  const logger = Logger.createDefault(undefined, options.debug);

  const config = await new ConfigLoaderService().load(options.config, {
    orphanPolicy: options.orphanPolicy,
    dryRun: options.dryRun,
    debug: options.debug,
    logger,
  });

  logger.info(`Syncing ${config.projects.length} project(s) into "${config.syncRepo}"...`);

  const result = await new CommitSyncService(config).sync();

  if (result.status === "declined") {
    logger.info("No changes made.");
  } else if (result.status === "completed") {
    logger.info(`✅ Done: ${result.created.length} created, ${result.removed.length} removed.`);
  }
}

main().catch((error) => {
  Logger.createDefault().error("❌ Sync failed:", error);
  process.exit(1);
});
