import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { ORPHAN_POLICIES } from "../constants";
import { isOrphanPolicy } from "../services/config-loader.service";

import type { OrphanPolicy } from "../types";

export interface CliOptions {
  config: string;
  orphanPolicy?: OrphanPolicy;
  dryRun: boolean;
  debug: boolean;
}

export function parseArguments(args: string[] = hideBin(process.argv)): CliOptions {
  const argv = yargs(args)
    .scriptName("commit-mirror")
    .command("$0 <config>", "Mirror commits from the configured projects into the sync repository", (builder) =>
      builder.positional("config", {
        type: "string",
        demandOption: true,
        description: "Path to the YAML or JSON config file",
      }),
    )
    .option("orphan-policy", {
      type: "string",
      choices: ORPHAN_POLICIES,
      description: "What to do with mirror commits whose original is gone (overrides the config file)",
    })
    .option("dry-run", {
      type: "boolean",
      description: "Report what would be created or removed without touching the sync repository.",
      default: false,
    })
    .option("debug", {
      type: "boolean",
      description: "Print every git command and per-commit details.",
      default: false,
    })
    .strict()
    .help()
    .alias("help", "h")
    .parseSync();

  const policy = argv["orphan-policy"];

  return {
    config: argv.config,
    orphanPolicy: isOrphanPolicy(policy) ? policy : undefined,
    dryRun: argv["dry-run"],
    debug: argv.debug,
  };
}
