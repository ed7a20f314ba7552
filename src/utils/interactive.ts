import { input } from "@inquirer/prompts";

import { DEFAULT_CONFIG } from "../constants";

import type { Logger } from "../services/logger.service";

export type ConfirmFn = (summaries: string[]) => Promise<boolean>;

/**
 * Lists the mirror commits about to be removed and asks the operator. Only an
 * exact `y` counts as yes.
 */
export function createRemovalPrompt(logger: Logger): ConfirmFn {
  return async (summaries) => {
    logger.info("The following mirror commits no longer exist in any source:");
    for (const summary of summaries) {
      logger.info(`  ${summary}`);
    }

    const answer = await input({
      message: `Remove ${summaries.length} commit(s) from the sync repository history? [y/N]`,
      default: "",
    });

    return answer === DEFAULT_CONFIG.CONFIRM_ANSWER;
  };
}
