import * as fs from "fs/promises";
import * as path from "path";

import { DEFAULT_CONFIG } from "../constants";
import { SyncLockedError } from "../errors";

export interface RunLock {
  readonly lockPath: string;
  release(): Promise<void>;
}

/**
 * Advisory lock for one run against a sync repository. Created exclusively,
 * so a second run sees the file and stops before touching anything.
 */
export async function acquireRunLock(
  gitDir: string,
  fileName: string = DEFAULT_CONFIG.LOCK_FILE_NAME,
): Promise<RunLock> {
  const lockPath = path.join(gitDir, fileName);

  let handle: fs.FileHandle;
  try {
    handle = await fs.open(lockPath, "wx");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      throw new SyncLockedError(lockPath);
    }
    throw error;
  }

  try {
    await handle.writeFile(`${process.pid}\n`);
  } finally {
    await handle.close();
  }

  return {
    lockPath,
    release: async () => {
      await fs.rm(lockPath, { force: true });
    },
  };
}
