import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { errorMessage, log } from "./log";

/**
 * Runs `fn` with a fresh directory under `root` and removes the directory
 * once `fn` settles, whether it resolved or threw.
 */
export const withTempDir = async <T>(
  prefix: string,
  fn: (dir: string) => Promise<T>,
  root: string = os.tmpdir(),
): Promise<T> => {
  const dir = await fs.mkdtemp(path.join(root, prefix));
  try {
    return await fn(dir);
  } finally {
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (err) {
      log.warn("temp dir cleanup failed", { dir, err: errorMessage(err) });
    }
  }
};

export const pathExists = async (p: string): Promise<boolean> => {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
};
