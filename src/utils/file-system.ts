/**
 * Filesystem Utilities
 * The probes the fetcher needs, behind an interface so tests can swap them
 */

import { access, stat, rm } from "fs/promises";
import { constants } from "node:fs";

export interface FileSystem {
  exists(path: string): Promise<boolean>;
  size(path: string): Promise<number>;
  remove(path: string): Promise<void>;
}

/**
 * Check if a file or directory exists
 *
 * @param path - Path to check
 * @returns True if file/directory exists, false otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export const nodeFileSystem: FileSystem = {
  exists: fileExists,

  async size(path: string): Promise<number> {
    const stats = await stat(path);
    return stats.size;
  },

  async remove(path: string): Promise<void> {
    await rm(path, { force: true });
  },
};
