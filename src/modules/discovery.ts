/**
 * Discovery Module
 * Finds the photo-links CSV files that make up the run's batches
 */

import glob from "fast-glob";
import path from "node:path";
import type { BatchDescriptor, RunContext } from "../types";

/**
 * "1-Paschim Champaran-photo-links.csv" -> "1-Paschim Champaran"
 */
export function batchLabel(filename: string, suffix: string): string {
  return filename.endsWith(suffix)
    ? filename.slice(0, -suffix.length)
    : filename;
}

/**
 * List the batch files directly inside `inputDir`, sorted by file name
 */
export async function discoverBatches(
  inputDir: string,
  suffix: string,
): Promise<BatchDescriptor[]> {
  const files = await glob(`*${glob.escapePath(suffix)}`, {
    cwd: path.resolve(inputDir),
    absolute: true,
    onlyFiles: true,
    deep: 1,
  });

  return files
    .map((file) => ({
      label: batchLabel(path.basename(file), suffix),
      path: file,
    }))
    .sort((a, b) => {
      const nameA = path.basename(a.path);
      const nameB = path.basename(b.path);
      return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
    });
}

/**
 * Populates ctx.batches
 */
export async function discover(ctx: RunContext): Promise<void> {
  const { input } = ctx.config;
  ctx.batches = await discoverBatches(input.directory, input.suffix);
}
