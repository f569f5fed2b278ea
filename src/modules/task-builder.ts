/**
 * Task Builder
 * Turns the rows of one batch into download tasks with deterministic filenames
 */

import { join } from "node:path";
import type {
  BatchDescriptor,
  ColumnsConfig,
  DownloadTask,
  PhotoRecord,
} from "../types";
import { extractResourceId, sanitizeFilename } from "../utils";

export const IMAGE_EXTENSION = ".jpg";
export const STATION_TAG = "PS";

export const DEFAULT_COLUMNS: ColumnsConfig = {
  region: "AC No. & AC Name",
  station: "Polling Station No.",
  stationType: "Polling Station Type",
  photos: [
    { column: "Photo of Polling Station Building (PSB)", role: "PSB" },
    {
      column: "Photo of Polling Station Premises with PS Building (PSP)",
      role: "PSP",
    },
  ],
};

export interface PhotoNameParts {
  batchLabel: string;
  subRegion: string;
  station: string;
  stationType: string;
  role: string;
  resourceId: string;
}

/**
 * "4-Bagaha [1-Paschim Champaran]" -> "4-Bagaha"
 */
export function subRegionLabel(composite: string): string {
  // Whitespace before the bracket is an empty label, not a missing one
  const head = /^[^[]+/.exec(composite);
  return head ? sanitizeFilename(head[0].trim()) : "Unknown";
}

/**
 * "7" -> "007"; longer numbers are kept as they are
 */
export function padStation(station: string): string {
  return station.trim().padStart(3, "0");
}

/**
 * Build the photo filename:
 * {batch}-{subRegion}-PS{station}-{stationType}-{role}-{resourceId}.jpg
 */
export function photoFilename(parts: PhotoNameParts): string {
  return (
    [
      sanitizeFilename(parts.batchLabel),
      parts.subRegion,
      `${STATION_TAG}${parts.station}`,
      parts.stationType,
      parts.role,
      parts.resourceId,
    ].join("-") + IMAGE_EXTENSION
  );
}

/**
 * Build the ordered download tasks of one batch.
 *
 * Rows keep their input order and photo columns their declared order. Empty
 * photo cells and unrecognized links produce no task.
 */
export function buildTasks(
  batch: BatchDescriptor,
  records: readonly PhotoRecord[],
  outputDir: string,
  columns: ColumnsConfig = DEFAULT_COLUMNS,
): DownloadTask[] {
  const tasks: DownloadTask[] = [];
  const seen = new Set<string>();

  for (const record of records) {
    const subRegion = subRegionLabel(record.field(columns.region));
    const station = padStation(record.field(columns.station));
    const stationType = sanitizeFilename(
      record.field(columns.stationType).trim(),
    );

    for (const { column, role } of columns.photos) {
      const reference = record.field(column);
      if (reference.trim() === "") continue;

      const resourceId = extractResourceId(reference);
      if (!resourceId) continue;

      const destinationPath = join(
        outputDir,
        photoFilename({
          batchLabel: batch.label,
          subRegion,
          station,
          stationType,
          role,
          resourceId,
        }),
      );

      // The same photo listed twice would race on one file
      if (seen.has(destinationPath)) continue;
      seen.add(destinationPath);

      tasks.push(Object.freeze({ resourceId, destinationPath }));
    }
  }

  return tasks;
}
