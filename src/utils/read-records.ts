/**
 * CSV record source
 */

import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import type { PhotoRecord } from "../types";

/**
 * Wrap a parsed row so missing columns read as ""
 */
export function toRecord(row: Record<string, string | undefined>): PhotoRecord {
  return {
    field(name: string): string {
      return row[name] ?? "";
    },
  };
}

/**
 * Parse CSV text with a header row into records
 */
export function parseRecords(content: string): PhotoRecord[] {
  const rows: Record<string, string>[] = parse(content, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return rows.map(toRecord);
}

/**
 * Read a photo-links CSV file
 */
export async function readRecords(
  path: string,
  encoding: BufferEncoding = "utf-8",
): Promise<PhotoRecord[]> {
  const content = await readFile(path, encoding);
  return parseRecords(content);
}
