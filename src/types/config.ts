/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  directory: z.string(),
  // Batch files are "<label><suffix>", e.g. "1-Paschim Champaran-photo-links.csv"
  suffix: z.string().min(1),
  encoding: z.enum(["utf-8", "utf8", "latin1", "ascii", "utf16le"]),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
});

const JitterShape = z.object({
  min: z.number().nonnegative(), // In milliseconds
  max: z.number().nonnegative(),
});

export const JitterConfigSchema = JitterShape.refine(
  (jitter) => jitter.min <= jitter.max,
  { message: "jitter.min must not exceed jitter.max" },
);

const DownloadShape = z.object({
  workers: z.number().int().positive(),
  retries: z.number().int().positive(),
  timeout: z.number().int().positive(), // In milliseconds
});

export const DownloadConfigSchema = DownloadShape.extend({
  jitter: JitterConfigSchema,
});

export const TransportConfigSchema = z.object({
  kind: z.enum(["gdown", "http"]),
});

export const PhotoColumnSchema = z.object({
  column: z.string(),
  // Short photo-role code written into the filename (e.g. "PSB")
  role: z.string().min(1),
});

export const ColumnsConfigSchema = z.object({
  region: z.string(),
  station: z.string(),
  stationType: z.string(),
  photos: z.array(PhotoColumnSchema),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const DownloaderConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  download: DownloadConfigSchema,
  transport: TransportConfigSchema,
  columns: ColumnsConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialDownloaderConfigSchema = DownloaderConfigSchema.partial()
  .extend({
    input: InputConfigSchema.partial().optional(),
    output: OutputConfigSchema.partial().optional(),
    download: DownloadShape.extend({ jitter: JitterShape.partial() })
      .partial()
      .optional(),
    transport: TransportConfigSchema.partial().optional(),
    columns: ColumnsConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type JitterConfig = z.infer<typeof JitterConfigSchema>;
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type TransportConfig = z.infer<typeof TransportConfigSchema>;
export type TransportKind = TransportConfig["kind"];
export type PhotoColumn = z.infer<typeof PhotoColumnSchema>;
export type ColumnsConfig = z.infer<typeof ColumnsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type DownloaderConfig = z.infer<typeof DownloaderConfigSchema>;
export type PartialDownloaderConfig = z.infer<
  typeof PartialDownloaderConfigSchema
>;
