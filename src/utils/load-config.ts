import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { DownloaderConfig, PartialDownloaderConfig } from "../types";
import {
  DownloaderConfigSchema,
  PartialDownloaderConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (XDG base directories on Linux)
const paths = envPaths("ps-photo-fetch", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<DownloaderConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return DownloaderConfigSchema.parse(parsed);
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialDownloaderConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialDownloaderConfigSchema.parse(parsed);
}

/**
 * Deep merge a partial config over a full one
 */
export function mergeConfig(
  base: DownloaderConfig,
  override: PartialDownloaderConfig,
): DownloaderConfig {
  return {
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    download: {
      ...base.download,
      ...override.download,
      jitter: { ...base.download.jitter, ...override.download?.jitter },
    },
    transport: { ...base.transport, ...override.transport },
    columns: { ...base.columns, ...override.columns },
    logging: { ...base.logging, ...override.logging },
  };
}

export interface ConfigError {
  path: string;
  error: unknown;
}

interface LoadConfigResult {
  config: DownloaderConfig;
  errors: ConfigError[];
}

/**
 * Merge a config file over `config`, validating the result.
 * On failure the error is collected and `config` is returned unchanged.
 */
async function applyConfigFile(
  config: DownloaderConfig,
  configPath: string,
  errors: ConfigError[],
): Promise<DownloaderConfig> {
  try {
    const override = await loadPartialConfig(configPath);
    return DownloaderConfigSchema.parse(mergeConfig(config, override));
  } catch (error) {
    errors.push({ path: configPath, error });
    return config;
  }
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    config = await applyConfigFile(config, userConfigPath, errors);
  }

  if (custom) {
    config = await applyConfigFile(config, custom, errors);
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
