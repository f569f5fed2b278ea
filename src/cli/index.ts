#!/usr/bin/env node

/**
 * CLI entry point for the polling station photo downloader
 */

import { Command } from "commander";
import { downloadCommand } from "./commands/download";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("ps-photo-fetch")
  .description(
    "Download polling station photos linked from photo-links CSV files",
  )
  .version("0.1.0");

// Main download command (default action)
program
  .option("-i, --input <path>", "Directory containing *-photo-links.csv files")
  .option("-o, --output <path>", "Output directory for photos")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-w, --workers <count>", "Parallel downloads per batch")
  .option("-r, --retries <count>", "Attempts per photo")
  .option("-t, --transport <kind>", "Download transport: gdown or http")
  .option("--dry-run", "List the photos that would be downloaded")
  .option("-v, --verbose", "Verbose output")
  .action(downloadCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
