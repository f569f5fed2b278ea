/**
 * Download command - Loads config and runs the download pipeline
 */

import ora from "ora";
import { z } from "zod";
import {
  loadConfig,
  nodeFileSystem,
  OutputChannel,
  RunTracker,
} from "../../utils";
import { createTransport } from "../../transports";
import * as modules from "../../modules";
import type { RunContext } from "../../types";

const DownloadOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  workers: z.coerce.number().int().positive().optional(),
  retries: z.coerce.number().int().positive().optional(),
  transport: z.enum(["gdown", "http"]).optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof DownloadOptionsSchema>;

export async function downloadCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = DownloadOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.input) config.input.directory = options.input;
    if (options.output) config.output.directory = options.output;
    if (options.workers) config.download.workers = options.workers;
    if (options.retries) config.download.retries = options.retries;
    if (options.transport) config.transport.kind = options.transport;

    const tracker = new RunTracker();
    for (const err of errors) {
      tracker.trackError(err.path, err.error);
    }

    const output = new OutputChannel({
      level: options.verbose ? "debug" : config.logging.level,
    });
    const transport = createTransport(config.transport.kind);

    if (!options.dryRun) {
      spinner.text = `Checking ${transport.name}...`;
      await transport.ensureAvailable((message) => {
        spinner.text = message;
      });
    }

    const ctx: RunContext = {
      config,
      transport,
      fs: nodeFileSystem,
      output,
      tracker,
      dryRun: options.dryRun,
      verbose: options.verbose,
    };

    spinner.text = "Scanning batches...";
    await modules.discover(ctx);
    spinner.succeed(`Found ${ctx.batches?.length ?? 0} photo-links CSV files`);

    await modules.runBatches(ctx);
    await output.flush();

    await modules.stats(ctx);

    if (ctx.summary && ctx.summary.total.errors > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Download failed");
    console.error(error);
    process.exit(1);
  }
}
