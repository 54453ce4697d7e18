/**
 * Convert command - Loads config and runs the translation pipeline
 */

import { createReadStream, createWriteStream } from "node:fs";
import ora from "ora";
import { z } from "zod";
import { Converter } from "../../converter";
import { loadConfig } from "../../utils";
import * as modules from "../../modules";

const ConvertOptionsSchema = z.object({
  output: z.string().optional(),
  config: z.string().optional(),
  bodyOnly: z.boolean().optional(),
  stats: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

export async function convertCommand(
  input: string | undefined,
  opts: Options,
): Promise<void> {
  // The spinner shares the terminal with the document unless it goes to a file
  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isEnabled: opts.output !== undefined,
  }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.bodyOnly) {
      config.document = { ...config.document, standalone: false };
    }
    if (!config.logging.showProgress) {
      spinner.stop();
    }

    const converter = new Converter(config, {}, { verbose: options.verbose });

    // Add any config loading errors to tracker
    for (const err of errors) {
      converter.ctx.tracker.trackError(err.path, err.error);
      converter.ctx.logger.warn(`Ignoring config ${err.path}`);
    }

    const source = input ? createReadStream(input) : process.stdin;
    const sink = options.output
      ? createWriteStream(options.output, { encoding: "utf-8" })
      : process.stdout;

    spinner.text = "Translating...";
    await converter.run(source, sink);

    spinner.stop();

    if (options.verbose || options.output || options.stats) {
      await modules.stats(converter.ctx, options.stats);
    }
  } catch (error) {
    spinner.fail("Translation failed");
    console.error(error);
    process.exit(1);
  }
}
