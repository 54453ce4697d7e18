/**
 * Converter - Pipeline orchestrator
 * Coordinates reader, translator and writer with zero business logic
 */

import type { Writable } from "node:stream";
import type { ConverterConfig, ConversionContext, ProcessingStats } from "./types";
import type { TranslatorTables } from "./modules";
import * as modules from "./modules";
import { Logger, Tracker } from "./utils";

export class Converter {
  readonly ctx: ConversionContext;

  constructor(
    config: ConverterConfig,
    private readonly tables: TranslatorTables = {},
    options: { verbose?: boolean } = {},
  ) {
    this.ctx = {
      config,
      tracker: new Tracker(),
      logger: new Logger(options.verbose ? "debug" : config.logging.level),
      verbose: options.verbose,
    };
  }

  /**
   * Translate an in-memory document
   */
  convert(text: string): string {
    return modules.translateDocument(text, this.ctx, this.tables);
  }

  /**
   * Stream a source into a sink, one line at a time, and end the sink
   */
  async run(
    source: AsyncIterable<string | Buffer>,
    sink: Writable,
  ): Promise<ProcessingStats> {
    const lines = modules.readLines(source, this.ctx.config.input.encoding);
    await modules.writeLines(
      modules.translateStream(lines, this.ctx, this.tables),
      sink,
    );
    return this.ctx.tracker.getStats();
  }
}
