/**
 * Translator Module
 * Composes reader output, interpreter and document wrapper into one
 * lazy sequence of LaTeX lines
 */

import { DirectiveInterpreter } from "./interpreter";
import { splitLines } from "./reader";
import { defaultCommandTable } from "../commands";
import { DEFAULT_FLAGS, LATEX_ESCAPES } from "../tables";
import type {
  CommandTable,
  ConversionContext,
  DocumentConfig,
  EscapeTable,
  FlagDefinition,
  InputLine,
} from "../types";

/**
 * Tables the engine is built from. Defaults are the compiled-in RUNOFF/LaTeX tables.
 */
export interface TranslatorTables {
  commands?: CommandTable;
  escapes?: EscapeTable;
  flags?: readonly FlagDefinition[];
}

export function createInterpreter(
  ctx: ConversionContext,
  tables: TranslatorTables = {},
): DirectiveInterpreter {
  return new DirectiveInterpreter({
    commands: tables.commands ?? defaultCommandTable,
    escapes: tables.escapes ?? LATEX_ESCAPES,
    flags: tables.flags ?? DEFAULT_FLAGS,
    config: ctx.config.translation,
    tracker: ctx.tracker,
    logger: ctx.logger,
  });
}

export function preamble(config: DocumentConfig): string[] {
  return [
    `\\documentclass{${config.documentClass}}`,
    ...config.packages.map((pkg) => `\\usepackage{${pkg}}`),
    "\\begin{document}",
  ];
}

export const POSTAMBLE = "\\end{document}";

/**
 * Translate a sequence of input lines. Output is produced as input is consumed.
 */
export function* translateLines(
  lines: Iterable<InputLine>,
  ctx: ConversionContext,
  tables: TranslatorTables = {},
): Generator<string> {
  const { document } = ctx.config;
  const interpreter = createInterpreter(ctx, tables);

  if (document.standalone) {
    const head = preamble(document);
    ctx.tracker.incrementOutput(head.length);
    yield* head;
  }

  for (const line of lines) {
    yield* interpreter.process(line);
  }
  yield* interpreter.finish();

  if (document.standalone) {
    ctx.tracker.incrementOutput();
    yield POSTAMBLE;
  }
}

/**
 * Async counterpart of `translateLines` for stream sources
 */
export async function* translateStream(
  lines: AsyncIterable<InputLine>,
  ctx: ConversionContext,
  tables: TranslatorTables = {},
): AsyncGenerator<string> {
  const { document } = ctx.config;
  const interpreter = createInterpreter(ctx, tables);

  if (document.standalone) {
    const head = preamble(document);
    ctx.tracker.incrementOutput(head.length);
    yield* head;
  }

  for await (const line of lines) {
    yield* interpreter.process(line);
  }
  yield* interpreter.finish();

  if (document.standalone) {
    ctx.tracker.incrementOutput();
    yield POSTAMBLE;
  }
}

/**
 * Translate a whole in-memory document
 */
export function translateDocument(
  text: string,
  ctx: ConversionContext,
  tables: TranslatorTables = {},
): string {
  const out = Array.from(translateLines(splitLines(text), ctx, tables));
  return out.length > 0 ? `${out.join("\n")}\n` : "";
}
