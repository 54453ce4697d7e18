/**
 * Command table types
 */

import type { TranslationConfig } from "./config";
import type { BlockKind, CommandKind, Directive, DocumentState } from "./document";
import type { FlagDefinition } from "./inline";

/**
 * What a command handler may touch while it runs
 */
export interface CommandContext {
  state: DocumentState;
  config: TranslationConfig;
  flagDefaults: readonly FlagDefinition[];
  emit(line: string): void;
  // Runs text through the inline translator, threading the document latch
  translateText(text: string): string;
  // Processes text as if it were a text line of its own
  emitText(text: string): void;
  // Closes open bold/underline toggles and clears the case shift
  closeLatch(): void;
  // Closes the innermost open block of one of the kinds (and any block opened inside it)
  closeBlock(kinds: readonly BlockKind[]): boolean;
  warn(reason: "malformed-argument" | "unmatched-end", details: string): void;
}

export type CommandHandler = (directive: Directive, ctx: CommandContext) => void;

export interface CommandDefinition {
  // Canonical (long) name, upper case, words separated by one space
  name: string;
  aliases: readonly string[];
  kind: CommandKind;
  // Arguments past this count are reported as unexpected text
  maxArgs?: number;
  handler: CommandHandler;
}

/**
 * Lookup from every name and alias to its definition
 */
export type CommandTable = ReadonlyMap<string, CommandDefinition>;
