/**
 * Document model types - lines, directives and document state
 */

import type { FlagAssignment, InlineLatch } from "./inline";

// "header": the `+-` banner some sources carry on their first line
export type LineKind = "directive" | "text" | "header";

/**
 * One logical input line after normalization
 */
export interface InputLine {
  kind: LineKind;
  text: string;
  lineNumber: number;
  // Line started with a form feed (page eject in the source)
  pageBreak: boolean;
}

/**
 * Parsed representation of one command
 */
export interface Directive {
  // Canonical command name from the table, or the upper-cased token when unknown
  name: string;
  args: string[];
  // Raw argument text, used by text-bearing commands
  text: string;
  // Source spelling of this command, prefix included
  raw: string;
}

export interface ParsedDirectiveLine {
  directives: Directive[];
  // Text after a ";" that is not another command
  trailingText: string | null;
}

export type BlockKind = "itemize" | "enumerate" | "footnote" | "note";

export interface OpenBlock {
  kind: BlockKind;
  // Markup that closes this block
  close: string;
  openedAt: number;
}

export interface DocumentState {
  blocks: OpenBlock[];
  inLiteral: boolean;
  literalOpenedAt: number;
  inComment: boolean;
  commentOpenedAt: number;
  inAppendix: boolean;
  // Heading level waiting for its text on the next text line
  pendingHeading: number | null;
  flags: FlagAssignment;
  latch: InlineLatch;
  lineNumber: number;
}

export type CommandKind = "structural" | "text" | "ignored";
