/**
 * Command Table
 * Builds the immutable name -> definition lookup handed to the interpreter
 */

import { headerLevel, appendix } from "./headings";
import { list, listElement, endList } from "./lists";
import { literal, endLiteral, comment, endComment, lineComment } from "./regions";
import { footnote, endFootnote, note, endNote } from "./blocks";
import {
  page,
  blank,
  skip,
  paragraph,
  lineBreak,
  centre,
  requireFile,
} from "./layout";
import { boldOn, boldOff, underlineOn, underlineOff } from "./emphasis";
import { flags, noFlags } from "./flags";
import { ignoredCommands } from "./ignored";
import type { CommandDefinition, CommandTable } from "../types";

export { emitHeading, headingCommand, HEADING_COMMANDS } from "./headings";
export { listDepth, LIST_KINDS } from "./lists";
export { protectLiteral, VERBATIM_BEGIN, VERBATIM_END } from "./regions";

export const DEFAULT_COMMANDS: readonly CommandDefinition[] = [
  headerLevel,
  appendix,
  centre,
  list,
  listElement,
  endList,
  literal,
  endLiteral,
  comment,
  endComment,
  lineComment,
  footnote,
  endFootnote,
  note,
  endNote,
  page,
  blank,
  skip,
  paragraph,
  lineBreak,
  requireFile,
  boldOn,
  boldOff,
  underlineOn,
  underlineOff,
  flags,
  noFlags,
  ...ignoredCommands,
];

/**
 * Index definitions under their canonical name and every alias.
 * Later definitions win on a clash, so a caller can extend the defaults.
 */
export function createCommandTable(
  definitions: readonly CommandDefinition[],
): CommandTable {
  const table = new Map<string, CommandDefinition>();
  for (const definition of definitions) {
    table.set(definition.name.toUpperCase(), definition);
    for (const alias of definition.aliases) {
      table.set(alias.toUpperCase(), definition);
    }
  }
  return table;
}

export const defaultCommandTable: CommandTable =
  createCommandTable(DEFAULT_COMMANDS);
