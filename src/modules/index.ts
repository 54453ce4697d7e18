/**
 * Pipeline modules export
 */

export { readLines, splitLines, classifyLine } from "./reader";
export { parseDirectiveLine, isDirectiveLine, COMMAND_PREFIX } from "./directive-parser";
export { InlineTranslator } from "./inline-translator";
export { DirectiveInterpreter, createDocumentState } from "./interpreter";
export {
  translateLines,
  translateStream,
  translateDocument,
  createInterpreter,
  preamble,
} from "./translator";
export type { TranslatorTables } from "./translator";
export { writeLines } from "./writer";
export { stats } from "./stats";
