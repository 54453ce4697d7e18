export { LATEX_ESCAPES, escapeText } from "./escapes";
export {
  DEFAULT_FLAGS,
  createFlagAssignment,
  charForRole,
  enableFlag,
  disableFlag,
} from "./flags";
