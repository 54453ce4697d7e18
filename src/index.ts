/**
 * Library entry point
 */

export { Converter } from "./converter";
export * from "./modules";
export {
  createCommandTable,
  defaultCommandTable,
  DEFAULT_COMMANDS,
} from "./commands";
export { LATEX_ESCAPES, DEFAULT_FLAGS, escapeText } from "./tables";
export { loadConfig, loadDefaultConfig, Logger, Tracker } from "./utils";
export * from "./types";
