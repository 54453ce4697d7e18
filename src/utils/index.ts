/**
 * Utility exports
 */

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export type { ConfigError } from "./load-config";

// Classes
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
export { Tracker } from "./tracker";
