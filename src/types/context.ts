/**
 * Conversion context - flows through the entire pipeline
 */

import type { ConverterConfig } from "./config";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  DirectiveIssue,
  RegionIssue,
  ResourceIssue,
  DirectiveIssueReason,
  RegionIssueReason,
  ResourceIssueReason,
  LineCategory,
  ProcessingStats,
} from "../utils/tracker";

export interface ConversionContext {
  config: ConverterConfig;

  // Unified tracking for stats and issues
  tracker: Tracker;

  logger: Logger;

  verbose?: boolean;
}
