/**
 * Central type exports
 */

// Configuration
export type {
  ConverterConfig,
  PartialConverterConfig,
  InputConfig,
  DocumentConfig,
  TranslationConfig,
  LoggingConfig,
} from "./config";
export {
  ConverterConfigSchema,
  PartialConverterConfigSchema,
} from "./config";

// Document model
export type {
  LineKind,
  InputLine,
  Directive,
  ParsedDirectiveLine,
  BlockKind,
  OpenBlock,
  DocumentState,
  CommandKind,
} from "./document";

// Inline flags
export type {
  CaseShift,
  InlineLatch,
  FlagRole,
  FlagDefinition,
  FlagAssignment,
  EscapeTable,
  SpanResult,
} from "./inline";
export { NO_LATCH, FLAG_ROLES } from "./inline";

// Commands
export type {
  CommandContext,
  CommandHandler,
  CommandDefinition,
  CommandTable,
} from "./commands";

// Context
export type {
  ConversionContext,
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
} from "./context";

