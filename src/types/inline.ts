/**
 * Inline flag and latch types
 */

/**
 * Case shift currently latched while scanning text
 */
export type CaseShift = "none" | "upper" | "lower";

/**
 * Latch state threaded between span translations.
 * Never mutated: every translation returns a new value.
 */
export interface InlineLatch {
  readonly shift: CaseShift;
  readonly bold: boolean;
  readonly underline: boolean;
}

export const NO_LATCH: InlineLatch = {
  shift: "none",
  bold: false,
  underline: false,
};

export type FlagRole =
  | "accept"
  | "uppercase"
  | "lowercase"
  | "bold"
  | "underline"
  | "space"
  | "capitalize";

export const FLAG_ROLES: readonly FlagRole[] = [
  "accept",
  "uppercase",
  "lowercase",
  "bold",
  "underline",
  "space",
  "capitalize",
];

export interface FlagDefinition {
  role: FlagRole;
  char: string;
  enabled: boolean;
}

/**
 * Active flag assignment: flag character -> role.
 * Only enabled flags appear here.
 */
export type FlagAssignment = ReadonlyMap<string, FlagRole>;

/**
 * Target-markup escape table: character -> replacement
 */
export type EscapeTable = ReadonlyMap<string, string>;

export interface SpanResult {
  text: string;
  latch: InlineLatch;
}
