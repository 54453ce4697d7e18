/**
 * Default inline flag characters
 *
 * Only the uppercase flag is live until `.FLAGS` switches the others on;
 * until then their characters are ordinary text.
 */

import type { FlagAssignment, FlagDefinition, FlagRole } from "../types";

export const DEFAULT_FLAGS: readonly FlagDefinition[] = [
  { role: "accept", char: "_", enabled: false },
  { role: "uppercase", char: "^", enabled: true },
  { role: "lowercase", char: "\\", enabled: false },
  { role: "underline", char: "&", enabled: false },
  { role: "space", char: "#", enabled: false },
  { role: "bold", char: "*", enabled: false },
  { role: "capitalize", char: "<", enabled: false },
];

/**
 * Build the active char -> role map from flag definitions
 */
export function createFlagAssignment(
  definitions: readonly FlagDefinition[],
): FlagAssignment {
  const assignment = new Map<string, FlagRole>();
  for (const def of definitions) {
    if (def.enabled) {
      assignment.set(def.char, def.role);
    }
  }
  return assignment;
}

/**
 * Find the character currently assigned to a role
 */
export function charForRole(
  flags: FlagAssignment,
  role: FlagRole,
): string | undefined {
  for (const [char, assigned] of flags) {
    if (assigned === role) return char;
  }
  return undefined;
}

/**
 * Enable a flag, optionally on a new character.
 * Returns a new assignment; the input is left untouched.
 */
export function enableFlag(
  flags: FlagAssignment,
  role: FlagRole,
  char: string,
): FlagAssignment {
  const next = new Map(flags);
  for (const [existing, assigned] of flags) {
    if (assigned === role) next.delete(existing);
  }
  next.set(char, role);
  return next;
}

/**
 * Disable a flag. Returns a new assignment.
 */
export function disableFlag(
  flags: FlagAssignment,
  role: FlagRole,
): FlagAssignment {
  const next = new Map(flags);
  for (const [existing, assigned] of flags) {
    if (assigned === role) next.delete(existing);
  }
  return next;
}
