/**
 * LaTeX escape table
 * Characters with syntactic meaning in LaTeX and the text that prints them
 */

import type { EscapeTable } from "../types";

export const LATEX_ESCAPES: EscapeTable = new Map([
  ["\\", "\\textbackslash{}"],
  ["{", "\\{"],
  ["}", "\\}"],
  ["%", "\\%"],
  ["&", "\\&"],
  ["_", "\\_"],
  ["#", "\\#"],
  ["$", "\\$"],
  ["~", "\\textasciitilde{}"],
  ["^", "\\textasciicircum{}"],
  ["<", "\\textless{}"],
  [">", "\\textgreater{}"],
]);

/**
 * Escape every character of `text` exactly once
 */
export function escapeText(text: string, escapes: EscapeTable): string {
  let out = "";
  for (const ch of text) {
    out += escapes.get(ch) ?? ch;
  }
  return out;
}
