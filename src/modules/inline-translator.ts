/**
 * Inline Translator
 * Scans a text span one character at a time, applies RUNOFF flag
 * sequences and escapes everything LaTeX would otherwise interpret.
 *
 * The translator holds no state between calls: the latch goes in with the
 * span and comes back out with the result, so the caller decides where it
 * is reset (see `translation.latchScope`).
 */

import { escapeText } from "../tables";
import { NO_LATCH } from "../types";
import type {
  CaseShift,
  EscapeTable,
  FlagAssignment,
  FlagRole,
  InlineLatch,
  SpanResult,
} from "../types";

const BOLD_OPEN = "\\textbf{";
const UNDERLINE_OPEN = "\\underline{";
const REQUIRED_SPACE = "~";

function shiftCase(ch: string, shift: CaseShift): string {
  switch (shift) {
    case "upper":
      return ch.toUpperCase();
    case "lower":
      return ch.toLowerCase();
    case "none":
      return ch;
  }
}

export class InlineTranslator {
  constructor(private readonly escapes: EscapeTable) {}

  /**
   * Translate one span of text
   */
  translate(
    span: string,
    latch: InlineLatch,
    flags: FlagAssignment,
  ): SpanResult {
    const chars = Array.from(span);
    let { shift, bold, underline } = latch;
    let out = "";
    let i = 0;

    const plain = (ch: string): string =>
      escapeText(shiftCase(ch, shift), this.escapes);

    while (i < chars.length) {
      const ch = chars[i];
      const role = flags.get(ch);

      if (role === undefined) {
        out += plain(ch);
        i++;
        continue;
      }

      const next: string | undefined = chars[i + 1];
      const nextRole: FlagRole | undefined =
        next === undefined ? undefined : flags.get(next);
      // Next character exists and is ordinary text
      const nextIsText = next !== undefined && nextRole === undefined;

      switch (role) {
        case "accept": {
          if (next === undefined) {
            out += plain(ch);
            i++;
          } else {
            out += escapeText(next, this.escapes);
            i += 2;
          }
          break;
        }

        case "uppercase": {
          if (nextRole === "uppercase") {
            shift = "upper";
          } else if (nextRole === "lowercase") {
            shift = "none";
          } else if (nextRole === "bold") {
            if (!bold) out += BOLD_OPEN;
            bold = true;
          } else if (nextRole === "underline") {
            if (!underline) out += UNDERLINE_OPEN;
            underline = true;
          } else if (nextIsText) {
            out += escapeText(next.toUpperCase(), this.escapes);
          } else {
            out += plain(ch);
            i++;
            break;
          }
          i += 2;
          break;
        }

        case "lowercase": {
          if (nextRole === "lowercase") {
            shift = "lower";
          } else if (nextRole === "uppercase") {
            shift = "none";
          } else if (nextRole === "bold") {
            if (bold) out += "}";
            bold = false;
          } else if (nextRole === "underline") {
            if (underline) out += "}";
            underline = false;
          } else if (nextIsText) {
            out += escapeText(next.toLowerCase(), this.escapes);
          } else {
            out += plain(ch);
            i++;
            break;
          }
          i += 2;
          break;
        }

        case "bold":
        case "underline": {
          if (nextIsText) {
            const open = role === "bold" ? BOLD_OPEN : UNDERLINE_OPEN;
            out += `${open}${plain(next)}}`;
            i += 2;
          } else {
            out += plain(ch);
            i++;
          }
          break;
        }

        case "space": {
          out += REQUIRED_SPACE;
          i++;
          break;
        }

        case "capitalize": {
          let word = "";
          let j = i + 1;
          while (
            j < chars.length &&
            !/\s/.test(chars[j]) &&
            !flags.has(chars[j])
          ) {
            word += chars[j];
            j++;
          }
          if (word.length === 0) {
            out += plain(ch);
            i++;
          } else {
            out += escapeText(word.toUpperCase(), this.escapes);
            i = j;
          }
          break;
        }
      }
    }

    return { text: out, latch: { shift, bold, underline } };
  }

  /**
   * Close whatever the latch still has open and return it to "no latch"
   */
  close(latch: InlineLatch): SpanResult {
    const open = (latch.bold ? 1 : 0) + (latch.underline ? 1 : 0);
    return { text: "}".repeat(open), latch: NO_LATCH };
  }
}
