/**
 * Directive Parser
 * Turns a directive line into one or more parsed commands.
 *
 * Syntax: `.NAME args`, several commands chained with `;`
 * (`.B;.LE;item text`). Names are case-insensitive and may be spelled
 * in full (`.HEADER LEVEL 2 Title`) or abbreviated (`.HL2 Title`).
 */

import type {
  CommandTable,
  Directive,
  ParsedDirectiveLine,
} from "../types";

export const COMMAND_PREFIX = ".";

// Longest multi-word command name in the table ("NO AUTOPARAGRAPH" etc.)
const MAX_NAME_WORDS = 3;

const ARG_PATTERN = /"[^"]*"|'[^']*'|[^\s,]+/g;

/**
 * Index of the first `;` outside quotes, or -1
 */
function findSeparator(text: string): number {
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === ";") {
      return i;
    }
  }
  return -1;
}

/**
 * Split an argument segment on whitespace and commas, keeping quoted strings whole
 */
export function splitArgs(segment: string): string[] {
  return segment.match(ARG_PATTERN) ?? [];
}

/**
 * Remove one pair of surrounding quotes, if present
 */
export function unquote(arg: string): string {
  const match = arg.match(/^(["'])(.*)\1$/);
  return match ? match[2] : arg;
}

interface CommandName {
  name: string;
  // Characters of the body consumed by the name
  length: number;
  // Digits glued to an abbreviated name that is not itself a command (`.HL1`)
  digits: string;
  known: boolean;
}

function readCommandName(body: string, table: CommandTable): CommandName {
  if (body.startsWith("!")) {
    return { name: "!", length: 1, digits: "", known: table.has("!") };
  }

  const head = body.match(/^([A-Za-z]+)(\d*)/);
  if (!head) {
    return { name: "", length: 0, digits: "", known: false };
  }

  const word = head[1].toUpperCase();
  const digits = head[2];

  if (digits) {
    const whole = word + digits;
    if (table.has(whole)) {
      return { name: whole, length: head[0].length, digits: "", known: true };
    }
    return {
      name: word,
      length: head[0].length,
      digits,
      known: table.has(word),
    };
  }

  // Greedy match of multi-word names: "END LITERAL", "HEADER LEVEL"
  let best: CommandName = {
    name: word,
    length: head[0].length,
    digits: "",
    known: table.has(word),
  };
  let candidate = word;
  let consumed = head[0].length;
  const wordPattern = /^[ \t]+([A-Za-z]+)/;

  for (let n = 1; n < MAX_NAME_WORDS; n++) {
    const next = body.slice(consumed).match(wordPattern);
    if (!next) break;
    candidate = `${candidate} ${next[1].toUpperCase()}`;
    consumed += next[0].length;
    if (table.has(candidate)) {
      best = { name: candidate, length: consumed, digits: "", known: true };
    }
  }

  return best;
}

/**
 * Parse a single command from the text after its prefix.
 * Returns the remainder after a `;` separator, or null when the line ends.
 */
function parseCommand(
  body: string,
  table: CommandTable,
): { directive: Directive; remainder: string | null } {
  const head = readCommandName(body, table);
  const definition = head.known ? table.get(head.name) : undefined;
  const name = definition?.name ?? head.name;
  const afterName = head.digits + body.slice(head.length);

  // Text-bearing commands own the rest of the line
  if (definition?.kind === "text" || name === "!") {
    const text = afterName.replace(/^[ \t;]+/, "").trimEnd();
    return {
      directive: {
        name,
        args: splitArgs(text),
        text,
        raw: `${COMMAND_PREFIX}${body.trimEnd()}`,
      },
      remainder: null,
    };
  }

  const separator = findSeparator(afterName);
  const segment = separator === -1 ? afterName : afterName.slice(0, separator);
  const remainder = separator === -1 ? null : afterName.slice(separator + 1);
  const rawLength = body.length - (remainder === null ? 0 : remainder.length + 1);

  return {
    directive: {
      name,
      args: splitArgs(segment),
      text: segment.trim(),
      raw: `${COMMAND_PREFIX}${body.slice(0, rawLength).trimEnd()}`,
    },
    remainder,
  };
}

/**
 * Parse a directive line into its commands and any trailing text
 */
export function parseDirectiveLine(
  line: string,
  table: CommandTable,
): ParsedDirectiveLine {
  const directives: Directive[] = [];
  let rest = line.trimStart();

  while (rest.startsWith(COMMAND_PREFIX)) {
    const { directive, remainder } = parseCommand(
      rest.slice(COMMAND_PREFIX.length),
      table,
    );
    directives.push(directive);

    if (remainder === null) {
      return { directives, trailingText: null };
    }

    const next = remainder.trimStart();
    if (!next.startsWith(COMMAND_PREFIX)) {
      return {
        directives,
        trailingText: next.length > 0 ? next : null,
      };
    }
    rest = next;
  }

  return { directives, trailingText: null };
}

/**
 * True when the first non-whitespace character is the command prefix
 */
export function isDirectiveLine(line: string): boolean {
  return line.trimStart().startsWith(COMMAND_PREFIX);
}
