/**
 * Headings: HEADER LEVEL and APPENDIX
 *
 * `.HL n text` maps level n onto the LaTeX sectioning commands. When the
 * text is missing the level is held until the next non-blank text line.
 */

import type { CommandContext, CommandDefinition } from "../types";

export const HEADING_COMMANDS = [
  "section",
  "subsection",
  "subsubsection",
  "paragraph",
  "subparagraph",
] as const;

const DEFAULT_LEVEL = 1;

export function headingCommand(level: number): string {
  const index = Math.min(Math.max(level, 1), HEADING_COMMANDS.length) - 1;
  return HEADING_COMMANDS[index];
}

/**
 * Emit a heading, running its text through the inline translator
 */
export function emitHeading(
  ctx: CommandContext,
  level: number,
  title: string,
): void {
  ctx.emit(`\\${headingCommand(level)}{${ctx.translateText(title.trim())}}`);
}

/**
 * Split "2 Title" into level and title.
 * A missing or non-numeric level falls back to level 1 and keeps the whole text.
 */
export function parseHeadingArgs(
  text: string,
  ctx: CommandContext,
): { level: number; title: string } {
  const match = text.match(/^(\d+)(?:[\s,;]*(.*))?$/);
  if (!match) {
    ctx.warn("malformed-argument", `heading level missing in "${text}"`);
    return { level: DEFAULT_LEVEL, title: text };
  }

  const level = parseInt(match[1], 10);
  const title = match[2] ?? "";
  if (level < 1) {
    ctx.warn("malformed-argument", `heading level ${level} out of range`);
    return { level: DEFAULT_LEVEL, title };
  }
  return { level, title };
}

export const headerLevel: CommandDefinition = {
  name: "HEADER LEVEL",
  aliases: ["HL"],
  kind: "text",
  handler: (directive, ctx) => {
    const { level, title } = parseHeadingArgs(directive.text, ctx);
    if (title.trim().length === 0) {
      ctx.state.pendingHeading = level;
      return;
    }
    emitHeading(ctx, level, title);
  },
};

export const appendix: CommandDefinition = {
  name: "APPENDIX",
  aliases: ["AX"],
  kind: "text",
  handler: (directive, ctx) => {
    if (!ctx.state.inAppendix) {
      ctx.emit("\\appendix");
      ctx.state.inAppendix = true;
    }
    if (directive.text.length === 0) {
      ctx.state.pendingHeading = DEFAULT_LEVEL;
      return;
    }
    emitHeading(ctx, DEFAULT_LEVEL, directive.text);
  },
};
