/**
 * Literal blocks and comment regions
 */

import type { CommandDefinition } from "../types";

export const VERBATIM_BEGIN = "\\begin{verbatim}";
export const VERBATIM_END = "\\end{verbatim}";

/**
 * Keep a literal line from terminating the verbatim environment early
 */
export function protectLiteral(line: string): string {
  return line.split(VERBATIM_END).join("\\end {verbatim}");
}

export const literal: CommandDefinition = {
  name: "LITERAL",
  aliases: ["LT"],
  kind: "structural",
  maxArgs: 0,
  handler: (_directive, ctx) => {
    // Toggles cannot stay open across a verbatim environment
    ctx.closeLatch();
    ctx.emit(VERBATIM_BEGIN);
    ctx.state.inLiteral = true;
    ctx.state.literalOpenedAt = ctx.state.lineNumber;
  },
};

export const endLiteral: CommandDefinition = {
  name: "END LITERAL",
  aliases: ["EL"],
  kind: "structural",
  maxArgs: 0,
  handler: (_directive, ctx) => {
    if (!ctx.state.inLiteral) {
      ctx.warn("unmatched-end", "end of literal outside a literal block");
      return;
    }
    ctx.emit(VERBATIM_END);
    ctx.state.inLiteral = false;
  },
};

export const comment: CommandDefinition = {
  name: "COMMENT",
  aliases: [],
  kind: "structural",
  handler: (_directive, ctx) => {
    ctx.state.inComment = true;
    ctx.state.commentOpenedAt = ctx.state.lineNumber;
  },
};

export const endComment: CommandDefinition = {
  name: "END COMMENT",
  aliases: [],
  kind: "structural",
  maxArgs: 0,
  handler: (_directive, ctx) => {
    if (!ctx.state.inComment) {
      ctx.warn("unmatched-end", "end of comment outside a comment region");
      return;
    }
    ctx.state.inComment = false;
  },
};

// `.! remark`
export const lineComment: CommandDefinition = {
  name: "!",
  aliases: [],
  kind: "structural",
  handler: () => {},
};
