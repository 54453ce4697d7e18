/**
 * Lists: LIST, LIST ELEMENT, END LIST
 */

import type { BlockKind, CommandContext, CommandDefinition } from "../types";

export const LIST_KINDS: readonly BlockKind[] = ["itemize", "enumerate"];

function openList(ctx: CommandContext, kind: "itemize" | "enumerate"): void {
  ctx.emit(`\\begin{${kind}}`);
  ctx.state.blocks.push({
    kind,
    close: `\\end{${kind}}`,
    openedAt: ctx.state.lineNumber,
  });
}

/**
 * Number of lists currently open
 */
export function listDepth(ctx: CommandContext): number {
  return ctx.state.blocks.filter((b) => LIST_KINDS.includes(b.kind)).length;
}

export const list: CommandDefinition = {
  name: "LIST",
  aliases: ["LS"],
  kind: "structural",
  handler: (directive, ctx) => {
    // `.LS n,"c"`: n is vertical spacing, "c" the bullet character
    let bulleted = false;
    for (const arg of directive.args) {
      if (/^["'].*["']$/.test(arg)) {
        bulleted = true;
      } else if (!/^[+-]?\d+$/.test(arg)) {
        ctx.warn("malformed-argument", `unexpected list argument "${arg}"`);
      }
    }
    openList(ctx, bulleted ? "itemize" : ctx.config.defaultListStyle);
  },
};

export const listElement: CommandDefinition = {
  name: "LIST ELEMENT",
  aliases: ["LE"],
  kind: "text",
  handler: (directive, ctx) => {
    if (listDepth(ctx) === 0) {
      ctx.warn("unmatched-end", "list element outside a list");
      openList(ctx, ctx.config.defaultListStyle);
    }
    const text = directive.text;
    ctx.emit(text.length > 0 ? `\\item ${ctx.translateText(text)}` : "\\item");
  },
};

export const endList: CommandDefinition = {
  name: "END LIST",
  aliases: ["ELS"],
  kind: "structural",
  maxArgs: 0,
  handler: (_directive, ctx) => {
    if (!ctx.closeBlock(LIST_KINDS)) {
      ctx.warn("unmatched-end", "end of list without an open list");
    }
  },
};
