/**
 * Footnotes and notes
 */

import type { CommandDefinition } from "../types";

export const footnote: CommandDefinition = {
  name: "FOOTNOTE",
  aliases: ["FN"],
  kind: "structural",
  maxArgs: 0,
  handler: (_directive, ctx) => {
    ctx.emit("\\footnote{");
    ctx.state.blocks.push({
      kind: "footnote",
      close: "}",
      openedAt: ctx.state.lineNumber,
    });
  },
};

export const endFootnote: CommandDefinition = {
  name: "END FOOTNOTE",
  aliases: ["EFN"],
  kind: "structural",
  maxArgs: 0,
  handler: (_directive, ctx) => {
    if (!ctx.closeBlock(["footnote"])) {
      ctx.warn("unmatched-end", "end of footnote without an open footnote");
    }
  },
};

export const note: CommandDefinition = {
  name: "NOTE",
  aliases: ["NT"],
  kind: "text",
  handler: (directive, ctx) => {
    const title =
      directive.text.length > 0 ? ctx.translateText(directive.text) : "NOTE";
    ctx.emit("\\begin{quote}");
    ctx.emit(`\\textbf{${title}}`);
    ctx.state.blocks.push({
      kind: "note",
      close: "\\end{quote}",
      openedAt: ctx.state.lineNumber,
    });
  },
};

export const endNote: CommandDefinition = {
  name: "END NOTE",
  aliases: ["EN"],
  kind: "structural",
  maxArgs: 0,
  handler: (_directive, ctx) => {
    if (!ctx.closeBlock(["note"])) {
      ctx.warn("unmatched-end", "end of note without an open note");
    }
  },
};
