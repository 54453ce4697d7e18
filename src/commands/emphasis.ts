/**
 * Bold and underline toggles given as commands (`.B1` ... `.B0`)
 * These share the inline latch with the `^*` / `\*` flag sequences.
 *
 * Text glued to a toggle is inline content, and further toggles may be
 * embedded in it: `.b1Warning.b0` bolds "Warning".
 */

import type { CommandContext, CommandDefinition } from "../types";

type Style = "bold" | "underline";

const OPEN: Record<Style, string> = {
  bold: "\\textbf{",
  underline: "\\underline{",
};

function toggle(ctx: CommandContext, style: Style, on: boolean): void {
  if (ctx.state.latch[style] === on) return;
  ctx.emit(on ? OPEN[style] : "}");
  ctx.state.latch =
    style === "bold"
      ? { ...ctx.state.latch, bold: on }
      : { ...ctx.state.latch, underline: on };
}

function runInline(text: string, ctx: CommandContext): void {
  const embedded = /\.([BU])([01])/gi;
  let last = 0;
  let match: RegExpExecArray | null;

  while ((match = embedded.exec(text)) !== null) {
    const before = text.slice(last, match.index);
    if (before.length > 0) ctx.emitText(before);
    const style = match[1].toUpperCase() === "B" ? "bold" : "underline";
    toggle(ctx, style, match[2] === "1");
    last = match.index + match[0].length;
  }

  const rest = text.slice(last);
  if (rest.length > 0) ctx.emitText(rest);
}

function emphasis(name: string, style: Style, on: boolean): CommandDefinition {
  return {
    name,
    aliases: [],
    kind: "structural",
    handler: (directive, ctx) => {
      toggle(ctx, style, on);
      runInline(directive.text, ctx);
    },
  };
}

export const boldOn = emphasis("B1", "bold", true);
export const boldOff = emphasis("B0", "bold", false);
export const underlineOn = emphasis("U1", "underline", true);
export const underlineOff = emphasis("U0", "underline", false);
