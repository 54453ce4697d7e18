/**
 * Page and line layout commands with a LaTeX counterpart
 */

import { basename, extname } from "node:path";
import { unquote } from "../modules/directive-parser";
import type { CommandContext, CommandDefinition, Directive } from "../types";

function countArg(directive: Directive, ctx: CommandContext): number {
  const arg = directive.args[0];
  if (arg === undefined) return 1;
  if (!/^\d+$/.test(arg)) {
    ctx.warn("malformed-argument", `expected a line count, got "${arg}"`);
    return 1;
  }
  return parseInt(arg, 10);
}

function verticalSpace(directive: Directive, ctx: CommandContext): void {
  const count = countArg(directive, ctx);
  if (count > 0) {
    ctx.emit(`\\vspace{${count}\\baselineskip}`);
  }
}

export const page: CommandDefinition = {
  name: "PAGE",
  aliases: ["PG"],
  kind: "structural",
  maxArgs: 0,
  handler: (_directive, ctx) => ctx.emit("\\newpage"),
};

export const blank: CommandDefinition = {
  name: "BLANK",
  aliases: ["B"],
  kind: "structural",
  maxArgs: 1,
  handler: verticalSpace,
};

export const skip: CommandDefinition = {
  name: "SKIP",
  aliases: ["S"],
  kind: "structural",
  maxArgs: 1,
  handler: verticalSpace,
};

// `.P indent,skip,testpage` numbers are layout and are ignored
export const paragraph: CommandDefinition = {
  name: "PARAGRAPH",
  aliases: ["P"],
  kind: "structural",
  handler: (directive, ctx) => {
    const text = directive.args.filter((arg) => !/^[+-]?\d+$/.test(arg));
    if (text.length > 0) {
      ctx.warn(
        "malformed-argument",
        `unexpected text "${text.join(" ")}" after PARAGRAPH`,
      );
    }
    ctx.emit("");
  },
};

export const lineBreak: CommandDefinition = {
  name: "BREAK",
  aliases: ["BR"],
  kind: "structural",
  maxArgs: 0,
  handler: (_directive, ctx) => ctx.emit("\\par"),
};

export const centre: CommandDefinition = {
  name: "CENTRE",
  aliases: ["CENTER", "C"],
  kind: "text",
  handler: (directive, ctx) => {
    if (directive.text.length === 0) {
      ctx.warn("malformed-argument", "nothing to centre");
      return;
    }
    ctx.emit(`\\centerline{${ctx.translateText(directive.text)}}`);
  },
};

// `.REQ "file.rno"` pulls in another source file; its translation is expected beside ours
export const requireFile: CommandDefinition = {
  name: "REQUIRE",
  aliases: ["REQ"],
  kind: "structural",
  maxArgs: 1,
  handler: (directive, ctx) => {
    const arg = directive.args[0];
    if (arg === undefined) {
      ctx.warn("malformed-argument", "required file name missing");
      return;
    }
    const file = unquote(arg);
    ctx.emit(`\\input{${basename(file, extname(file))}}`);
  },
};
