/**
 * FLAGS / NO FLAGS: switch inline flag characters on and off
 *
 * `.FL BOLD` enables bold with its default character, `.FL BOLD +`
 * moves it to "+", `.NFL UPPERCASE` turns "^" back into plain text.
 * `ALL` applies to every flag.
 */

import { unquote } from "../modules/directive-parser";
import { charForRole, disableFlag, enableFlag } from "../tables";
import { FLAG_ROLES } from "../types";
import type {
  CommandContext,
  CommandDefinition,
  Directive,
  FlagRole,
} from "../types";

function isFlagRole(name: string): name is FlagRole {
  return FLAG_ROLES.some((role) => role === name);
}

function readRoles(
  directive: Directive,
  ctx: CommandContext,
): FlagRole[] | null {
  const name = directive.args[0]?.toLowerCase();
  if (name === undefined) {
    ctx.warn("malformed-argument", "flag name missing");
    return null;
  }
  if (name === "all") {
    return [...FLAG_ROLES];
  }
  if (!isFlagRole(name)) {
    ctx.warn("malformed-argument", `unknown flag "${directive.args[0]}"`);
    return null;
  }
  return [name];
}

function defaultChar(ctx: CommandContext, role: FlagRole): string | undefined {
  return ctx.flagDefaults.find((def) => def.role === role)?.char;
}

export const flags: CommandDefinition = {
  name: "FLAGS",
  aliases: ["FL"],
  kind: "structural",
  maxArgs: 2,
  handler: (directive, ctx) => {
    const roles = readRoles(directive, ctx);
    if (!roles) return;

    const given = directive.args[1];
    const requested =
      roles.length === 1 && given !== undefined ? unquote(given) : undefined;

    for (const role of roles) {
      const char =
        requested?.charAt(0) ||
        charForRole(ctx.state.flags, role) ||
        defaultChar(ctx, role);
      if (!char) continue;
      ctx.state.flags = enableFlag(ctx.state.flags, role, char);
    }
  },
};

export const noFlags: CommandDefinition = {
  name: "NO FLAGS",
  aliases: ["NFL"],
  kind: "structural",
  maxArgs: 1,
  handler: (directive, ctx) => {
    const roles = readRoles(directive, ctx);
    if (!roles) return;

    for (const role of roles) {
      ctx.state.flags = disableFlag(ctx.state.flags, role);
    }
  },
};
