/**
 * Commands that are understood but have no LaTeX counterpart.
 * Margins, page geometry and fill/justify modes are left to the document class.
 */

import type { CommandDefinition } from "../types";

const IGNORED: Array<[name: string, aliases: string[]]> = [
  ["LEFT MARGIN", ["LM"]],
  ["RIGHT MARGIN", ["RM"]],
  ["PAGE SIZE", ["PS"]],
  ["JUSTIFY", ["J"]],
  ["NO JUSTIFY", ["NJ"]],
  ["FILL", ["F"]],
  ["NO FILL", ["NF"]],
  ["AUTOPARAGRAPH", ["AP"]],
  ["NO AUTOPARAGRAPH", ["NAP"]],
  ["AUTOJUSTIFY", ["AJ"]],
  ["NO AUTOJUSTIFY", ["NAJ"]],
  ["ENABLE BAR", ["EBB"]],
  ["DISABLE BAR", ["DBB"]],
  ["ENABLE BOLDING", ["EBO"]],
  ["DISABLE BOLDING", ["DBO"]],
  ["ENABLE UNDERLINING", ["EUN"]],
  ["DISABLE UNDERLINING", ["DUN"]],
  ["INDENT", ["I"]],
  ["SPACING", ["SP"]],
  ["NUMBER PAGE", ["NMPG"]],
  ["NO NUMBER", ["NNM"]],
];

export const ignoredCommands: CommandDefinition[] = IGNORED.map(
  ([name, aliases]): CommandDefinition => ({
    name,
    aliases,
    kind: "ignored",
    handler: () => {},
  }),
);
