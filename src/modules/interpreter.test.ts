import { describe, it, expect } from "vitest";
import { classifyLine } from "./reader";
import { createInterpreter } from "./translator";
import { createCommandTable, DEFAULT_COMMANDS } from "../commands";
import { createTestContext } from "../__tests__/utils";
import type { CommandDefinition } from "../types";

function setup(commands = createCommandTable(DEFAULT_COMMANDS)) {
  const ctx = createTestContext();
  const interpreter = createInterpreter(ctx, { commands });
  let lineNumber = 0;
  const feed = (text: string): string[] =>
    interpreter.process(classifyLine(text, ++lineNumber));
  return { ctx, interpreter, feed };
}

describe("DirectiveInterpreter", () => {
  it("returns the output of each line as it is processed", () => {
    const { interpreter, feed } = setup();

    expect(feed(".LS")).toEqual(["\\begin{itemize}"]);
    expect(interpreter.getState().blocks).toHaveLength(1);
    expect(feed(".LE;first")).toEqual(["\\item first"]);
    expect(feed(".ELS")).toEqual(["\\end{itemize}"]);
    expect(interpreter.getState().blocks).toHaveLength(0);
    expect(interpreter.finish()).toEqual([]);
  });

  it("closes open blocks innermost first at end of input", () => {
    const { ctx, interpreter, feed } = setup();
    feed(".LS");
    feed(".LE;a");
    feed(".NT");

    expect(interpreter.finish()).toEqual(["\\end{quote}", "\\end{itemize}"]);
    expect(ctx.tracker.getIssues("region")).toEqual([
      {
        type: "region",
        line: 3,
        reason: "unclosed-block",
        details: "note closed at end of input",
      },
      {
        type: "region",
        line: 1,
        reason: "unclosed-block",
        details: "itemize closed at end of input",
      },
    ]);
  });

  it("only ends a comment when the end command comes first", () => {
    const { interpreter, feed } = setup();
    feed(".COMMENT");

    expect(feed(".P;.END COMMENT")).toEqual([]);
    expect(interpreter.getState().inComment).toBe(true);
    expect(feed(".END COMMENT;after")).toEqual(["after"]);
    expect(interpreter.getState().inComment).toBe(false);
  });

  it("writes trailing text after an end of literal as text", () => {
    const { feed } = setup();
    feed(".LT");
    expect(feed(".EL;50%")).toEqual(["\\end{verbatim}", "50\\%"]);
  });

  it("keeps trailing text inside a literal opened on the same line", () => {
    const { feed } = setup();
    expect(feed(".LT;a % b")).toEqual(["\\begin{verbatim}", "a % b"]);
  });

  it("emits a heading left without text at end of input", () => {
    const { ctx, interpreter, feed } = setup();
    feed(".HL3");

    expect(interpreter.getState().pendingHeading).toBe(3);
    expect(interpreter.finish()).toEqual(["\\subsubsection{}"]);
    expect(ctx.tracker.getIssues()).toEqual([
      {
        type: "region",
        line: 1,
        reason: "pending-heading",
        details: "heading without text at end of input",
      },
    ]);
  });

  it("changes flags for the rest of the document only", () => {
    const { interpreter, feed } = setup();
    const before = interpreter.getState().flags;
    expect(feed("R&D")).toEqual(["R\\&D"]);
    feed(".FL UNDERLINE");

    expect(before.has("&")).toBe(false);
    expect(interpreter.getState().flags.get("&")).toBe("underline");
    expect(feed("R&D")).toEqual(["R\\underline{D}"]);
  });

  it("drops a file header banner", () => {
    const { ctx, feed } = setup();
    expect(feed("+- generated banner")).toEqual([]);
    expect(feed("+- not a banner here")).toEqual(["+- not a banner here"]);
    expect(ctx.tracker.getStats().commentLines).toBe(1);
  });

  it("runs commands added to the table", () => {
    const title: CommandDefinition = {
      name: "TITLE",
      aliases: ["T"],
      kind: "text",
      handler: (directive, ctx) =>
        ctx.emit(`\\title{${ctx.translateText(directive.text)}}`),
    };
    const { feed } = setup(createCommandTable([...DEFAULT_COMMANDS, title]));

    expect(feed(".T My 50%")).toEqual(["\\title{My 50\\%}"]);
  });

  it("counts output lines as they are flushed", () => {
    const { ctx, interpreter, feed } = setup();
    feed(".NT");
    feed("body");
    interpreter.finish();

    expect(ctx.tracker.getStats().outputLines).toBe(4);
  });
});
