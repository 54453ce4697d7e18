import { describe, it, expect } from "vitest";
import { Readable } from "node:stream";
import { readLines } from "./reader";
import { translateStream } from "./translator";
import { createTestContext, translate } from "../__tests__/utils";

describe("translateDocument", () => {
  // ==========================================================================
  // Text lines
  // ==========================================================================
  describe("text lines", () => {
    it("escapes special characters exactly once", () => {
      expect(translate("Price: 5$ {approx} 100%").output).toBe(
        "Price: 5\\$ \\{approx\\} 100\\%\n",
      );
    });

    it("keeps blank lines as paragraph breaks", () => {
      expect(translate("one\n\ntwo").output).toBe("one\n\ntwo\n");
    });

    it("escapes flag characters that are not enabled", () => {
      expect(translate("file_name R&D #1 C:\\dir").output).toBe(
        "file\\_name R\\&D \\#1 C:\\textbackslash{}dir\n",
      );
    });

    it("skips a file header banner on the first line", () => {
      const { output, ctx } = translate("+-- manual.rno --+\nBody");
      expect(output).toBe("Body\n");
      expect(ctx.tracker.getStats()).toMatchObject({
        commentLines: 1,
        textLines: 1,
      });
    });

    it("writes a page break for a form feed", () => {
      expect(translate("\fNew page text").output).toBe(
        "\\newpage\nNew page text\n",
      );
    });
  });

  // ==========================================================================
  // Headings
  // ==========================================================================
  describe("headings", () => {
    it("wraps a level 1 heading in \\section", () => {
      expect(translate(".HL1 Overview").output).toBe("\\section{Overview}\n");
    });

    it("escapes heading text", () => {
      expect(translate(".HL2 100% {done}").output).toBe(
        "\\subsection{100\\% \\{done\\}}\n",
      );
    });

    it("escapes special characters in heading text", () => {
      expect(translate(".HL1 R&D_plan").output).toBe(
        "\\section{R\\&D\\_plan}\n",
      );
    });

    it("reads a level glued to the title", () => {
      const { output, ctx } = translate(".HL1Overview");
      expect(output).toBe("\\section{Overview}\n");
      expect(ctx.tracker.getIssues()).toEqual([]);
    });

    it("clamps deep levels", () => {
      expect(translate(".HL9 Deep").output).toBe("\\subparagraph{Deep}\n");
    });

    it("falls back to level 1 when the level is missing", () => {
      const { output, ctx } = translate(".HL Title");
      expect(output).toBe("\\section{Title}\n");
      expect(ctx.tracker.getIssues("directive")).toEqual([
        {
          type: "directive",
          line: 1,
          reason: "malformed-argument",
          details: 'heading level missing in "Title"',
        },
      ]);
    });

    it("takes heading text from the next non-blank line", () => {
      expect(translate(".HL2\n\nSetup steps").output).toBe(
        "\n\\subsection{Setup steps}\n",
      );
    });

    it("does not leak a latch out of heading text", () => {
      expect(translate(".HL1 ^^loud\nquiet").output).toBe(
        "\\section{LOUD}\nquiet\n",
      );
    });

    it("opens the appendix once", () => {
      expect(translate(".AX First\n.AX Second").output).toBe(
        "\\appendix\n\\section{First}\n\\section{Second}\n",
      );
    });
  });

  // ==========================================================================
  // Bold and underline commands
  // ==========================================================================
  describe("bold commands", () => {
    it("wraps text between .b1 and .b0 in \\textbf", () => {
      expect(translate(".b1\nWarning\n.b0").output).toBe(
        "\\textbf{\nWarning\n}\n",
      );
    });

    it("closes bold with the span when the latch is span scoped", () => {
      expect(translate(".b1\nWarning\n.b0", { latchScope: "span" }).output).toBe(
        "\\textbf{\nWarning}\n",
      );
    });

    it("closes bold on .b0 when the latch spans the document", () => {
      expect(
        translate(".b1\nWarning\n.b0", { latchScope: "document" }).output,
      ).toBe("\\textbf{\nWarning\n}\n");
    });

    it("bolds text glued to the toggles", () => {
      expect(translate(".b1Warning.b0").output).toBe(
        "\\textbf{\nWarning\n}\n",
      );
    });

    it("keeps text after a closing toggle", () => {
      expect(translate(".u1Note.u0 continues").output).toBe(
        "\\underline{\nNote\n}\n continues\n",
      );
    });

    it("closes toggles before a literal block at document scope", () => {
      const { output } = translate(".b1\nx\n.LT\ncode\n.EL", {
        latchScope: "document",
      });
      expect(output).toBe(
        "\\textbf{\nx\n}\n\\begin{verbatim}\ncode\n\\end{verbatim}\n",
      );
    });

    it("closes an unterminated literal before open toggles", () => {
      const { output } = translate(".LT\ncode", { latchScope: "document" });
      expect(output).toBe("\\begin{verbatim}\ncode\n\\end{verbatim}\n");
    });

    it("closes an unterminated underline at end of input", () => {
      expect(translate(".U1\nstressed").output).toBe(
        "\\underline{\nstressed\n}\n",
      );
    });
  });

  // ==========================================================================
  // Latch scope
  // ==========================================================================
  describe("latch scope", () => {
    const source = "^^shout\nstill\n.P\nquiet";

    it("threads the latch across text lines until a directive", () => {
      expect(translate(source).output).toBe("SHOUT\nSTILL\n\nquiet\n");
    });

    it("resets after every span", () => {
      expect(translate(source, { latchScope: "span" }).output).toBe(
        "SHOUT\nstill\n\nquiet\n",
      );
    });

    it("leaks through directives at document scope", () => {
      expect(translate(source, { latchScope: "document" }).output).toBe(
        "SHOUT\nSTILL\n\nQUIET\n",
      );
    });
  });

  // ==========================================================================
  // Literal blocks
  // ==========================================================================
  describe("literal blocks", () => {
    it("copies literal content unchanged", () => {
      const line = "  $x_1 & ^y% \\\\";
      expect(translate(`.LITERAL\n${line}\n.END LITERAL`).output).toBe(
        `\\begin{verbatim}\n${line}\n\\end{verbatim}\n`,
      );
    });

    it("keeps directive lines inside a literal block", () => {
      expect(translate(".LT\n.PAGE\n.EL").output).toBe(
        "\\begin{verbatim}\n.PAGE\n\\end{verbatim}\n",
      );
    });

    it("protects the closing sequence", () => {
      expect(translate(".LT\n\\end{verbatim}\n.EL").output).toBe(
        "\\begin{verbatim}\n\\end {verbatim}\n\\end{verbatim}\n",
      );
    });

    it("closes an unterminated literal block at end of input", () => {
      const { output, ctx } = translate(".LT\nx = {1};", {}, { standalone: true });
      expect(output).toBe(
        [
          "\\documentclass{article}",
          "\\begin{document}",
          "\\begin{verbatim}",
          "x = {1};",
          "\\end{verbatim}",
          "\\end{document}",
          "",
        ].join("\n"),
      );
      expect(ctx.tracker.getIssues("region")).toEqual([
        {
          type: "region",
          line: 1,
          reason: "unterminated-literal",
          details: "literal block closed at end of input",
        },
      ]);
    });
  });

  // ==========================================================================
  // Comments
  // ==========================================================================
  describe("comments", () => {
    it("drops a comment region", () => {
      expect(
        translate("before\n.comment\nhidden text\n.end comment\nafter").output,
      ).toBe("before\nafter\n");
    });

    it("drops a one-line comment", () => {
      expect(translate(".! remark\nkept").output).toBe("kept\n");
    });

    it("ends an unterminated comment quietly", () => {
      const { output, ctx } = translate("shown\n.COMMENT\nhidden");
      expect(output).toBe("shown\n");
      expect(ctx.tracker.getIssues("region")[0]).toMatchObject({
        reason: "unterminated-comment",
        line: 2,
      });
    });

    it("counts lines by category", () => {
      const { ctx } = translate("a\n.COMMENT\nb\nc\n.END COMMENT\n.LT\nd\n.EL");
      expect(ctx.tracker.getStats()).toMatchObject({
        totalLines: 8,
        textLines: 1,
        commentLines: 2,
        literalLines: 1,
        directiveLines: 4,
      });
    });
  });

  // ==========================================================================
  // Lists
  // ==========================================================================
  describe("lists", () => {
    it("translates a list", () => {
      expect(translate(".LS\n.LE;One\n.LE;Two\n.ELS").output).toBe(
        "\\begin{itemize}\n\\item One\n\\item Two\n\\end{itemize}\n",
      );
    });

    it("uses the configured default style", () => {
      expect(
        translate(".LS\n.LE;One\n.ELS", { defaultListStyle: "enumerate" }).output,
      ).toBe("\\begin{enumerate}\n\\item One\n\\end{enumerate}\n");
    });

    it("uses itemize when a bullet is given", () => {
      expect(
        translate('.LS "*"\n.ELS', { defaultListStyle: "enumerate" }).output,
      ).toBe("\\begin{itemize}\n\\end{itemize}\n");
    });

    it("nests lists", () => {
      expect(translate(".LS\n.LE;A\n.LS\n.LE;B\n.ELS\n.ELS").output).toBe(
        [
          "\\begin{itemize}",
          "\\item A",
          "\\begin{itemize}",
          "\\item B",
          "\\end{itemize}",
          "\\end{itemize}",
          "",
        ].join("\n"),
      );
    });

    it("treats unmatched list ends as no-ops", () => {
      const { output, ctx } = translate(".ELS\n.ELS\n.ELS\ntext");
      expect(output).toBe("text\n");
      expect(ctx.tracker.getIssues("directive")).toHaveLength(3);
    });

    it("opens a list for a stray element and closes it at the end", () => {
      const { output, ctx } = translate(".LE;Lonely");
      expect(output).toBe("\\begin{itemize}\n\\item Lonely\n\\end{itemize}\n");
      expect(ctx.tracker.getIssues().map((i) => i.reason)).toEqual([
        "unmatched-end",
        "unclosed-block",
      ]);
    });

    it("closes blocks opened inside a list", () => {
      expect(translate(".LS\n.LE;A\n.FN\nnote\n.ELS").output).toBe(
        "\\begin{itemize}\n\\item A\n\\footnote{\nnote\n}\n\\end{itemize}\n",
      );
    });
  });

  // ==========================================================================
  // Other commands
  // ==========================================================================
  describe("other commands", () => {
    it("emits a marker for unknown commands and carries on", () => {
      const { output, ctx } = translate(".XYZZY 3\nstill here");
      expect(output).toBe(
        "% runoff2tex: unsupported directive: .XYZZY 3\nstill here\n",
      );
      expect(ctx.tracker.getStats().unknownDirectives).toBe(1);
    });

    it("drops unknown commands when configured to", () => {
      expect(
        translate(".XYZZY 3\nstill here", { unknownDirectives: "drop" }).output,
      ).toBe("still here\n");
    });

    it("ignores layout commands without a LaTeX counterpart", () => {
      const { output, ctx } = translate(".LM 5\n.PS 60,70");
      expect(output).toBe("");
      expect(ctx.tracker.getStats().ignoredDirectives).toBe(2);
    });

    it("runs text after a structural command", () => {
      expect(translate(".P;Hello").output).toBe("\nHello\n");
    });

    it("translates footnotes", () => {
      expect(translate("Text\n.FN\nA note.\n.EFN").output).toBe(
        "Text\n\\footnote{\nA note.\n}\n",
      );
    });

    it("translates notes", () => {
      expect(translate(".NT\nCareful.\n.EN").output).toBe(
        "\\begin{quote}\n\\textbf{NOTE}\nCareful.\n\\end{quote}\n",
      );
    });

    it("centres text", () => {
      expect(translate(".C Title").output).toBe("\\centerline{Title}\n");
    });

    it("writes vertical space", () => {
      expect(translate(".B 2\n.S").output).toBe(
        "\\vspace{2\\baselineskip}\n\\vspace{1\\baselineskip}\n",
      );
    });

    it("falls back to one line for a bad count", () => {
      const { output, ctx } = translate(".B x");
      expect(output).toBe("\\vspace{1\\baselineskip}\n");
      expect(ctx.tracker.getIssues()[0]).toMatchObject({
        reason: "malformed-argument",
      });
    });

    it("turns a required file into \\input", () => {
      expect(translate('.REQ "chapter1.rno"').output).toBe(
        "\\input{chapter1}\n",
      );
    });

    it("writes a page break", () => {
      expect(translate(".PAGE").output).toBe("\\newpage\n");
    });

    it("reports text after commands that take none", () => {
      const { output, ctx } = translate(".PAGE Chapter two\n.LT some text\n.EL");
      expect(output).toBe("\\newpage\n\\begin{verbatim}\n\\end{verbatim}\n");
      expect(ctx.tracker.getIssues()).toEqual([
        {
          type: "directive",
          line: 1,
          reason: "malformed-argument",
          details: 'unexpected text "Chapter two" after PAGE',
        },
        {
          type: "directive",
          line: 2,
          reason: "malformed-argument",
          details: 'unexpected text "some text" after LITERAL',
        },
      ]);
    });

    it("accepts numeric paragraph arguments but reports text", () => {
      const { output, ctx } = translate(".P -5,1\n.P Intro");
      expect(output).toBe("\n\n");
      expect(ctx.tracker.getIssues().map((i) => i.details)).toEqual([
        'unexpected text "Intro" after PARAGRAPH',
      ]);
    });
  });

  // ==========================================================================
  // Flags
  // ==========================================================================
  describe("flag commands", () => {
    it("enables bold", () => {
      expect(
        translate(".FL BOLD\n.FL LOWERCASE\n^*Bold\\*").output,
      ).toBe("\\textbf{Bold}\n");
    });

    it("enables every flag", () => {
      expect(translate(".FL ALL\n_&#x").output).toBe("\\&~x\n");
    });

    it("switches underline on for later lines only", () => {
      expect(translate("R&D\n.FL UNDERLINE\nR&D").output).toBe(
        "R\\&D\nR\\underline{D}\n",
      );
    });

    it("moves a flag to another character", () => {
      expect(translate(".FL BOLD +\n+x").output).toBe("\\textbf{x}\n");
    });

    it("disables a flag", () => {
      expect(translate(".NFL UPPERCASE\n^^x").output).toBe(
        "\\textasciicircum{}\\textasciicircum{}x\n",
      );
    });

    it("disables every flag", () => {
      expect(translate(".NFL ALL\n_&#").output).toBe("\\_\\&\\#\n");
    });

    it("reports an unknown flag name", () => {
      const { ctx } = translate(".FL SPARKLE");
      expect(ctx.tracker.getIssues()[0]).toMatchObject({
        reason: "malformed-argument",
        details: 'unknown flag "SPARKLE"',
      });
    });
  });

  // ==========================================================================
  // Document wrapper
  // ==========================================================================
  describe("document wrapper", () => {
    it("writes the preamble with packages", () => {
      const { output } = translate(
        "Body",
        {},
        { standalone: true, documentClass: "report", packages: ["graphicx"] },
      );
      expect(output).toBe(
        [
          "\\documentclass{report}",
          "\\usepackage{graphicx}",
          "\\begin{document}",
          "Body",
          "\\end{document}",
          "",
        ].join("\n"),
      );
    });

    it("produces nothing for empty body-only input", () => {
      expect(translate("").output).toBe("");
    });
  });
});

describe("translateStream", () => {
  it("translates lines from a stream", async () => {
    const ctx = createTestContext();
    const source = Readable.from([".HL1 Intro\n", "Hello_ world\n"]);
    const out: string[] = [];
    for await (const line of translateStream(readLines(source), ctx)) {
      out.push(line);
    }
    expect(out).toEqual(["\\section{Intro}", "Hello\\_ world"]);
  });
});
