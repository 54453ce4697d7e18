import { describe, it, expect } from "vitest";
import { escapeText, LATEX_ESCAPES } from "./escapes";

describe("escapeText", () => {
  it("leaves ordinary prose untouched", () => {
    expect(escapeText("Hello, world.", LATEX_ESCAPES)).toBe("Hello, world.");
  });

  it("escapes every LaTeX special character", () => {
    expect(escapeText("100% & $5 #1 ~ ^ {x}", LATEX_ESCAPES)).toBe(
      "100\\% \\& \\$5 \\#1 \\textasciitilde{} \\textasciicircum{} \\{x\\}",
    );
  });

  it("escapes angle brackets", () => {
    expect(escapeText("<tag>", LATEX_ESCAPES)).toBe(
      "\\textless{}tag\\textgreater{}",
    );
  });

  it("does not re-escape the braces of its own replacements", () => {
    expect(escapeText("\\", LATEX_ESCAPES)).toBe("\\textbackslash{}");
    expect(escapeText("a_b\\c", LATEX_ESCAPES)).toBe("a\\_b\\textbackslash{}c");
  });

  it("uses whatever table it is given", () => {
    const table = new Map([["*", "\\ast{}"]]);
    expect(escapeText("a*b%", table)).toBe("a\\ast{}b%");
  });
});
