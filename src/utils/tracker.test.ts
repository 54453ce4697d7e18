import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { z } from "zod";
import { Tracker } from "./tracker";

describe("Tracker", () => {
  it("sums line categories", () => {
    const tracker = new Tracker();
    tracker.countLine("text");
    tracker.countLine("text");
    tracker.countLine("directive");
    tracker.countLine("literal");
    tracker.countLine("comment");
    tracker.incrementOutput(3);
    tracker.incrementOutput();
    tracker.incrementIgnored();

    expect(tracker.getStats()).toMatchObject({
      totalLines: 5,
      textLines: 2,
      directiveLines: 1,
      literalLines: 1,
      commentLines: 1,
      outputLines: 4,
      ignoredDirectives: 1,
      unknownDirectives: 0,
    });
  });

  it("counts unknown directives from their issues", () => {
    const tracker = new Tracker();
    tracker.trackDirectiveIssue(1, "unknown-directive", ".XYZZY");
    tracker.trackDirectiveIssue(2, "unmatched-end", "end of list");
    tracker.trackRegionIssue(3, "unclosed-block", "note");

    expect(tracker.getStats().unknownDirectives).toBe(1);
    expect(tracker.getIssues("directive")).toHaveLength(2);
    expect(tracker.getIssues()).toHaveLength(3);
  });

  it("keeps details for a limited number of issues but counts them all", () => {
    const tracker = new Tracker(2);
    tracker.trackDirectiveIssue(1, "unknown-directive", ".A");
    tracker.trackDirectiveIssue(2, "unknown-directive", ".B");
    tracker.trackDirectiveIssue(3, "unknown-directive", ".C");
    tracker.trackRegionIssue(4, "unclosed-block", "note");

    expect(tracker.getIssues().map((i) => i.details)).toEqual([".A", ".B"]);
    expect(tracker.getStats()).toMatchObject({
      unknownDirectives: 3,
      issueCount: 4,
    });
  });

  describe("trackError", () => {
    it("maps schema errors", () => {
      const tracker = new Tracker();
      const result = z.object({ name: z.string() }).safeParse({});
      if (result.success) throw new Error("expected a validation failure");
      tracker.trackError("config.json", result.error);

      expect(tracker.getIssues("resource")).toEqual([
        {
          type: "resource",
          path: "config.json",
          reason: "schema-validation",
          details: "Required",
        },
      ]);
    });

    it("maps JSON syntax errors", () => {
      const tracker = new Tracker();
      tracker.trackError("config.json", new SyntaxError("Unexpected end"));
      expect(tracker.getIssues()[0]).toMatchObject({
        reason: "invalid-json",
        details: "Unexpected end",
      });
    });

    it("maps other errors and thrown values", () => {
      const tracker = new Tracker();
      tracker.trackError("a.json", new Error("EACCES"));
      tracker.trackError("b.json", "gone");
      expect(tracker.getIssues().map((i) => [i.reason, i.details])).toEqual([
        ["read-error", "EACCES"],
        ["read-error", "gone"],
      ]);
    });
  });

  describe("exportStats", () => {
    let dir: string | undefined;

    afterEach(async () => {
      if (dir) await rm(dir, { recursive: true, force: true });
    });

    it("writes the summary and grouped issues as JSON", async () => {
      dir = await mkdtemp(join(tmpdir(), "runoff2tex-stats-"));
      const path = join(dir, "stats.json");
      const tracker = new Tracker();
      tracker.countLine("directive");
      tracker.trackDirectiveIssue(1, "unknown-directive", ".XYZZY");

      await tracker.exportStats(path);
      const exported: unknown = JSON.parse(await readFile(path, "utf-8"));

      expect(exported).toMatchObject({
        summary: { totalLines: 1, directiveLines: 1, unknownDirectives: 1 },
        issues: {
          directive: {
            "unknown-directive": [
              {
                type: "directive",
                line: 1,
                reason: "unknown-directive",
                details: ".XYZZY",
              },
            ],
          },
          region: {},
          resource: {},
        },
      });
    });
  });
});
