/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { writeFile } from "fs/promises";
import { ZodError } from "zod";

// ============================================================================
// Issue Types
// ============================================================================

export type IssueType = "directive" | "region" | "resource";

export type DirectiveIssueReason =
  | "unknown-directive"
  | "malformed-argument"
  | "unmatched-end";

export type RegionIssueReason =
  | "unterminated-literal"
  | "unterminated-comment"
  | "unclosed-block"
  | "pending-heading";

export type ResourceIssueReason =
  | "schema-validation"
  | "invalid-json"
  | "read-error";

export interface DirectiveIssue {
  type: "directive";
  line: number;
  reason: DirectiveIssueReason;
  details: string;
}

export interface RegionIssue {
  type: "region";
  line: number;
  reason: RegionIssueReason;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export type Issue = DirectiveIssue | RegionIssue | ResourceIssue;

export type LineCategory = "directive" | "text" | "literal" | "comment";

export interface ProcessingStats {
  totalLines: number;
  directiveLines: number;
  textLines: number;
  literalLines: number;
  commentLines: number;
  outputLines: number;
  ignoredDirectives: number;
  unknownDirectives: number;
  // Every issue seen, including those past the detail limit
  issueCount: number;
  issues: Issue[];
  duration: number;
}

// Issues kept with their details; past this only counts grow
const DEFAULT_ISSUE_LIMIT = 1000;

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private lines: Record<LineCategory, number> = {
    directive: 0,
    text: 0,
    literal: 0,
    comment: 0,
  };
  private outputLines = 0;
  private ignoredDirectives = 0;
  private unknownDirectives = 0;
  private issueCount = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  constructor(private readonly issueLimit: number = DEFAULT_ISSUE_LIMIT) {}

  // ============================================================================
  // Stat counters
  // ============================================================================

  countLine(category: LineCategory): void {
    this.lines[category]++;
  }

  incrementOutput(count = 1): void {
    this.outputLines += count;
  }

  incrementIgnored(): void {
    this.ignoredDirectives++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackDirectiveIssue(
    line: number,
    reason: DirectiveIssueReason,
    details: string,
  ): void {
    if (reason === "unknown-directive") {
      this.unknownDirectives++;
    }
    this.record({ type: "directive", line, reason, details });
  }

  trackRegionIssue(
    line: number,
    reason: RegionIssueReason,
    details: string,
  ): void {
    this.record({ type: "region", line, reason, details });
  }

  trackError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.record({ type: "resource", path, reason, details });
  }

  private record(issue: Issue): void {
    this.issueCount++;
    if (this.issues.length < this.issueLimit) {
      this.issues.push(issue);
    }
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      totalLines:
        this.lines.directive +
        this.lines.text +
        this.lines.literal +
        this.lines.comment,
      directiveLines: this.lines.directive,
      textLines: this.lines.text,
      literalLines: this.lines.literal,
      commentLines: this.lines.comment,
      outputLines: this.outputLines,
      ignoredDirectives: this.ignoredDirectives,
      unknownDirectives: this.unknownDirectives,
      issueCount: this.issueCount,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputPath: string): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        totalLines: stats.totalLines,
        directiveLines: stats.directiveLines,
        textLines: stats.textLines,
        literalLines: stats.literalLines,
        commentLines: stats.commentLines,
        outputLines: stats.outputLines,
        ignoredDirectives: stats.ignoredDirectives,
        unknownDirectives: stats.unknownDirectives,
        issueCount: stats.issueCount,
        duration: stats.duration,
      },
      issues: this.groupIssuesByTypeAndReason(),
    };

    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(): {
    directive: Record<string, DirectiveIssue[]>;
    region: Record<string, RegionIssue[]>;
    resource: Record<string, ResourceIssue[]>;
  } {
    const grouped: {
      directive: Record<string, DirectiveIssue[]>;
      region: Record<string, RegionIssue[]>;
      resource: Record<string, ResourceIssue[]>;
    } = {
      directive: {},
      region: {},
      resource: {},
    };

    for (const issue of this.issues) {
      switch (issue.type) {
        case "directive": {
          if (!grouped.directive[issue.reason]) {
            grouped.directive[issue.reason] = [];
          }
          grouped.directive[issue.reason].push(issue);
          break;
        }
        case "region": {
          if (!grouped.region[issue.reason]) {
            grouped.region[issue.reason] = [];
          }
          grouped.region[issue.reason].push(issue);
          break;
        }
        case "resource": {
          if (!grouped.resource[issue.reason]) {
            grouped.resource[issue.reason] = [];
          }
          grouped.resource[issue.reason].push(issue);
          break;
        }
      }
    }

    return grouped;
  }
}
