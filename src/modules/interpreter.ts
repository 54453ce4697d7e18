/**
 * Directive Interpreter
 * Owns the document state for one run. Text lines go through the inline
 * translator, directive lines are dispatched through the command table,
 * and literal/comment regions short-circuit both.
 */

import { InlineTranslator } from "./inline-translator";
import { parseDirectiveLine } from "./directive-parser";
import { emitHeading, protectLiteral, VERBATIM_END } from "../commands";
import { endComment, endLiteral } from "../commands/regions";
import { createFlagAssignment } from "../tables";
import { NO_LATCH } from "../types";
import type {
  BlockKind,
  CommandContext,
  CommandTable,
  Directive,
  DocumentState,
  EscapeTable,
  FlagAssignment,
  FlagDefinition,
  InputLine,
  TranslationConfig,
} from "../types";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

export interface InterpreterOptions {
  commands: CommandTable;
  escapes: EscapeTable;
  flags: readonly FlagDefinition[];
  config: TranslationConfig;
  tracker: Tracker;
  logger: Logger;
}

export function createDocumentState(flags: FlagAssignment): DocumentState {
  return {
    blocks: [],
    inLiteral: false,
    literalOpenedAt: 0,
    inComment: false,
    commentOpenedAt: 0,
    inAppendix: false,
    pendingHeading: null,
    flags,
    latch: NO_LATCH,
    lineNumber: 0,
  };
}

export class DirectiveInterpreter {
  private readonly state: DocumentState;
  private readonly inline: InlineTranslator;
  private readonly ctx: CommandContext;
  private output: string[] = [];

  constructor(private readonly options: InterpreterOptions) {
    this.state = createDocumentState(createFlagAssignment(options.flags));
    this.inline = new InlineTranslator(options.escapes);
    this.ctx = {
      state: this.state,
      config: options.config,
      flagDefaults: options.flags,
      emit: (line) => this.emit(line),
      translateText: (text) => this.translateArgument(text),
      emitText: (text) => this.processText(text),
      closeLatch: () => this.resetLatch(),
      closeBlock: (kinds) => this.closeBlock(kinds),
      warn: (reason, details) => {
        options.tracker.trackDirectiveIssue(this.state.lineNumber, reason, details);
        options.logger.debug(`line ${this.state.lineNumber}: ${details}`);
      },
    };
  }

  getState(): Readonly<DocumentState> {
    return this.state;
  }

  /**
   * Process one input line and return the output lines it produced
   */
  process(line: InputLine): string[] {
    const { tracker } = this.options;
    this.state.lineNumber = line.lineNumber;

    if (line.kind === "header") {
      tracker.countLine("comment");
      return this.flush();
    }

    if (this.state.inLiteral) {
      if (!this.runIfFirst(line, endLiteral.name)) {
        tracker.countLine("literal");
        this.emit(protectLiteral(line.pageBreak ? `\f${line.text}` : line.text));
      }
      return this.flush();
    }

    if (this.state.inComment) {
      if (!this.runIfFirst(line, endComment.name)) {
        tracker.countLine("comment");
      }
      return this.flush();
    }

    if (line.pageBreak) {
      this.emit("\\newpage");
    }

    if (line.kind === "directive") {
      tracker.countLine("directive");
      this.processDirectiveLine(line.text);
    } else {
      tracker.countLine("text");
      this.processText(line.text);
    }

    return this.flush();
  }

  /**
   * End of input: close whatever is still open
   */
  finish(): string[] {
    const { tracker } = this.options;

    if (this.state.inLiteral) {
      tracker.trackRegionIssue(
        this.state.literalOpenedAt,
        "unterminated-literal",
        "literal block closed at end of input",
      );
      this.emit(VERBATIM_END);
      this.state.inLiteral = false;
    }

    this.resetLatch();

    if (this.state.inComment) {
      tracker.trackRegionIssue(
        this.state.commentOpenedAt,
        "unterminated-comment",
        "comment region closed at end of input",
      );
      this.state.inComment = false;
    }

    let block = this.state.blocks.pop();
    while (block) {
      tracker.trackRegionIssue(
        block.openedAt,
        "unclosed-block",
        `${block.kind} closed at end of input`,
      );
      this.emit(block.close);
      block = this.state.blocks.pop();
    }

    if (this.state.pendingHeading !== null) {
      tracker.trackRegionIssue(
        this.state.lineNumber,
        "pending-heading",
        "heading without text at end of input",
      );
      const level = this.state.pendingHeading;
      this.state.pendingHeading = null;
      emitHeading(this.ctx, level, "");
    }

    return this.flush();
  }

  // ============================================================================
  // Lines
  // ============================================================================

  /**
   * Inside a region only one command is live. Run the line if it starts
   * with that command; report whether it did.
   */
  private runIfFirst(line: InputLine, name: string): boolean {
    if (line.kind !== "directive") return false;
    const parsed = parseDirectiveLine(line.text, this.options.commands);
    if (parsed.directives[0]?.name !== name) return false;

    this.options.tracker.countLine("directive");
    this.runDirectives(parsed.directives, parsed.trailingText);
    return true;
  }

  private processDirectiveLine(text: string): void {
    const parsed = parseDirectiveLine(text, this.options.commands);
    this.runDirectives(parsed.directives, parsed.trailingText);
  }

  private runDirectives(
    directives: Directive[],
    trailingText: string | null,
  ): void {
    for (const directive of directives) {
      if (this.options.config.latchScope === "directive") {
        this.resetLatch();
      }
      this.dispatch(directive);
    }

    if (trailingText === null) return;

    // The text after `;` lands wherever the commands left us
    if (this.state.inLiteral) {
      this.emit(protectLiteral(trailingText));
    } else if (!this.state.inComment) {
      this.processText(trailingText);
    }
  }

  private processText(text: string): void {
    if (this.state.pendingHeading !== null && text.trim().length > 0) {
      const level = this.state.pendingHeading;
      this.state.pendingHeading = null;
      emitHeading(this.ctx, level, text);
      return;
    }

    const result = this.inline.translate(text, this.state.latch, this.state.flags);
    if (this.options.config.latchScope === "span") {
      const closed = this.inline.close(result.latch);
      this.emit(result.text + closed.text);
      this.state.latch = closed.latch;
    } else {
      this.emit(result.text);
      this.state.latch = result.latch;
    }
  }

  // ============================================================================
  // Directives
  // ============================================================================

  private dispatch(directive: Directive): void {
    const { commands, tracker, logger, config } = this.options;
    const definition = commands.get(directive.name);

    if (!definition) {
      tracker.trackDirectiveIssue(
        this.state.lineNumber,
        "unknown-directive",
        directive.raw,
      );
      logger.debug(
        `line ${this.state.lineNumber}: unsupported directive ${directive.raw}`,
      );
      if (config.unknownDirectives === "comment") {
        this.emit(`% runoff2tex: unsupported directive: ${directive.raw}`);
      }
      return;
    }

    if (definition.kind === "ignored") {
      tracker.incrementIgnored();
    }
    if (
      definition.maxArgs !== undefined &&
      directive.args.length > definition.maxArgs
    ) {
      const extra = directive.args.slice(definition.maxArgs).join(" ");
      this.ctx.warn(
        "malformed-argument",
        `unexpected text "${extra}" after ${definition.name}`,
      );
    }
    definition.handler(directive, this.ctx);
  }

  /**
   * Directive arguments are complete LaTeX arguments, so open toggles are
   * closed inside them unless the latch is allowed to leak
   */
  private translateArgument(text: string): string {
    const result = this.inline.translate(text, this.state.latch, this.state.flags);
    if (this.options.config.latchScope === "document") {
      this.state.latch = result.latch;
      return result.text;
    }
    const closed = this.inline.close(result.latch);
    this.state.latch = closed.latch;
    return result.text + closed.text;
  }

  private resetLatch(): void {
    const closed = this.inline.close(this.state.latch);
    if (closed.text.length > 0) {
      this.emit(closed.text);
    }
    this.state.latch = closed.latch;
  }

  private closeBlock(kinds: readonly BlockKind[]): boolean {
    const { blocks } = this.state;
    let index = blocks.length - 1;
    while (index >= 0 && !kinds.includes(blocks[index].kind)) {
      index--;
    }
    if (index < 0) return false;

    while (blocks.length > index + 1) {
      const inner = blocks.pop();
      if (!inner) break;
      this.options.tracker.trackRegionIssue(
        inner.openedAt,
        "unclosed-block",
        `${inner.kind} closed by an enclosing end`,
      );
      this.emit(inner.close);
    }

    const target = blocks.pop();
    if (target) {
      this.emit(target.close);
    }
    return true;
  }

  // ============================================================================
  // Output
  // ============================================================================

  private emit(line: string): void {
    this.output.push(line);
  }

  private flush(): string[] {
    const lines = this.output;
    this.output = [];
    this.options.tracker.incrementOutput(lines.length);
    return lines;
  }
}
