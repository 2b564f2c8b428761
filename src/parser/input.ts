/**
 * Source cursor for the recursive-descent parser.
 *
 * Tracks the current offset, skips whitespace and ordinary comments, and
 * records the furthest failure seen so that a parse which backtracks
 * through several alternatives still reports the most useful position.
 *
 * @packageDocumentation
 */

import { versionErrorMessage } from '../metadata/version.js';
import type { Version, VersionedFeature } from '../metadata/types.js';
import {
  failure,
  success,
  type ParseDiagnostic,
  type Result,
  type SourcePosition,
} from '../errors/types.js';

/**
 * Thrown inside the parser when a rule fails. Never escapes a public
 * entry point: {@link Input.run} converts it into a `ParseError` result.
 */
export class ParseFailure extends Error {
  /** Offset at which the rule failed. */
  public readonly offset: number;
  /** What went wrong. */
  public readonly diagnostic: ParseDiagnostic;

  /**
   * Creates a new ParseFailure.
   *
   * @param offset - Offset of the failure in the source.
   * @param diagnostic - Description of the failure.
   */
  constructor(offset: number, diagnostic: ParseDiagnostic) {
    super(diagnostic.kind === 'unexpected' ? `unexpected ${diagnostic.found}` : diagnostic.message);
    this.name = 'ParseFailure';
    this.offset = offset;
    this.diagnostic = diagnostic;
  }
}

/** Furthest point the parser reached before failing. */
interface FurthestFailure {
  offset: number;
  expected: Set<string>;
  message: string | undefined;
}

/**
 * Checks whether a character can start an identifier.
 */
export function isIdentifierStart(char: string | undefined): boolean {
  return char !== undefined && /^[A-Za-z_]$/.test(char);
}

/**
 * Checks whether a character can continue an identifier.
 */
export function isIdentifierChar(char: string | undefined): boolean {
  return char !== undefined && /^[A-Za-z0-9_]$/.test(char);
}

/**
 * Mutable cursor over one source text.
 */
export class Input {
  /** Current offset into {@link Input.source}. */
  public offset = 0;
  private depth = 0;
  private furthest: FurthestFailure = { offset: 0, expected: new Set(), message: undefined };

  /**
   * Creates a cursor at the start of the source.
   *
   * @param source - Text being parsed.
   * @param sourceName - Name reported in errors, e.g. a file path.
   */
  constructor(
    public readonly source: string,
    public readonly sourceName: string
  ) {}

  /** Whether the whole source has been consumed. */
  get atEnd(): boolean {
    return this.offset >= this.source.length;
  }

  /** The character at the cursor, if any. */
  peek(): string | undefined {
    return this.source[this.offset];
  }

  /** Whether the source continues with `text` at the cursor. */
  startsWith(text: string): boolean {
    return this.source.startsWith(text, this.offset);
  }

  /** Whether the cursor is at a `///` documentation line. */
  atLineDoc(): boolean {
    return this.startsWith('///') && this.source[this.offset + 3] !== '/';
  }

  /** Whether the cursor is at a `/** ... *\/` documentation block. */
  atBlockDoc(): boolean {
    return this.startsWith('/**') && !this.startsWith('/**/');
  }

  /** Whether the cursor is at any documentation comment. */
  atDoc(): boolean {
    return this.atLineDoc() || this.atBlockDoc();
  }

  /**
   * Skips whitespace and ordinary comments. Stops at documentation
   * comments, which only the rules that accept documentation consume.
   */
  skipSpace(): void {
    this.skip(false);
  }

  /**
   * Skips whitespace and every kind of comment, documentation included.
   */
  skipSpaceAndDocs(): void {
    this.skip(true);
  }

  private skip(includeDocs: boolean): void {
    for (;;) {
      const char = this.peek();
      if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
        this.offset += 1;
      } else if (!includeDocs && this.atDoc()) {
        return;
      } else if (this.startsWith('//')) {
        this.skipLine();
      } else if (this.startsWith('/*')) {
        const end = this.source.indexOf('*/', this.offset + 2);
        if (end === -1) {
          this.failWith('unterminated comment');
        }
        this.offset = end + 2;
      } else {
        return;
      }
    }
  }

  /**
   * Moves the cursor past the end of the current line and returns the
   * line's text from the cursor, without the line break.
   */
  skipLine(): string {
    const newline = this.source.indexOf('\n', this.offset);
    const end = newline === -1 ? this.source.length : newline;
    const text = this.source.slice(this.offset, end).replace(/\r$/, '');
    this.offset = newline === -1 ? end : newline + 1;
    return text;
  }

  /**
   * Returns the run of identifier characters at the cursor without
   * consuming it, or `undefined` if no identifier starts here.
   */
  peekIdentifier(): string | undefined {
    if (!isIdentifierStart(this.peek())) {
      return undefined;
    }
    let end = this.offset + 1;
    while (isIdentifierChar(this.source[end])) {
      end += 1;
    }
    return this.source.slice(this.offset, end);
  }

  /**
   * Consumes an identifier. Trailing whitespace is left alone so callers
   * can look at the character right after it.
   *
   * @param label - Description used when no identifier is found.
   */
  identifier(label = 'identifier'): string {
    const word = this.peekIdentifier();
    if (word === undefined) {
      this.fail([label]);
    }
    this.offset += word.length;
    return word;
  }

  /**
   * Whether `word` is at the cursor and is not the prefix of a longer
   * identifier: `Long` does not match `Longs`.
   */
  atKeyword(word: string): boolean {
    return this.startsWith(word) && !isIdentifierChar(this.source[this.offset + word.length]);
  }

  /**
   * Consumes a keyword and the whitespace after it.
   *
   * @returns Whether the keyword was present.
   */
  keyword(word: string): boolean {
    if (!this.atKeyword(word)) {
      this.note(word);
      return false;
    }
    this.offset += word.length;
    this.skipSpace();
    return true;
  }

  /**
   * Consumes a punctuation symbol and the whitespace after it.
   *
   * @returns Whether the symbol was present.
   */
  symbol(text: string): boolean {
    if (!this.startsWith(text)) {
      this.note(`'${text}'`);
      return false;
    }
    this.offset += text.length;
    this.skipSpace();
    return true;
  }

  /**
   * Consumes a punctuation symbol, failing if it is absent.
   */
  expectSymbol(text: string): void {
    if (!this.symbol(text)) {
      this.fail([`'${text}'`]);
    }
  }

  /**
   * Fails unless the whole source has been consumed.
   */
  expectEnd(): void {
    if (!this.atEnd) {
      this.fail(['end of input']);
    }
  }

  /**
   * Runs one alternative of an ordered choice. On failure the cursor is
   * restored and `undefined` is returned; version errors are never
   * backtracked over.
   */
  attempt<T>(alternative: () => T): T | undefined {
    const start = this.offset;
    try {
      return alternative();
    } catch (error) {
      if (!(error instanceof ParseFailure) || error.diagnostic.kind === 'version') {
        throw error;
      }
      this.record(error);
      this.offset = start;
      return undefined;
    }
  }

  /**
   * Runs a rule one nesting level deeper, failing once `limit` levels are
   * open.
   */
  nested<T>(limit: number, rule: () => T): T {
    if (this.depth >= limit) {
      this.failWith(`nesting exceeds the limit of ${String(limit)} levels`);
    }
    this.depth += 1;
    try {
      return rule();
    } finally {
      this.depth -= 1;
    }
  }

  /**
   * Records that `label` would have been accepted at the cursor.
   */
  note(label: string): void {
    this.noteAt(this.offset, [label]);
  }

  private noteAt(offset: number, labels: readonly string[]): void {
    if (offset > this.furthest.offset) {
      this.furthest = { offset, expected: new Set(labels), message: undefined };
    } else if (offset === this.furthest.offset) {
      for (const label of labels) {
        this.furthest.expected.add(label);
      }
    }
  }

  private record(error: ParseFailure): void {
    const { diagnostic } = error;
    if (diagnostic.kind === 'unexpected') {
      this.noteAt(error.offset, diagnostic.expected);
    } else if (diagnostic.kind === 'message') {
      if (error.offset > this.furthest.offset) {
        this.furthest = { offset: error.offset, expected: new Set(), message: diagnostic.message };
      } else if (error.offset === this.furthest.offset && this.furthest.message === undefined) {
        this.furthest.message = diagnostic.message;
      }
    }
  }

  /**
   * Fails at the cursor, reporting what was expected there.
   */
  fail(expected: readonly string[], offset = this.offset): never {
    this.noteAt(offset, expected);
    const labels = offset === this.furthest.offset ? [...this.furthest.expected] : expected;
    throw new ParseFailure(offset, {
      kind: 'unexpected',
      found: this.describeAt(offset),
      expected: labels,
    });
  }

  /**
   * Fails with a specific message.
   */
  failWith(message: string, offset = this.offset): never {
    throw new ParseFailure(offset, { kind: 'message', message });
  }

  /**
   * Fails because the module's language version predates a feature.
   */
  failVersion(feature: VersionedFeature, actual: Version, offset = this.offset): never {
    throw new ParseFailure(offset, {
      kind: 'version',
      feature: feature.name,
      required: feature.since,
      actual,
      message: versionErrorMessage(feature.name, feature.since, actual),
    });
  }

  /**
   * Describes the input at an offset for "unexpected ..." messages.
   */
  describeAt(offset: number): string {
    if (offset >= this.source.length) {
      return 'end of input';
    }
    const char = this.source[offset];
    if (char === '\n' || char === '\r') {
      return 'newline';
    }
    if (isIdentifierChar(char)) {
      let end = offset + 1;
      while (isIdentifierChar(this.source[end])) {
        end += 1;
      }
      return `'${this.source.slice(offset, end)}'`;
    }
    return `'${char ?? ''}'`;
  }

  /**
   * Converts an offset into a 1-based line and column.
   */
  position(offset: number): SourcePosition {
    const before = this.source.slice(0, offset);
    const lastNewline = before.lastIndexOf('\n');
    const line = before.split('\n').length;
    return { offset, line, column: offset - lastNewline };
  }

  /**
   * Runs a parser over this input and converts any failure into a
   * `ParseError` result. Message and version failures are reported where
   * they happened; `unexpected` failures are reported at the furthest
   * point any alternative reached.
   */
  run<T>(parser: (input: Input) => T): Result<T> {
    try {
      return success(parser(this));
    } catch (error) {
      if (!(error instanceof ParseFailure)) {
        throw error;
      }
      const reported = this.selectReported(error);
      return failure({
        kind: 'ParseError',
        sourceName: this.sourceName,
        source: this.source,
        position: this.position(reported.offset),
        diagnostic: reported.diagnostic,
      });
    }
  }

  private selectReported(error: ParseFailure): ParseFailure {
    if (error.diagnostic.kind !== 'unexpected' || this.furthest.offset <= error.offset) {
      return error;
    }
    const { offset, expected, message } = this.furthest;
    if (message !== undefined) {
      return new ParseFailure(offset, { kind: 'message', message });
    }
    return new ParseFailure(offset, {
      kind: 'unexpected',
      found: this.describeAt(offset),
      expected: [...expected],
    });
  }
}
