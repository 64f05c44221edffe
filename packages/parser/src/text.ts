/**
 * Text parsers for @marklet/parser
 *
 * Character-run parsers and the delimited text scanner. The scanner reads
 * literal text up to an end delimiter and, when asked, stops early at any
 * of a set of trigger characters so that a caller can dispatch to the
 * parser for a nested construct.
 */

import type { Parser, ParseResult } from "./types.js";
import { fail, mkParser, ok, parseAllWith } from "./combinators.js";

// ---------------------------------------------------------------------------
// Character runs
// ---------------------------------------------------------------------------

/**
 * Parser for a run of characters matching a predicate. Succeeds with the
 * empty string unless a minimum is set.
 */
export class Characters implements Parser<string> {
  constructor(
    private readonly predicate: (c: string) => boolean,
    private readonly description: string,
    private readonly minCount = 0,
    private readonly maxCount = Infinity
  ) {}

  /** Require at least `n` characters. */
  min(n: number): Characters {
    return new Characters(this.predicate, this.description, n, this.maxCount);
  }

  /** Consume at most `n` characters. */
  max(n: number): Characters {
    return new Characters(this.predicate, this.description, this.minCount, n);
  }

  /** Consume exactly `n` characters. */
  take(n: number): Characters {
    return new Characters(this.predicate, this.description, n, n);
  }

  parse(input: string, pos = 0): ParseResult<string> {
    let end = pos;
    while (end < input.length && end - pos < this.maxCount && this.predicate(input[end])) {
      end++;
    }
    if (end - pos < this.minCount) {
      return fail(end, this.description);
    }
    return ok(input.slice(pos, end), end);
  }

  parseAll(input: string): string {
    return parseAllWith((i, p) => this.parse(i, p), input);
  }
}

function describeChars(chars: readonly string[]): string {
  return chars.map((c) => JSON.stringify(c)).join(", ");
}

/** Run of the given characters. */
export function anyOf(...chars: string[]): Characters {
  const set = new Set(chars);
  return new Characters((c) => set.has(c), `one of ${describeChars(chars)}`);
}

/** Run of any characters except the given ones. */
export function anyBut(...chars: string[]): Characters {
  const set = new Set(chars);
  return new Characters((c) => !set.has(c), `any character except ${describeChars(chars)}`);
}

/** Run of characters within inclusive ranges, written as `"a-z"` or single characters. */
export function anyIn(...ranges: string[]): Characters {
  const bounds = ranges.map((r) => (r.length === 3 && r[1] === "-" ? [r[0], r[2]] : [r, r]));
  return new Characters(
    (c) => bounds.some(([from, to]) => c >= from && c <= to),
    `characters in ${ranges.join(", ")}`
  );
}

/** Run of characters satisfying `predicate`. */
export function anyWhile(predicate: (c: string) => boolean, description = "matching characters"): Characters {
  return new Characters(predicate, description);
}

/** Horizontal whitespace, possibly empty. */
export const ws: Characters = anyOf(" ", "\t");

/** Horizontal whitespace or newlines, possibly empty. */
export const wsOrNl: Characters = anyOf(" ", "\t", "\n");

// ---------------------------------------------------------------------------
// Delimited text
// ---------------------------------------------------------------------------

/** Outcome of scanning delimited text with trigger characters. */
export type ScanResult =
  | { readonly kind: "end"; readonly text: string }
  | { readonly kind: "trigger"; readonly char: string; readonly text: string };

interface DelimiterOptions {
  readonly acceptEndOfInput: boolean;
  readonly keepDelimiter: boolean;
  readonly nonEmpty: boolean;
  readonly failOn: ReadonlySet<string>;
}

const defaultOptions: DelimiterOptions = {
  acceptEndOfInput: false,
  keepDelimiter: false,
  nonEmpty: false,
  failOn: new Set(),
};

/**
 * Literal text terminated by the first of a set of delimiter strings.
 *
 * As a `Parser<string>` it yields the text before the delimiter and
 * continues after it. `scan(triggers)` additionally stops at trigger
 * characters; a delimiter always wins over a trigger starting at the same
 * position.
 */
export class DelimitedText implements Parser<string> {
  constructor(
    readonly delimiters: readonly string[],
    private readonly options: DelimiterOptions = defaultOptions
  ) {}

  /** Treat the end of input as a valid end delimiter. */
  acceptEndOfInput(): DelimitedText {
    return new DelimitedText(this.delimiters, { ...this.options, acceptEndOfInput: true });
  }

  /** Leave the delimiter unconsumed. */
  keepDelimiter(): DelimitedText {
    return new DelimitedText(this.delimiters, { ...this.options, keepDelimiter: true });
  }

  /** Fail when the delimiter follows immediately. */
  nonEmpty(): DelimitedText {
    return new DelimitedText(this.delimiters, { ...this.options, nonEmpty: true });
  }

  /** Fail when any of `chars` occurs before the delimiter. */
  failOn(...chars: string[]): DelimitedText {
    return new DelimitedText(this.delimiters, {
      ...this.options,
      failOn: new Set([...this.options.failOn, ...chars]),
    });
  }

  /** Description of the end condition, used in failure messages. */
  get expected(): string {
    const names = this.delimiters.map((d) => JSON.stringify(d));
    if (this.options.acceptEndOfInput || names.length === 0) names.push("end of input");
    return names.join(" or ");
  }

  parse(input: string, pos = 0): ParseResult<string> {
    const r = this.scanFrom(input, pos, NO_TRIGGERS);
    if (!r.ok) return r;
    return ok(r.value.text, r.pos);
  }

  parseAll(input: string): string {
    return parseAllWith((i, p) => this.parse(i, p), input);
  }

  /**
   * Scanner stopping at the end delimiter or at any trigger character.
   * After a trigger the position is just past the trigger character.
   */
  scan(triggers: ReadonlySet<string>): Parser<ScanResult> {
    return mkParser((input, pos) => this.scanFrom(input, pos, triggers));
  }

  private scanFrom(input: string, pos: number, triggers: ReadonlySet<string>): ParseResult<ScanResult> {
    const { acceptEndOfInput, keepDelimiter, nonEmpty, failOn } = this.options;
    for (let i = pos; i < input.length; i++) {
      const c = input[i];
      const delimiter = this.delimiters.find((d) => d.length > 0 && input.startsWith(d, i));
      if (delimiter !== undefined) {
        if (nonEmpty && i === pos) return fail(pos, "non-empty text");
        const text = input.slice(pos, i);
        return ok({ kind: "end", text }, keepDelimiter ? i : i + delimiter.length);
      }
      if (failOn.has(c)) {
        return fail(i, this.expected);
      }
      if (triggers.has(c)) {
        return ok({ kind: "trigger", char: c, text: input.slice(pos, i) }, i + 1);
      }
    }
    if (!acceptEndOfInput) {
      return fail(input.length, this.expected);
    }
    if (nonEmpty && pos >= input.length) {
      return fail(pos, "non-empty text");
    }
    return ok({ kind: "end", text: input.slice(pos) }, input.length);
  }
}

const NO_TRIGGERS: ReadonlySet<string> = new Set();

/** Text up to the first of `delimiters`, which is consumed. */
export function delimitedBy(...delimiters: string[]): DelimitedText {
  return new DelimitedText(delimiters);
}

/** All remaining text. */
export function untilEnd(): DelimitedText {
  return new DelimitedText([]).acceptEndOfInput();
}

/** The rest of the current line; the newline is consumed. */
export function restOfLine(): DelimitedText {
  return delimitedBy("\n").acceptEndOfInput();
}

// ---------------------------------------------------------------------------
// Indented blocks
// ---------------------------------------------------------------------------

export interface IndentedBlockOptions {
  /** Minimum indentation of continuation lines (default 1). */
  readonly minIndent?: number;
}

function indentOf(line: string): number {
  let n = 0;
  while (n < line.length && (line[n] === " " || line[n] === "\t")) n++;
  return n;
}

/**
 * The rest of the current line followed by every subsequent line indented
 * by at least `minIndent`. Blank lines are included when an indented line
 * follows them. The common indentation of continuation lines is removed.
 */
export function indentedBlock(options: IndentedBlockOptions = {}): Parser<string> {
  const minIndent = options.minIndent ?? 1;
  const firstLine = restOfLine();

  return mkParser((input, pos) => {
    const first = firstLine.parse(input, pos);
    if (!first.ok) return fail(first.pos, first.expected);

    const lines: string[] = [];
    let pendingBlank: string[] = [];
    let cur = first.pos;
    let end = first.pos;

    while (cur < input.length) {
      const nl = input.indexOf("\n", cur);
      const lineEnd = nl === -1 ? input.length : nl;
      const next = nl === -1 ? input.length : nl + 1;
      const line = input.slice(cur, lineEnd);

      if (line.trim() === "") {
        pendingBlank.push("");
      } else if (indentOf(line) >= minIndent) {
        lines.push(...pendingBlank, line);
        pendingBlank = [];
        end = next;
      } else {
        break;
      }
      cur = next;
    }

    const common = lines
      .filter((l) => l !== "")
      .reduce((m, l) => Math.min(m, indentOf(l)), Infinity);
    const strip = Number.isFinite(common) ? common : 0;
    const body = [first.value, ...lines.map((l) => l.slice(strip))];

    return ok(body.join("\n"), end);
  });
}
