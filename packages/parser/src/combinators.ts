/**
 * Programmatic parser combinator API for @marklet/parser
 *
 * All combinators return `Parser<T>` values that can be composed freely.
 * PEG semantics: ordered alternation, first match wins, no implicit
 * backtracking beyond the alternative that failed.
 */

import type { Parser, ParseResult } from "./types.js";

// ---------------------------------------------------------------------------
// Construction helpers
// ---------------------------------------------------------------------------

/** Create a Parser<T> from a raw parse function. */
export function mkParser<T>(parseFn: (input: string, pos: number) => ParseResult<T>): Parser<T> {
  return {
    parse(input: string, pos = 0): ParseResult<T> {
      return parseFn(input, pos);
    },
    parseAll(input: string): T {
      return parseAllWith(parseFn, input);
    },
  };
}

/** Shared `parseAll` implementation for parsers that are not built with `mkParser`. */
export function parseAllWith<T>(
  parseFn: (input: string, pos: number) => ParseResult<T>,
  input: string
): T {
  const result = parseFn(input, 0);
  if (!result.ok) {
    throw new ParseError(input, result.pos, result.expected);
  }
  if (result.pos !== input.length) {
    throw new ParseError(input, result.pos, "end of input");
  }
  return result.value;
}

export function ok<T>(value: T, pos: number): ParseResult<T> {
  return { ok: true, value, pos };
}

export function fail<T>(pos: number, expected: string): ParseResult<T> {
  return { ok: false, pos, expected };
}

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

/** Descriptive parse error with position context. */
export class ParseError extends Error {
  /** Zero-based position in the input where parsing failed. */
  readonly pos: number;
  /** What the parser expected at the failure position. */
  readonly expected: string;
  readonly line: number;
  readonly col: number;

  constructor(input: string, pos: number, expected: string) {
    const { line, col } = lineCol(input, pos);
    const snippet = input.slice(Math.max(0, pos - 10), pos + 20);
    super(`Parse error at line ${line}, col ${col}: expected ${expected}\n  ...${snippet}...`);
    this.name = "ParseError";
    this.pos = pos;
    this.expected = expected;
    this.line = line;
    this.col = col;
  }
}

/** Convert a zero-based offset to 1-based line/col. */
export function lineCol(input: string, pos: number): { line: number; col: number } {
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < input.length; i++) {
    if (input[i] === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

/** Match an exact string literal. */
export function literal(s: string): Parser<string> {
  return mkParser((input, pos) => {
    if (input.startsWith(s, pos)) {
      return ok(s, pos + s.length);
    }
    return fail(pos, JSON.stringify(s));
  });
}

/** Match a single specific character. */
export function char(c: string): Parser<string> {
  return mkParser((input, pos) => {
    if (pos < input.length && input[pos] === c) {
      return ok(c, pos + 1);
    }
    return fail(pos, JSON.stringify(c));
  });
}

/** Match any single character. */
export function anyChar(): Parser<string> {
  return mkParser((input, pos) => {
    if (pos < input.length) {
      return ok(input[pos], pos + 1);
    }
    return fail(pos, "any character");
  });
}

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/** Sequence two parsers. */
export function seq<A, B>(a: Parser<A>, b: Parser<B>): Parser<[A, B]> {
  return mkParser((input, pos) => {
    const ra = a.parse(input, pos);
    if (!ra.ok) return fail(ra.pos, ra.expected);
    const rb = b.parse(input, ra.pos);
    if (!rb.ok) return fail(rb.pos, rb.expected);
    return ok<[A, B]>([ra.value, rb.value], rb.pos);
  });
}

/** Sequence three parsers. */
export function seq3<A, B, C>(a: Parser<A>, b: Parser<B>, c: Parser<C>): Parser<[A, B, C]> {
  return mkParser((input, pos) => {
    const ra = a.parse(input, pos);
    if (!ra.ok) return fail(ra.pos, ra.expected);
    const rb = b.parse(input, ra.pos);
    if (!rb.ok) return fail(rb.pos, rb.expected);
    const rc = c.parse(input, rb.pos);
    if (!rc.ok) return fail(rc.pos, rc.expected);
    return ok<[A, B, C]>([ra.value, rb.value, rc.value], rc.pos);
  });
}

/** Sequence two parsers, keeping only the result of the second. */
export function skipLeft<A, B>(a: Parser<A>, b: Parser<B>): Parser<B> {
  return map(seq(a, b), ([, vb]) => vb);
}

/** Sequence two parsers, keeping only the result of the first. */
export function skipRight<A, B>(a: Parser<A>, b: Parser<B>): Parser<A> {
  return map(seq(a, b), ([va]) => va);
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/** Ordered alternation (PEG): try `a` first, then `b`. */
export function alt<A, B>(a: Parser<A>, b: Parser<B>): Parser<A | B> {
  return mkParser((input, pos) => {
    const ra = a.parse(input, pos);
    if (ra.ok) return ra;
    const rb = b.parse(input, pos);
    if (rb.ok) return rb;
    return fail(Math.max(ra.pos, rb.pos), `${ra.expected} or ${rb.expected}`);
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/** Zero or more repetitions. Always succeeds. */
export function many<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((input, pos) => {
    const results: T[] = [];
    let cur = pos;
    for (;;) {
      const r = p.parse(input, cur);
      if (!r.ok) break;
      if (r.pos === cur) break; // prevent infinite loop on zero-width match
      results.push(r.value);
      cur = r.pos;
    }
    return ok(results, cur);
  });
}

/** One or more repetitions. */
export function many1<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((input, pos) => {
    const first = p.parse(input, pos);
    if (!first.ok) return fail(first.pos, first.expected);
    const rest = many(p).parse(input, first.pos);
    if (!rest.ok) return fail(rest.pos, rest.expected);
    return ok([first.value, ...rest.value], rest.pos);
  });
}

/** Optional: succeed with `null` if `p` fails without consuming. */
export function optional<T>(p: Parser<T>): Parser<T | null> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok) return r;
    return ok(null, pos);
  });
}

// ---------------------------------------------------------------------------
// Negation
// ---------------------------------------------------------------------------

/** Negative lookahead: succeed with null only if `p` fails at the current position. Does not consume input. */
export function not<T>(p: Parser<T>): Parser<null> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok) return fail(pos, `not ${JSON.stringify(r.value)}`);
    return ok(null, pos);
  });
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return fail(r.pos, r.expected);
    return ok(f(r.value), r.pos);
  });
}

/** Replace a parser's result with a constant. */
export function as<A, B>(p: Parser<A>, value: B): Parser<B> {
  return map(p, () => value);
}

/**
 * Transform a parser's result with a function that may reject it. The
 * function returns either `{ ok: true, value }` or an error message, which
 * becomes a failure at the parser's start position.
 */
export function validate<A, B>(
  p: Parser<A>,
  f: (a: A) => { ok: true; value: B } | { ok: false; message: string }
): Parser<B> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return fail(r.pos, r.expected);
    const checked = f(r.value);
    if (!checked.ok) return fail(pos, checked.message);
    return ok(checked.value, r.pos);
  });
}

/** Pair the result of `p` with the source text it consumed. */
export function withSource<T>(p: Parser<T>): Parser<[T, string]> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return fail(r.pos, r.expected);
    return ok([r.value, input.slice(pos, r.pos)], r.pos);
  });
}

/** Parse `p` between `open` and `close`, returning only the inner result. */
export function between<O, T, C>(open: Parser<O>, p: Parser<T>, close: Parser<C>): Parser<T> {
  return skipRight(skipLeft(open, p), close);
}
