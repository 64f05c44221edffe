import { describe, it, expect } from "vitest";
import {
  literal,
  char,
  anyChar,
  anyBut,
  anyIn,
  seq,
  seq3,
  skipLeft,
  skipRight,
  alt,
  many,
  many1,
  optional,
  not,
  map,
  as,
  validate,
  withSource,
  between,
  lineCol,
  ParseError,
} from "../index.js";

const letter = anyIn("a-z", "A-Z").take(1);
const digit = anyIn("0-9").take(1);

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

describe("literal", () => {
  it("matches an exact string", () => {
    expect(literal("@:").parse("@:toc")).toEqual({ ok: true, value: "@:", pos: 2 });
  });

  it("fails on mismatch with the quoted literal as expectation", () => {
    expect(literal("@:").parse("toc")).toEqual({ ok: false, pos: 0, expected: '"@:"' });
  });

  it("matches at an offset", () => {
    expect(literal("}}").parse("{{x}}", 3)).toEqual({ ok: true, value: "}}", pos: 5 });
  });
});

describe("char", () => {
  it("matches a single character", () => {
    expect(char("~").parse("~name")).toEqual({ ok: true, value: "~", pos: 1 });
  });

  it("fails on empty input", () => {
    expect(char("~").parse("").ok).toBe(false);
  });
});

describe("anyChar", () => {
  it("matches newlines too", () => {
    expect(anyChar().parse("\n")).toEqual({ ok: true, value: "\n", pos: 1 });
  });

  it("fails at end of input", () => {
    expect(anyChar().parse("ab", 2).ok).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Sequencing
// ---------------------------------------------------------------------------

describe("seq", () => {
  it("returns both results as a tuple", () => {
    expect(seq(char("a"), char("b")).parse("ab")).toEqual({ ok: true, value: ["a", "b"], pos: 2 });
  });

  it("reports the failure of the second parser at its position", () => {
    expect(seq(char("a"), char("b")).parse("ac")).toEqual({ ok: false, pos: 1, expected: '"b"' });
  });
});

describe("seq3", () => {
  it("returns three results", () => {
    expect(seq3(char("{"), letter, char("}")).parse("{x}")).toEqual({
      ok: true,
      value: ["{", "x", "}"],
      pos: 3,
    });
  });
});

describe("skipLeft / skipRight", () => {
  it("keeps only one side", () => {
    expect(skipLeft(char(":"), letter).parse(":a")).toEqual({ ok: true, value: "a", pos: 2 });
    expect(skipRight(letter, char(".")).parse("a.")).toEqual({ ok: true, value: "a", pos: 2 });
  });
});

describe("between", () => {
  it("returns the inner value", () => {
    expect(between(char('"'), letter, char('"')).parse('"q"')).toEqual({
      ok: true,
      value: "q",
      pos: 3,
    });
  });
});

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

describe("alt", () => {
  it("takes the first alternative that succeeds", () => {
    expect(alt(literal("ab"), literal("a")).parse("ab")).toEqual({ ok: true, value: "ab", pos: 2 });
    expect(alt(literal("ab"), literal("a")).parse("ac")).toEqual({ ok: true, value: "a", pos: 1 });
  });

  it("combines expectations on failure", () => {
    expect(alt(char("x"), char("y")).parse("z")).toEqual({
      ok: false,
      pos: 0,
      expected: '"x" or "y"',
    });
  });
});

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

describe("many", () => {
  it("succeeds with an empty list", () => {
    expect(many(char("a")).parse("b")).toEqual({ ok: true, value: [], pos: 0 });
  });

  it("stops on zero-width matches", () => {
    expect(many(optional(char("a"))).parse("aab")).toEqual({ ok: true, value: ["a", "a"], pos: 2 });
  });
});

describe("many1", () => {
  it("requires one match", () => {
    expect(many1(digit).parse("x").ok).toBe(false);
    expect(many1(digit).parse("42x")).toEqual({ ok: true, value: ["4", "2"], pos: 2 });
  });
});

describe("optional", () => {
  it("yields null without consuming", () => {
    expect(optional(char("@")).parse(":")).toEqual({ ok: true, value: null, pos: 0 });
  });
});

// ---------------------------------------------------------------------------
// Negation
// ---------------------------------------------------------------------------

describe("not", () => {
  it("succeeds without consuming when the parser fails", () => {
    expect(not(char("=")).parse("x")).toEqual({ ok: true, value: null, pos: 0 });
  });

  it("fails when the parser matches", () => {
    expect(not(char("=")).parse("=")).toEqual({ ok: false, pos: 0, expected: 'not "="' });
  });
});

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

describe("map / as", () => {
  it("transforms results", () => {
    expect(map(many1(digit), (ds) => Number(ds.join(""))).parse("12")).toEqual({
      ok: true,
      value: 12,
      pos: 2,
    });
    expect(as(char("."), "none").parse(".")).toEqual({ ok: true, value: "none", pos: 1 });
  });
});

describe("validate", () => {
  const nonBlank = validate<string, string>(anyBut("\n"), (s) =>
    s.trim() ? { ok: true, value: s.trim() } : { ok: false, message: "empty body" }
  );

  it("passes accepted values through", () => {
    expect(nonBlank.parse("  text ")).toEqual({ ok: true, value: "text", pos: 7 });
  });

  it("fails at the start position with the message", () => {
    expect(nonBlank.parse("   ", 1)).toEqual({ ok: false, pos: 1, expected: "empty body" });
  });
});

describe("withSource", () => {
  it("pairs the value with the consumed text", () => {
    expect(withSource(many1(letter)).parse("ab1", 0)).toEqual({
      ok: true,
      value: [["a", "b"], "ab"],
      pos: 2,
    });
  });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe("parseAll", () => {
  it("throws a ParseError with line and column", () => {
    const p = seq(literal("a\nb"), char("c"));
    try {
      p.parseAll("a\nbx");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ParseError);
      if (e instanceof ParseError) {
        expect(e.pos).toBe(3);
        expect(e.line).toBe(2);
        expect(e.col).toBe(2);
        expect(e.expected).toBe('"c"');
      }
    }
  });

  it("requires the whole input to be consumed", () => {
    expect(() => literal("a").parseAll("ab")).toThrow(/expected end of input/);
  });
});

describe("lineCol", () => {
  it("is one-based", () => {
    expect(lineCol("ab\ncd", 0)).toEqual({ line: 1, col: 1 });
    expect(lineCol("ab\ncd", 4)).toEqual({ line: 2, col: 2 });
  });
});
