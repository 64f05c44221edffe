import { describe, it, expect } from "vitest";
import { anyBut, anyChar, char, delimitedBy, map, skipRight, untilEnd } from "@marklet/parser";
import type { Parser } from "@marklet/parser";
import {
  contextReference,
  escapedUntil,
  inlineSpans,
  inlineText,
  text,
  type NestedParsers,
  type Span,
} from "../index.js";

// `{name}` after its opening brace
const ref: Parser<Span> = map(skipRight(anyBut("}").min(1), char("}")), (name): Span => contextReference(name));
const refs: NestedParsers<Span> = new Map([["{", ref]]);

describe("inline dispatch", () => {
  it("dispatches on trigger characters", () => {
    expect(inlineSpans(untilEnd(), refs).parse("a{b}c")).toEqual({
      ok: true,
      value: [text("a"), contextReference("b"), text("c")],
      pos: 5,
    });
  });

  it("keeps the trigger as text when the nested parser fails", () => {
    expect(inlineSpans(untilEnd(), refs).parse("a{bc")).toEqual({
      ok: true,
      value: [text("a{bc")],
      pos: 4,
    });
  });

  it("starts at the given position", () => {
    expect(inlineSpans(untilEnd(), refs).parse("xx{a}", 2)).toEqual({
      ok: true,
      value: [contextReference("a")],
      pos: 5,
    });
  });

  it("accepts the parser map as a thunk", () => {
    expect(inlineSpans(untilEnd(), () => refs).parse("{a}{b}")).toEqual({
      ok: true,
      value: [contextReference("a"), contextReference("b")],
      pos: 6,
    });
  });

  it("lets the end delimiter win over a trigger with the same character", () => {
    const nested: NestedParsers<string> = new Map([["*", anyChar()]]);
    expect(inlineText(delimitedBy("*"), nested).parse("ab*c")).toEqual({ ok: true, value: "ab", pos: 3 });
  });

  it("fails at its start position when the delimiter never occurs", () => {
    expect(inlineSpans(delimitedBy("]"), refs).parse("x{y}z")).toEqual({
      ok: false,
      pos: 0,
      expected: '"]"',
    });
  });

  it("unescapes backslashes in escaped text", () => {
    expect(escapedUntil('"').parse('a\\"b"c')).toEqual({ ok: true, value: 'a"b', pos: 5 });
  });

  describe("properties", () => {
    const inputs = ["a{b}c", "a{bc", "{x}{y}", "}{", "plain", "{}{a}", "a{b{c}d"];

    const source = (span: Span): string => {
      switch (span.type) {
        case "text":
          return span.content;
        case "contextReference":
          return `{${span.ref}}`;
        default:
          throw new Error(`unexpected span ${span.type}`);
      }
    };

    it("reproduces the consumed input from the output", () => {
      for (const input of inputs) {
        const spans = inlineSpans(untilEnd(), refs).parseAll(input);
        expect(spans.map(source).join("")).toBe(input);
      }
    });

    it("never emits two adjacent text spans", () => {
      for (const input of inputs) {
        const spans = inlineSpans(untilEnd(), refs).parseAll(input);
        spans.forEach((span, i) => {
          if (i > 0) expect(span.type === "text" && spans[i - 1].type === "text").toBe(false);
        });
      }
    });
  });
});
