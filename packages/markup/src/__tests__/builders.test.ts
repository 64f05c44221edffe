import { describe, it, expect } from "vitest";
import {
  SpanBuilder,
  TemplateSpanBuilder,
  TextBuilder,
  emphasized,
  retraction,
  strong,
  templateContextReference,
  templateString,
  text,
  type Span,
} from "../index.js";

function build(items: Span[]): Span[] {
  const builder = new SpanBuilder();
  for (const item of items) builder.append(item);
  return builder.result();
}

describe("SpanBuilder", () => {
  it("merges adjacent plain text", () => {
    const em = emphasized([text("x")]);
    expect(build([text("a"), text("b"), em, text("c")])).toEqual([text("ab"), em, text("c")]);
  });

  it("does not merge text carrying options", () => {
    expect(build([text("a"), text("b", { id: "b" })])).toEqual([text("a"), text("b", { id: "b" })]);
  });

  it("wraps literal chunks as text", () => {
    expect(new SpanBuilder().fromString("abc")).toEqual({ type: "text", content: "abc" });
  });

  it("returns an empty list when nothing was appended", () => {
    expect(new SpanBuilder().result()).toEqual([]);
  });

  describe("retraction", () => {
    it("drops trailing characters of the pending text and appends the replacement", () => {
      const replacement = strong([text("bc")]);
      expect(build([text("abc"), retraction(2, replacement, text("!"))])).toEqual([text("a"), replacement]);
    });

    it("merges a plain-text replacement with the remaining text", () => {
      expect(build([text("ab"), retraction(1, text("X"), text("?"))])).toEqual([text("aX")]);
    });

    it("drops the pending text entirely when all of it is retracted", () => {
      const replacement = strong([text("ab")]);
      expect(build([text("ab"), retraction(2, replacement, text("?"))])).toEqual([replacement]);
    });

    it("appends the fallback when the pending text is too short", () => {
      expect(build([text("a"), retraction(3, strong([]), text("*"))])).toEqual([text("a*")]);
    });

    it("appends the fallback when the pending element is not text", () => {
      const em = emphasized([text("x")]);
      expect(build([em, retraction(1, strong([]), text("*"))])).toEqual([em, text("*")]);
    });
  });
});

describe("TextBuilder", () => {
  it("concatenates every chunk", () => {
    const builder = new TextBuilder();
    builder.append(builder.fromString("ab"));
    builder.append("c");
    expect(builder.result()).toBe("abc");
  });
});

describe("TemplateSpanBuilder", () => {
  it("merges adjacent template strings only", () => {
    const builder = new TemplateSpanBuilder();
    builder.append(templateString("a"));
    builder.append(builder.fromString("b"));
    builder.append(templateContextReference("x"));
    builder.append(templateString("c"));
    expect(builder.result()).toEqual([
      templateString("ab"),
      templateContextReference("x"),
      templateString("c"),
    ]);
  });
});
