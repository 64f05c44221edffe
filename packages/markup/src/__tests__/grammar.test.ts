import { describe, it, expect } from "vitest";
import {
  attributeKey,
  blockBodyContent,
  bodyKey,
  bracedBodyContent,
  declaration,
  directiveParser,
  nameDecl,
  reference,
} from "../index.js";

describe("nameDecl", () => {
  it("starts with a letter and continues with letters, digits, - and _", () => {
    expect(nameDecl.parse("a-b_1 x")).toEqual({ ok: true, value: "a-b_1", pos: 5 });
  });

  it("rejects a leading digit", () => {
    expect(nameDecl.parse("1a").ok).toBe(false);
  });
});

describe("declaration", () => {
  it("parses a quoted default attribute", () => {
    expect(declaration.parse(':title "My Doc"')).toEqual({
      ok: true,
      value: { name: "title", parts: [{ key: attributeKey(), content: "My Doc" }] },
      pos: 15,
    });
  });

  it("parses the default attribute before named attributes", () => {
    const r = declaration.parseAll(':img logo width = 30 alt="A \\"q\\" b"');
    expect(r).toEqual({
      name: "img",
      parts: [
        { key: attributeKey(), content: "logo" },
        { key: attributeKey("width"), content: "30" },
        { key: attributeKey("alt"), content: 'A "q" b' },
      ],
    });
  });

  it("keeps duplicate keys", () => {
    const r = directiveParser(blockBodyContent, { includeStartChar: false }).parseAll(":x a=1 a=2.");
    expect(r.parts).toEqual([
      { key: attributeKey("a"), content: "1" },
      { key: attributeKey("a"), content: "2" },
    ]);
  });
});

describe("directiveParser", () => {
  const block = directiveParser(blockBodyContent, { includeStartChar: false });
  const braced = directiveParser(bracedBodyContent, { includeStartChar: false });

  it("parses a named attribute and an indented default body", () => {
    expect(block.parseAll(":callout type=warn: some **body** text.")).toEqual({
      name: "callout",
      parts: [
        { key: attributeKey("type"), content: "warn" },
        { key: bodyKey(), content: "some **body** text." },
      ],
    });
  });

  it("parses a directive without body", () => {
    expect(directiveParser(blockBodyContent, { includeStartChar: true }).parse("@:toc.")).toEqual({
      ok: true,
      value: { name: "toc", parts: [] },
      pos: 6,
    });
  });

  it("requires the @ when asked to include the start character", () => {
    expect(directiveParser(blockBodyContent, { includeStartChar: true }).parse(":toc.").ok).toBe(false);
  });

  it("parses default and named braced bodies with balanced nested braces", () => {
    expect(braced.parseAll(":if ok: { yes {{ a }} } ~else: {no}")).toEqual({
      name: "if",
      parts: [
        { key: attributeKey(), content: "ok" },
        { key: bodyKey(), content: " yes {{ a }} " },
        { key: bodyKey("else"), content: "no" },
      ],
    });
  });

  it("parses a named body in first position", () => {
    expect(braced.parseAll(":pick: ~first: {a} ~second: {b}").parts).toEqual([
      { key: bodyKey("first"), content: "a" },
      { key: bodyKey("second"), content: "b" },
    ]);
  });

  it("rejects an all-whitespace block body", () => {
    expect(directiveParser(blockBodyContent, { includeStartChar: true }).parse("@:note:   \nnext").ok).toBe(
      false
    );
  });
});

describe("body content", () => {
  it("trims indented block bodies", () => {
    expect(blockBodyContent.parse(" first\n  second\n  third\nrest")).toEqual({
      ok: true,
      value: "first\nsecond\nthird",
      pos: 24,
    });
  });

  it("reports an empty body", () => {
    expect(blockBodyContent.parse("   ")).toEqual({ ok: false, pos: 0, expected: "empty body" });
  });

  it("keeps nested braces verbatim", () => {
    expect(bracedBodyContent.parse("{a {b {c}} d}!")).toEqual({ ok: true, value: "a {b {c}} d", pos: 13 });
  });
});

describe("reference", () => {
  it("parses the rest of a {{ ref }} after its first brace", () => {
    expect(reference((r) => r).parse("{ document.title }}")).toEqual({
      ok: true,
      value: "document.title",
      pos: 19,
    });
  });
});
