/**
 * Generic inline parsing for @marklet/markup
 *
 * Lightweight markup would otherwise have to try every inline construct at
 * every character. Instead, the engine scans literal text up to the end
 * delimiter and only stops at characters that may start a nested span,
 * dispatching to the one parser registered for that character.
 */

import { anyChar, delimitedBy, fail, mkParser, ok } from "@marklet/parser";
import type { DelimitedText, Parser } from "@marklet/parser";
import { SpanBuilder, TextBuilder } from "./builders.js";
import type { ResultBuilder } from "./builders.js";
import type { Span } from "./elements.js";

/** Parsers for nested constructs, keyed by their first character. */
export type NestedParsers<Elem> = ReadonlyMap<string, Parser<Elem>>;

/** A parser map or a thunk producing it, for recursive definitions. */
export type LazyParsers<Elem> = NestedParsers<Elem> | (() => NestedParsers<Elem>);

function force<Elem>(parsers: LazyParsers<Elem>): NestedParsers<Elem> {
  return typeof parsers === "function" ? parsers() : parsers;
}

/**
 * Generic inline parser. Runs `text` with the keys of `nested` as trigger
 * characters; on a trigger the mapped parser runs right after the trigger
 * character. When it fails, the trigger character is kept as literal text
 * and scanning resumes after it, so every iteration consumes input.
 *
 * The map, the scanner and the builder are created once per parse call.
 */
export function inline<Elem, To>(
  text: DelimitedText,
  nested: LazyParsers<Elem>,
  newBuilder: () => ResultBuilder<Elem, To>
): Parser<To> {
  return mkParser((input, start) => {
    const builder = newBuilder();
    const nestedMap = force(nested);
    const scanner = text.scan(new Set(nestedMap.keys()));

    const addText = (chunk: string): void => {
      if (chunk !== "") builder.append(builder.fromString(chunk));
    };

    let pos = start;
    for (;;) {
      const scanned = scanner.parse(input, pos);
      if (!scanned.ok) return fail(start, scanned.expected);

      const found = scanned.value;
      addText(found.text);
      if (found.kind === "end") {
        return ok(builder.result(), scanned.pos);
      }

      const parser = nestedMap.get(found.char);
      const nestedResult = parser?.parse(input, scanned.pos);
      if (nestedResult?.ok) {
        builder.append(nestedResult.value);
        pos = nestedResult.pos;
      } else {
        builder.append(builder.fromString(found.char));
        pos = scanned.pos;
      }
    }
  });
}

/** Parses a list of spans. */
export function inlineSpans(text: DelimitedText, parsers: LazyParsers<Span>): Parser<Span[]> {
  return inline(text, parsers, () => new SpanBuilder());
}

/** Parses text, with nested parsers producing the text to insert. */
export function inlineText(text: DelimitedText, parsers: LazyParsers<string>): Parser<string> {
  return inline(text, parsers, () => new TextBuilder());
}

const backslashEscape: NestedParsers<string> = new Map([["\\", anyChar()]]);

/** Text in which a backslash makes the following character literal. */
export function escapedText(text: DelimitedText): Parser<string> {
  return inlineText(text, backslashEscape);
}

/** Escaped text up to the first of `chars`, which is consumed. */
export function escapedUntil(...chars: string[]): Parser<string> {
  return escapedText(delimitedBy(...chars));
}
