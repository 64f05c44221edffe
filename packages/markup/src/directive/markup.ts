/**
 * Directive parsers for markup documents
 *
 * Span directives and context references are dispatched from the inline
 * engine on `@` and `{`; block directives start with `@:` at the
 * beginning of a block. A dialect adds `spanParsers` to its own inline
 * parser map and tries `blockDirective` before its paragraph parser.
 */

import { map, withSource } from "@marklet/parser";
import type { Parser } from "@marklet/parser";
import {
  blockPlaceholder,
  contextReference,
  invalidBlock,
  invalidSpan,
  literal,
  literalBlock,
  spanPlaceholder,
} from "../elements.js";
import type { Block, Span } from "../elements.js";
import type { NestedParsers } from "../inline.js";
import { applyDirective, baseContext } from "./apply.js";
import { blockBodyContent, bracedBodyContent, directiveParser, reference } from "./grammar.js";
import type {
  BlockDirective,
  BlockDirectiveContext,
  DirectiveRegistry,
  SpanDirective,
  SpanDirectiveContext,
} from "./types.js";

/** Entry points of the surrounding dialect, used to parse directive bodies. */
export interface RecursiveParsers {
  recursiveSpans(source: string): Span[];
  recursiveBlocks(source: string): Block[];
}

export interface MarkupDirectiveRegistries {
  readonly blocks?: DirectiveRegistry<BlockDirective>;
  readonly spans?: DirectiveRegistry<SpanDirective>;
}

export class MarkupDirectiveParsers {
  /** `{ ref }}` after the first brace. */
  readonly contextReference: Parser<Span>;
  /** A span directive after its `@`. */
  readonly spanDirective: Parser<Span>;
  /** A block directive including its `@`. */
  readonly blockDirective: Parser<Block>;
  /** Trigger map for the dialect's inline parser. */
  readonly spanParsers: NestedParsers<Span>;

  constructor(recursive: RecursiveParsers, registries: MarkupDirectiveRegistries = {}) {
    const spans: DirectiveRegistry<SpanDirective> = registries.spans ?? new Map();
    const blocks: DirectiveRegistry<BlockDirective> = registries.blocks ?? new Map();

    this.contextReference = reference((ref): Span => contextReference(ref));

    this.spanDirective = map(
      withSource(directiveParser(bracedBodyContent, { includeStartChar: false })),
      ([parsed, source]) =>
        applyDirective<Span, SpanDirectiveContext>({
          registry: spans,
          parsed,
          kind: "span",
          createContext: (parts, cursor) => ({
            ...baseContext(parts, cursor),
            parser: { parseSpans: (s) => recursive.recursiveSpans(s) },
          }),
          createPlaceholder: spanPlaceholder,
          createInvalid: (message) => invalidSpan(message, literal("@" + source)),
        })
    );

    this.blockDirective = map(
      withSource(directiveParser(blockBodyContent, { includeStartChar: true })),
      ([parsed, source]) =>
        applyDirective<Block, BlockDirectiveContext>({
          registry: blocks,
          parsed,
          kind: "block",
          createContext: (parts, cursor) => ({
            ...baseContext(parts, cursor),
            parser: {
              parseBlocks: (s) => recursive.recursiveBlocks(s),
              parseInline: (s) => recursive.recursiveSpans(s),
            },
          }),
          createPlaceholder: blockPlaceholder,
          createInvalid: (message) => invalidBlock(message, literalBlock(source)),
        })
    );

    this.spanParsers = new Map([
      ["{", this.contextReference],
      ["@", this.spanDirective],
    ]);
  }
}
