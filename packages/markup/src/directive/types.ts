/**
 * Directive and registry types.
 *
 * A directive is a named implementation that turns the raw parts of a
 * parsed directive into one tree element. Registries are separate per
 * element kind: spans, blocks and template spans.
 */

import { DirectiveRegistryError } from "@marklet/core";
import type { DocumentCursor } from "../cursor.js";
import type { Block, Span, TemplateSpan } from "../elements.js";
import type { PartKey, PartMap } from "./keys.js";
import type { DirectiveResult } from "./result.js";

// ============================================================================
// Contexts
// ============================================================================

/** What a directive sees of its parsed parts and of the document. */
export interface DirectiveContext {
  /** Raw content of a part, or undefined when it was not declared. */
  part(key: PartKey): string | undefined;
  readonly parts: PartMap;
  /** Only set for directives that require context, once the tree exists. */
  readonly cursor: DocumentCursor | undefined;
}

export interface SpanDirectiveContext extends DirectiveContext {
  readonly parser: {
    parseSpans(source: string): Span[];
  };
}

export interface BlockDirectiveContext extends DirectiveContext {
  readonly parser: {
    parseBlocks(source: string): Block[];
    parseInline(source: string): Span[];
  };
}

export interface TemplateDirectiveContext extends DirectiveContext {
  readonly parser: {
    parseTemplate(source: string): TemplateSpan[];
  };
}

// ============================================================================
// Directives
// ============================================================================

export interface Directive<E, C extends DirectiveContext> {
  readonly name: string;
  /**
   * Directives requiring context only run during the rewrite pass, when a
   * document cursor is available.
   */
  readonly requiresContext: boolean;
  apply(context: C): DirectiveResult<E>;
}

export type SpanDirective = Directive<Span, SpanDirectiveContext>;
export type BlockDirective = Directive<Block, BlockDirectiveContext>;
export type TemplateDirective = Directive<TemplateSpan, TemplateDirectiveContext>;

/** Directive kind label used in messages. */
export type DirectiveKind = "span" | "block" | "template";

// ============================================================================
// Registry
// ============================================================================

export type DirectiveRegistry<D> = ReadonlyMap<string, D>;

const DIRECTIVE_NAME = /^[A-Za-z][A-Za-z0-9_-]*$/;

/**
 * Build an immutable registry. Names must be valid directive names and
 * unique within the registry.
 */
export function createRegistry<D extends { readonly name: string }>(
  directives: Iterable<D>
): DirectiveRegistry<D> {
  const entries = new Map<string, D>();
  for (const directive of directives) {
    if (!DIRECTIVE_NAME.test(directive.name)) {
      throw new DirectiveRegistryError(
        directive.name,
        `Invalid directive name '${directive.name}'`
      );
    }
    if (entries.has(directive.name)) {
      throw new DirectiveRegistryError(
        directive.name,
        `Directive '${directive.name}' is already registered`
      );
    }
    entries.set(directive.name, directive);
  }
  return entries;
}
