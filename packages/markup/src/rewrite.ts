/**
 * Rewrite pass
 *
 * Runs once the whole document set exists. Every placeholder is resolved
 * exactly once with the document cursor and replaced by its result, and
 * context references are replaced by their values. The input tree is left
 * untouched.
 */

import { config, createLogger } from "@marklet/core";
import { createCursor } from "./cursor.js";
import type { Document, DocumentCursor } from "./cursor.js";
import {
  blockSequence,
  emphasized,
  invalidBlock,
  invalidSpan,
  invalidTemplateSpan,
  literal,
  literalBlock,
  paragraph,
  strong,
  templateElement,
  templateRoot,
  templateSpanSequence,
  templateString,
  text,
} from "./elements.js";
import type { Block, Span, TemplateRoot, TemplateSpan } from "./elements.js";
import { failure, success } from "./directive/result.js";
import type { DirectiveResult } from "./directive/result.js";

const log = createLogger("rewrite");

export const NESTED_PLACEHOLDER_MESSAGE = "Directive resolver produced another unresolved placeholder";

function missingReference(ref: string): string {
  return `Missing required reference: '${ref}'`;
}

function renderMissingAsEmpty(): boolean {
  return config.getChoice("references.onMissing", ["invalid", "empty"] as const, "invalid") === "empty";
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function resolve<E>(
  resolver: (cursor: DocumentCursor) => E,
  cursor: DocumentCursor,
  kind: string
): DirectiveResult<E> {
  log.debug(`resolving ${kind} placeholder in ${cursor.path}`);
  try {
    return success(resolver(cursor));
  } catch (error) {
    log.warn(`${kind} resolver failed`, error);
    return failure([describeError(error)]);
  }
}

/**
 * Tree walker. Results of resolvers are walked again with `resolved` set,
 * so references inside them still get their values while a placeholder
 * anywhere in them is rejected.
 */
class Rewriter {
  constructor(
    private readonly cursor: DocumentCursor,
    private readonly resolved = false
  ) {}

  private get nested(): Rewriter {
    return this.resolved ? this : new Rewriter(this.cursor, true);
  }

  span(span: Span): Span {
    switch (span.type) {
      case "text":
      case "literal":
      case "invalidSpan":
        return span;
      case "emphasized":
        return emphasized(this.spans(span.content));
      case "strong":
        return strong(this.spans(span.content));
      case "spanSequence":
        return { ...span, content: this.spans(span.content) };
      case "retraction":
        return this.span(span.fallback);
      case "contextReference": {
        const value = this.cursor.resolveReference(span.ref);
        if (value !== undefined) return text(value);
        if (renderMissingAsEmpty()) return text("");
        return invalidSpan(missingReference(span.ref), literal(`{{${span.ref}}}`));
      }
      case "spanPlaceholder": {
        if (this.resolved) return invalidSpan(NESTED_PLACEHOLDER_MESSAGE, literal(""));
        const result = resolve(span.resolve, this.cursor, "span");
        if (!result.ok) return invalidSpan(result.messages.join(", "), literal(""));
        return this.nested.span(result.value);
      }
    }
  }

  spans(spans: readonly Span[]): Span[] {
    return spans.map((s) => this.span(s));
  }

  block(block: Block): Block {
    switch (block.type) {
      case "literalBlock":
      case "invalidBlock":
        return block;
      case "paragraph":
        return block.options
          ? { ...block, content: this.spans(block.content) }
          : paragraph(this.spans(block.content));
      case "blockSequence":
        return block.options
          ? { ...block, content: this.blocks(block.content) }
          : blockSequence(this.blocks(block.content));
      case "blockPlaceholder": {
        if (this.resolved) return invalidBlock(NESTED_PLACEHOLDER_MESSAGE, literalBlock(""));
        const result = resolve(block.resolve, this.cursor, "block");
        if (!result.ok) return invalidBlock(result.messages.join(", "), literalBlock(""));
        return this.nested.block(result.value);
      }
    }
  }

  blocks(blocks: readonly Block[]): Block[] {
    return blocks.map((b) => this.block(b));
  }

  templateSpan(span: TemplateSpan): TemplateSpan {
    switch (span.type) {
      case "templateString":
      case "invalidTemplateSpan":
        return span;
      case "templateElement":
        return templateElement(isBlock(span.element) ? this.block(span.element) : this.span(span.element));
      case "templateSpanSequence":
        return templateSpanSequence(this.templateSpans(span.content));
      case "templateContextReference": {
        const value = this.cursor.resolveReference(span.ref);
        if (value !== undefined) return templateString(value);
        if (renderMissingAsEmpty()) return templateString("");
        return invalidTemplateSpan(missingReference(span.ref), templateString(`{{${span.ref}}}`));
      }
      case "templatePlaceholder": {
        if (this.resolved) return invalidTemplateSpan(NESTED_PLACEHOLDER_MESSAGE, templateString(""));
        const result = resolve(span.resolve, this.cursor, "template");
        if (!result.ok) return invalidTemplateSpan(result.messages.join(", "), templateString(""));
        return this.nested.templateSpan(result.value);
      }
    }
  }

  templateSpans(spans: readonly TemplateSpan[]): TemplateSpan[] {
    return spans.map((s) => this.templateSpan(s));
  }
}

function isBlock(element: Span | Block): element is Block {
  switch (element.type) {
    case "paragraph":
    case "literalBlock":
    case "blockSequence":
    case "invalidBlock":
    case "blockPlaceholder":
      return true;
    default:
      return false;
  }
}

/** Rewrite a document's blocks. Without a cursor, one for the document alone is used. */
export function rewriteDocument(document: Document, cursor: DocumentCursor = createCursor(document)): Document {
  return { ...document, content: new Rewriter(cursor).blocks(document.content) };
}

export function rewriteTemplate(root: TemplateRoot, cursor: DocumentCursor): TemplateRoot {
  return templateRoot(new Rewriter(cursor).templateSpans(root.content));
}

export function rewriteSpans(spans: readonly Span[], cursor: DocumentCursor): Span[] {
  return new Rewriter(cursor).spans(spans);
}
