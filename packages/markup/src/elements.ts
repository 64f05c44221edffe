/**
 * Document tree model for @marklet/markup
 *
 * Spans, blocks and template spans are discriminated unions on `type`.
 * Only the node kinds the directive and inline engines produce or consume
 * live here; concrete dialects add their own through the generic
 * `spanSequence` / `blockSequence` containers or their own unions.
 */

import type { DocumentCursor } from "./cursor.js";

// ============================================================================
// Shared
// ============================================================================

export interface Options {
  readonly id?: string;
  readonly styles?: readonly string[];
}

export type MessageLevel = "debug" | "info" | "warning" | "error";

export interface SystemMessage {
  readonly type: "systemMessage";
  readonly level: MessageLevel;
  readonly content: string;
}

// ============================================================================
// Spans
// ============================================================================

export interface Text {
  readonly type: "text";
  readonly content: string;
  readonly options?: Options;
}

export interface Emphasized {
  readonly type: "emphasized";
  readonly content: readonly Span[];
}

export interface Strong {
  readonly type: "strong";
  readonly content: readonly Span[];
}

/** Literal (verbatim) span text. */
export interface Literal {
  readonly type: "literal";
  readonly content: string;
}

export interface SpanSequence {
  readonly type: "spanSequence";
  readonly content: readonly Span[];
  readonly options?: Options;
}

export interface InvalidSpan {
  readonly type: "invalidSpan";
  readonly message: SystemMessage;
  readonly fallback: Span;
}

/** A span computed once the whole document tree exists. */
export interface SpanPlaceholder {
  readonly type: "spanPlaceholder";
  readonly resolve: (cursor: DocumentCursor) => Span;
}

/** `{{ ref }}` in markup, resolved against the cursor on rewrite. */
export interface ContextReference {
  readonly type: "contextReference";
  readonly ref: string;
}

/**
 * Builder instruction: drop `dropLength` characters of the preceding text
 * and put `replacement` in their place, or append `fallback` when there is
 * not enough preceding text. Never part of a finished tree.
 */
export interface Retraction {
  readonly type: "retraction";
  readonly dropLength: number;
  readonly replacement: Span;
  readonly fallback: Span;
}

export type Span =
  | Text
  | Emphasized
  | Strong
  | Literal
  | SpanSequence
  | InvalidSpan
  | SpanPlaceholder
  | ContextReference
  | Retraction;

// ============================================================================
// Blocks
// ============================================================================

export interface Paragraph {
  readonly type: "paragraph";
  readonly content: readonly Span[];
  readonly options?: Options;
}

export interface LiteralBlock {
  readonly type: "literalBlock";
  readonly content: string;
}

export interface BlockSequence {
  readonly type: "blockSequence";
  readonly content: readonly Block[];
  readonly options?: Options;
}

export interface InvalidBlock {
  readonly type: "invalidBlock";
  readonly message: SystemMessage;
  readonly fallback: Block;
}

export interface BlockPlaceholder {
  readonly type: "blockPlaceholder";
  readonly resolve: (cursor: DocumentCursor) => Block;
}

export type Block = Paragraph | LiteralBlock | BlockSequence | InvalidBlock | BlockPlaceholder;

// ============================================================================
// Templates
// ============================================================================

export interface TemplateString {
  readonly type: "templateString";
  readonly content: string;
}

/** A markup element embedded in a template. */
export interface TemplateElement {
  readonly type: "templateElement";
  readonly element: Span | Block;
}

export interface TemplateSpanSequence {
  readonly type: "templateSpanSequence";
  readonly content: readonly TemplateSpan[];
}

export interface InvalidTemplateSpan {
  readonly type: "invalidTemplateSpan";
  readonly message: SystemMessage;
  readonly fallback: TemplateString;
}

export interface TemplatePlaceholder {
  readonly type: "templatePlaceholder";
  readonly resolve: (cursor: DocumentCursor) => TemplateSpan;
}

export interface TemplateContextReference {
  readonly type: "templateContextReference";
  readonly ref: string;
}

export type TemplateSpan =
  | TemplateString
  | TemplateElement
  | TemplateSpanSequence
  | InvalidTemplateSpan
  | TemplatePlaceholder
  | TemplateContextReference;

export interface TemplateRoot {
  readonly type: "templateRoot";
  readonly content: readonly TemplateSpan[];
}

/** Elements that stand in for a directive that failed. */
export type InvalidElement = InvalidSpan | InvalidBlock | InvalidTemplateSpan;

/** Elements replaced by the rewrite pass. */
export type Placeholder = SpanPlaceholder | BlockPlaceholder | TemplatePlaceholder;

// ============================================================================
// Constructors
// ============================================================================

export function text(content: string, options?: Options): Text {
  return options ? { type: "text", content, options } : { type: "text", content };
}

export function emphasized(content: readonly Span[]): Emphasized {
  return { type: "emphasized", content };
}

export function strong(content: readonly Span[]): Strong {
  return { type: "strong", content };
}

export function literal(content: string): Literal {
  return { type: "literal", content };
}

export function spanSequence(content: readonly Span[]): SpanSequence {
  return { type: "spanSequence", content };
}

export function systemMessage(level: MessageLevel, content: string): SystemMessage {
  return { type: "systemMessage", level, content };
}

export function invalidSpan(message: string, fallback: Span): InvalidSpan {
  return { type: "invalidSpan", message: systemMessage("error", message), fallback };
}

export function spanPlaceholder(resolve: (cursor: DocumentCursor) => Span): SpanPlaceholder {
  return { type: "spanPlaceholder", resolve };
}

export function contextReference(ref: string): ContextReference {
  return { type: "contextReference", ref };
}

export function retraction(dropLength: number, replacement: Span, fallback: Span): Retraction {
  return { type: "retraction", dropLength, replacement, fallback };
}

export function paragraph(content: readonly Span[]): Paragraph {
  return { type: "paragraph", content };
}

export function literalBlock(content: string): LiteralBlock {
  return { type: "literalBlock", content };
}

export function blockSequence(content: readonly Block[]): BlockSequence {
  return { type: "blockSequence", content };
}

export function invalidBlock(message: string, fallback: Block): InvalidBlock {
  return { type: "invalidBlock", message: systemMessage("error", message), fallback };
}

export function blockPlaceholder(resolve: (cursor: DocumentCursor) => Block): BlockPlaceholder {
  return { type: "blockPlaceholder", resolve };
}

export function templateString(content: string): TemplateString {
  return { type: "templateString", content };
}

export function templateElement(element: Span | Block): TemplateElement {
  return { type: "templateElement", element };
}

export function templateSpanSequence(content: readonly TemplateSpan[]): TemplateSpanSequence {
  return { type: "templateSpanSequence", content };
}

export function invalidTemplateSpan(message: string, fallback: TemplateString): InvalidTemplateSpan {
  return { type: "invalidTemplateSpan", message: systemMessage("error", message), fallback };
}

export function templatePlaceholder(
  resolve: (cursor: DocumentCursor) => TemplateSpan
): TemplatePlaceholder {
  return { type: "templatePlaceholder", resolve };
}

export function templateContextReference(ref: string): TemplateContextReference {
  return { type: "templateContextReference", ref };
}

export function templateRoot(content: readonly TemplateSpan[]): TemplateRoot {
  return { type: "templateRoot", content };
}

/** Plain text without options; the only kind of span the builders merge. */
export function isPlainText(span: Span): span is Text {
  return span.type === "text" && span.options === undefined;
}
