/**
 * @marklet/markup
 *
 * Document tree model, the generic inline dispatch engine with its result
 * builders, and the directive machinery: declaration grammar, application
 * engine, typed definitions, markup and template directive parsers, and
 * the rewrite pass resolving deferred directives.
 *
 * @module
 */

// Tree model
export * from "./elements.js";
export {
  createCursor,
  document,
  documentTree,
  type Document,
  type DocumentConfig,
  type DocumentCursor,
  type DocumentTree,
} from "./cursor.js";

// Inline engine
export { SpanBuilder, TextBuilder, TemplateSpanBuilder, type ResultBuilder } from "./builders.js";
export {
  inline,
  inlineSpans,
  inlineText,
  escapedText,
  escapedUntil,
  type NestedParsers,
  type LazyParsers,
} from "./inline.js";

// Directives
export {
  attributeKey,
  bodyKey,
  describePartKey,
  partKeyId,
  PartMap,
  type Part,
  type PartKey,
  type PartKind,
} from "./directive/keys.js";
export { combine, failure, success, type DirectiveResult } from "./directive/result.js";
export {
  createRegistry,
  type BlockDirective,
  type BlockDirectiveContext,
  type Directive,
  type DirectiveContext,
  type DirectiveKind,
  type DirectiveRegistry,
  type SpanDirective,
  type SpanDirectiveContext,
  type TemplateDirective,
  type TemplateDirectiveContext,
} from "./directive/types.js";
export {
  blockBodyContent,
  bracedBodyContent,
  declaration,
  directiveParser,
  nameDecl,
  reference,
  refName,
  type DirectiveParserOptions,
  type ParsedDirective,
} from "./directive/grammar.js";
export { applyDirective, baseContext, buildPartMap, type ApplyDirectiveOptions } from "./directive/apply.js";
export {
  KeyedPart,
  DirectivePart,
  attribute,
  blockBody,
  blockDirective,
  body,
  converters,
  cursor,
  spanBody,
  spanDirective,
  templateBody,
  templateDirective,
  type DirectiveDefinition,
} from "./directive/define.js";
export {
  MarkupDirectiveParsers,
  type MarkupDirectiveRegistries,
  type RecursiveParsers,
} from "./directive/markup.js";
export { TemplateParsers, type TemplateRegistries } from "./directive/template.js";

// Rewrite
export { NESTED_PLACEHOLDER_MESSAGE, rewriteDocument, rewriteSpans, rewriteTemplate } from "./rewrite.js";
