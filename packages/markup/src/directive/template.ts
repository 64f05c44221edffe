/**
 * Template parsing: literal template text with `{{ ref }}` references and
 * `@:name` template directives.
 */

import { map, untilEnd, withSource } from "@marklet/parser";
import type { Parser } from "@marklet/parser";
import { TemplateSpanBuilder } from "../builders.js";
import {
  invalidTemplateSpan,
  templateContextReference,
  templatePlaceholder,
  templateRoot,
  templateString,
} from "../elements.js";
import type { TemplateRoot, TemplateSpan } from "../elements.js";
import { inline } from "../inline.js";
import type { NestedParsers } from "../inline.js";
import { applyDirective, baseContext } from "./apply.js";
import { bracedBodyContent, directiveParser, reference } from "./grammar.js";
import type { DirectiveRegistry, TemplateDirective, TemplateDirectiveContext } from "./types.js";

export interface TemplateRegistries {
  readonly templates?: DirectiveRegistry<TemplateDirective>;
}

export class TemplateParsers {
  readonly templateReference: Parser<TemplateSpan>;
  readonly templateDirective: Parser<TemplateSpan>;
  readonly spanParsers: NestedParsers<TemplateSpan>;
  /** A whole template, up to the end of input. */
  readonly templateSpans: Parser<TemplateSpan[]>;

  constructor(registries: TemplateRegistries = {}) {
    const templates: DirectiveRegistry<TemplateDirective> = registries.templates ?? new Map();

    this.templateReference = reference((ref): TemplateSpan => templateContextReference(ref));

    this.templateDirective = map(
      withSource(directiveParser(bracedBodyContent, { includeStartChar: false })),
      ([parsed, source]) =>
        applyDirective<TemplateSpan, TemplateDirectiveContext>({
          registry: templates,
          parsed,
          kind: "template",
          createContext: (parts, cursor) => ({
            ...baseContext(parts, cursor),
            parser: { parseTemplate: (s) => this.parseSpans(s) },
          }),
          createPlaceholder: templatePlaceholder,
          createInvalid: (message) => invalidTemplateSpan(message, templateString("@" + source)),
        })
    );

    this.spanParsers = new Map([
      ["{", this.templateReference],
      ["@", this.templateDirective],
    ]);

    this.templateSpans = inline(untilEnd(), this.spanParsers, () => new TemplateSpanBuilder());
  }

  parseSpans(source: string): TemplateSpan[] {
    return this.templateSpans.parseAll(source);
  }

  parseTemplate(source: string): TemplateRoot {
    return templateRoot(this.parseSpans(source));
  }
}
