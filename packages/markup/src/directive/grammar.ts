/**
 * Directive declaration grammar
 *
 * ```
 * @:name defaultAttr? name=value* .
 * @:name ...: default body ~other: named body
 * ```
 *
 * The grammar only collects raw parts. Duplicate keys are legal here and
 * rejected when the directive is applied. The body content parser is
 * supplied by the surrounding grammar, which is why block and span
 * directives share everything up to the body.
 */

import {
  alt,
  anyBut,
  anyIn,
  as,
  between,
  char,
  delimitedBy,
  indentedBlock,
  literal,
  many,
  map,
  not,
  optional,
  seq,
  seq3,
  skipLeft,
  skipRight,
  validate,
  ws,
  wsOrNl,
} from "@marklet/parser";
import type { Parser } from "@marklet/parser";
import { escapedUntil, inlineText } from "../inline.js";
import type { NestedParsers } from "../inline.js";
import { attributeKey, bodyKey } from "./keys.js";
import type { Part } from "./keys.js";

/** The parsed but unprocessed content of a directive. */
export interface ParsedDirective {
  readonly name: string;
  readonly parts: readonly Part[];
}

export interface DirectiveParserOptions {
  /** Whether the leading `@` is parsed here rather than by a trigger. */
  readonly includeStartChar: boolean;
}

// ---------------------------------------------------------------------------
// Declaration
// ---------------------------------------------------------------------------

/** A letter followed by letters, digits, `-` or `_`. */
export const nameDecl: Parser<string> = map(
  seq(anyIn("a-z", "A-Z").take(1), anyIn("a-z", "A-Z", "0-9", "-", "_")),
  ([first, rest]) => first + rest
);

const attrName: Parser<string> = skipRight(nameDecl, seq3(wsOrNl, char("="), wsOrNl));

const attrValue: Parser<string> = alt(
  skipLeft(char('"'), escapedUntil('"')),
  anyBut(" ", "\t", "\n", ".", ":").min(1)
);

const defaultAttribute: Parser<Part> = map(skipLeft(not(attrName), attrValue), (content) => ({
  key: attributeKey(),
  content,
}));

const attribute: Parser<Part> = map(seq(attrName, attrValue), ([name, content]) => ({
  key: attributeKey(name),
  content,
}));

/**
 * `:name` with its attributes, without the body marker. The default
 * attribute, when present, comes first.
 */
export const declaration: Parser<ParsedDirective> = map(
  seq3(
    between(char(":"), nameDecl, wsOrNl),
    optional(skipRight(defaultAttribute, wsOrNl)),
    skipRight(many(skipLeft(wsOrNl, attribute)), ws)
  ),
  ([name, defaultAttr, attrs]) => ({
    name,
    parts: defaultAttr === null ? attrs : [defaultAttr, ...attrs],
  })
);

// ---------------------------------------------------------------------------
// Bodies
// ---------------------------------------------------------------------------

const bodyName: Parser<string> = between(char("~"), nameDecl, seq(ws, char(":")));

const noBody: Parser<Part[]> = as<string, Part[]>(char("."), []);

/**
 * A complete directive: declaration followed by `.` (no body) or by `:`
 * and one or more bodies, the first of which may be the default body.
 */
export function directiveParser(
  bodyContent: Parser<string>,
  options: DirectiveParserOptions
): Parser<ParsedDirective> {
  const defaultBody: Parser<Part> = map(
    skipLeft(not(skipLeft(wsOrNl, bodyName)), bodyContent),
    (content) => ({ key: bodyKey(), content })
  );

  const namedBody: Parser<Part> = map(
    seq(skipLeft(wsOrNl, bodyName), bodyContent),
    ([name, content]) => ({ key: bodyKey(name), content })
  );

  const bodies: Parser<Part[]> = map(
    skipLeft(char(":"), seq(alt(defaultBody, namedBody), many(namedBody))),
    ([first, rest]) => [first, ...rest]
  );

  const decl = options.includeStartChar ? skipLeft(char("@"), declaration) : declaration;

  return map(seq(decl, alt(noBody, bodies)), ([parsed, bodyParts]) => ({
    name: parsed.name,
    parts: [...parsed.parts, ...bodyParts],
  }));
}

/** Indented block body, trimmed. A blank body is rejected. */
export const blockBodyContent: Parser<string> = validate(indentedBlock(), (block) => {
  const trimmed = block.trim();
  return trimmed === ""
    ? { ok: false as const, message: "empty body" }
    : { ok: true as const, value: trimmed };
});

// Balanced `{...}` groups, reproduced verbatim.
const nestedBraces: NestedParsers<string> = new Map([
  ["{", map(inlineText(delimitedBy("}"), () => nestedBraces), (inner) => `{${inner}}`)],
]);

/**
 * `{ ... }` body with optional leading whitespace. Nested braces balance
 * before the closing brace, so `{{ ref }}` and `{a {b} c}` stay intact.
 */
export const bracedBodyContent: Parser<string> = skipLeft(
  seq(wsOrNl, char("{")),
  inlineText(delimitedBy("}"), nestedBraces)
);

// ---------------------------------------------------------------------------
// References
// ---------------------------------------------------------------------------

/** Reference path such as `document.title` or `config.version`. */
export const refName: Parser<string> = anyIn("a-z", "A-Z", "0-9", "_", "-", ".").min(1);

/**
 * The remainder of a `{{ ref }}` reference after its first brace, which
 * is consumed by the trigger.
 */
export function reference<T>(create: (ref: string) => T): Parser<T> {
  return map(between(seq(char("{"), ws), refName, seq(ws, literal("}}"))), create);
}
