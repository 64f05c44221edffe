/**
 * Parser for the CSS subset used to style marklet documents.
 *
 * Supported are type, id and class selectors, the descendant and child
 * combinators, selector groups and comments. Attribute selectors, pseudo
 * classes, namespaces and media queries are not.
 */

import { config, createLogger, StyleSheetError } from "@marklet/core";
import { inlineText } from "@marklet/markup";
import {
  alt,
  anyOf,
  anyWhile,
  as,
  between,
  char,
  delimitedBy,
  literal,
  many,
  many1,
  map,
  seq,
  seq3,
  skipLeft,
  skipRight,
  ws,
} from "@marklet/parser";
import type { Parser } from "@marklet/parser";
import { selector as makeSelector, elementType, id, styleName } from "./styles.js";
import type { Predicate, Selector, StyleDeclaration, StyleDeclarationSet } from "./styles.js";

const log = createLogger("css");

export type Combinator = "child" | "descendant";

export interface Style {
  readonly name: string;
  readonly value: string;
}

/** Whitespace including newlines and carriage returns. */
export const wsOrNl: Parser<string> = anyOf(" ", "\t", "\n", "\r");

const isLetter = (c: string): boolean => /\p{L}/u.test(c);
const isDigit = (c: string): boolean => c >= "0" && c <= "9";

/**
 * A letter run followed by groups of letters and digits, each optionally
 * preceded by a single `-` or `_`.
 */
export const styleRefName: Parser<string> = map(
  seq(
    anyWhile(isLetter, "letter").min(1),
    many(
      map(
        seq(anyOf("-", "_").max(1), anyWhile((c) => isLetter(c) || isDigit(c), "letter or digit").min(1)),
        ([symbol, rest]) => symbol + rest
      )
    )
  ),
  ([start, rest]) => start + rest.join("")
);

export const combinator: Parser<Combinator> = alt(
  as<[string, string, string], Combinator>(seq3(ws, char(">"), ws), "child"),
  as<string, Combinator>(ws.min(1), "descendant")
);

const typeSelector: Parser<Predicate[]> = alt(
  map(styleRefName, (name) => [elementType(name)]),
  as<string, Predicate[]>(char("*"), [])
);

export const predicate: Parser<Predicate> = alt(
  map(skipLeft(char("#"), styleRefName), id),
  map(skipLeft(char("."), styleRefName), styleName)
);

/** A selector without combinators, such as `p#title.note`. */
export const simpleSelectorSequence: Parser<Selector> = map(
  alt(
    map(seq(typeSelector, many(predicate)), ([types, preds]) => [...types, ...preds]),
    many1(predicate)
  ),
  (preds) => makeSelector(preds)
);

export const selector: Parser<Selector> = map(
  seq(simpleSelectorSequence, many(seq(combinator, simpleSelectorSequence))),
  ([first, rest]) =>
    rest.reduce(
      (parent, [comb, sel]) => makeSelector(sel.predicates, { selector: parent, immediate: comb === "child" }),
      first
    )
);

export const selectorGroup: Parser<Selector[]> = map(
  seq(selector, many(skipLeft(seq3(ws, char(","), ws), selector))),
  ([first, rest]) => [first, ...rest]
);

/** Comments are dropped from style values, which may not contain `}`. */
export const styleValue: Parser<string> = inlineText(
  delimitedBy(";").failOn("}"),
  new Map([["/", as(seq3(char("*"), delimitedBy("*/"), wsOrNl), "")]])
);

export const style: Parser<Style> = map(
  seq(skipRight(styleRefName, seq3(ws, char(":"), ws)), skipRight(styleValue, wsOrNl)),
  ([name, value]) => ({ name, value })
);

export const comment: Parser<null> = as(seq3(literal("/*"), delimitedBy("*/"), wsOrNl), null);

const styleOrComment: Parser<Style | null> = alt(comment, style);

/** A selector group with its declaration block, one declaration per selector. */
export const styleDeclarations: Parser<Omit<StyleDeclaration, "order">[]> = map(
  seq(
    skipRight(selectorGroup, seq3(wsOrNl, char("{"), wsOrNl)),
    skipRight(many(styleOrComment), seq(wsOrNl, char("}")))
  ),
  ([selectors, items]) => {
    const styles: Record<string, string> = {};
    for (const item of items) {
      if (item !== null) styles[item.name] = item.value;
    }
    return selectors.map((sel) => ({ selector: sel, styles }));
  }
);

const separator: Parser<null[]> = skipLeft(wsOrNl, many(comment));

/**
 * Parse a complete style sheet.
 *
 * Malformed input throws a `StyleSheetError` unless `css.onError` is set
 * to `"skip"`, in which case the malformed block is dropped up to its
 * closing brace and a warning is logged.
 */
export function parseStyleSheet(input: string, path: string): StyleDeclarationSet {
  const skip = config.getChoice("css.onError", ["fail", "skip"] as const, "fail") === "skip";
  const declarations: StyleDeclaration[] = [];

  const skipSeparator = (at: number): number => {
    const r = separator.parse(input, at);
    return r.ok ? r.pos : at;
  };

  let pos = skipSeparator(0);
  while (pos < input.length) {
    const r = styleDeclarations.parse(input, pos);
    if (r.ok) {
      for (const decl of r.value) declarations.push({ ...decl, order: declarations.length });
      pos = skipSeparator(r.pos);
      continue;
    }
    if (!skip) throw new StyleSheetError(path, r.pos, r.expected);

    const close = input.indexOf("}", r.pos);
    log.warn(`skipping malformed declarations in ${path} at position ${r.pos}: expected ${r.expected}`);
    pos = close === -1 ? input.length : skipSeparator(close + 1);
  }

  return { paths: [path], declarations };
}

/** Parse the content of a single `{ ... }` declaration block, without braces. */
export function parseStyles(input: string): Record<string, string> {
  const styles: Record<string, string> = {};
  for (const item of between(wsOrNl, many(styleOrComment), wsOrNl).parseAll(input)) {
    if (item !== null) styles[item.name] = item.value;
  }
  return styles;
}
