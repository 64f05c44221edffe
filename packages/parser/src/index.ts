/**
 * @marklet/parser
 *
 * Position-tracked parser combinators and the delimited text scanner that
 * the markup and style sheet parsers are built on.
 *
 * @module
 */

// Core types
export type { ParseResult, Parser } from "./types.js";

// Combinator API
export {
  ParseError,
  mkParser,
  parseAllWith,
  ok,
  fail,
  lineCol,
  literal,
  char,
  anyChar,
  seq,
  seq3,
  skipLeft,
  skipRight,
  alt,
  many,
  many1,
  optional,
  not,
  map,
  as,
  validate,
  withSource,
  between,
} from "./combinators.js";

// Text parsers
export {
  Characters,
  DelimitedText,
  anyOf,
  anyBut,
  anyIn,
  anyWhile,
  ws,
  wsOrNl,
  delimitedBy,
  untilEnd,
  restOfLine,
  indentedBlock,
  type ScanResult,
  type IndentedBlockOptions,
} from "./text.js";
