/**
 * Core types for @marklet/parser
 *
 * Defines the parse result and the parser interface every combinator returns.
 */

/** Result of a parse attempt: success with a value or failure with what was expected. */
export type ParseResult<T> =
  | { readonly ok: true; readonly value: T; readonly pos: number }
  | { readonly ok: false; readonly pos: number; readonly expected: string };

/** A parser is a function from (input, position) to ParseResult. */
export interface Parser<T> {
  /** Attempt to parse starting at `pos` (default 0). */
  parse(input: string, pos?: number): ParseResult<T>;
  /** Parse the full input, throwing if not consumed entirely. */
  parseAll(input: string): T;
}
