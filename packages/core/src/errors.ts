/**
 * Error classes thrown by marklet packages.
 *
 * Parse failures inside parsers are plain `ParseResult` values; these are
 * only thrown across public API boundaries.
 */

export class MarkletError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MarkletError";
  }
}

/** Two directives registered under one name, or an invalid directive name. */
export class DirectiveRegistryError extends MarkletError {
  readonly directiveName: string;

  constructor(directiveName: string, message: string) {
    super(message);
    this.name = "DirectiveRegistryError";
    this.directiveName = directiveName;
  }
}

/** A deferred directive resolver was invoked more than once. */
export class PlaceholderError extends MarkletError {
  constructor(message: string) {
    super(message);
    this.name = "PlaceholderError";
  }
}

/** A style sheet could not be parsed. */
export class StyleSheetError extends MarkletError {
  readonly path: string;
  readonly pos: number;

  constructor(path: string, pos: number, expected: string) {
    super(`Invalid style sheet ${path} at position ${pos}: expected ${expected}`);
    this.name = "StyleSheetError";
    this.path = path;
    this.pos = pos;
  }
}
