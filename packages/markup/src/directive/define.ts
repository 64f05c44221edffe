/**
 * Typed directive definitions
 *
 * Directives are declared from directive parts that read and convert the raw
 * attribute and body strings. Part errors are collected, so a directive
 * missing two attributes reports both.
 *
 * @example
 * ```typescript
 * const link = spanDirective({
 *   name: "link",
 *   parts: attribute().and(attribute("title").optional()),
 *   run: ([href, title]) => text(title ?? href),
 * });
 * ```
 */

import type { DocumentCursor } from "../cursor.js";
import type { Block, Span, TemplateSpan } from "../elements.js";
import { attributeKey, bodyKey, describePartKey } from "./keys.js";
import type { PartKey } from "./keys.js";
import { combine, failure, success } from "./result.js";
import type { DirectiveResult } from "./result.js";
import type {
  BlockDirective,
  BlockDirectiveContext,
  Directive,
  DirectiveContext,
  SpanDirective,
  SpanDirectiveContext,
  TemplateDirective,
  TemplateDirectiveContext,
} from "./types.js";

// ============================================================================
// Directive parts
// ============================================================================

/** Extracts one typed value from a directive context. */
export class DirectivePart<T, C extends DirectiveContext = DirectiveContext> {
  constructor(
    /** Whether evaluating this part needs the document cursor. */
    readonly requiresContext: boolean,
    readonly extract: (context: C) => DirectiveResult<T>
  ) {}

  map<U>(f: (value: T) => U): DirectivePart<U, C> {
    return new DirectivePart<U, C>(this.requiresContext, (context: C) => {
      const result = this.extract(context);
      return result.ok ? success(f(result.value)) : result;
    });
  }

  /** Combine with another part; failures of both are reported. */
  and<U, C2 extends DirectiveContext>(other: DirectivePart<U, C2>): DirectivePart<[T, U], C & C2> {
    return new DirectivePart<[T, U], C & C2>(this.requiresContext || other.requiresContext, (context: C & C2) =>
      combine(this.extract(context), other.extract(context))
    );
  }
}

function convertingErrors<T>(key: PartKey, result: DirectiveResult<T>): DirectiveResult<T> {
  if (result.ok) return result;
  return failure(result.messages.map((m) => `error converting ${describePartKey(key)}: ${m}`));
}

/** A part reading the raw content of one attribute or body. */
export class KeyedPart<T, C extends DirectiveContext = DirectiveContext> extends DirectivePart<T, C> {
  constructor(
    readonly key: PartKey,
    private readonly read: (raw: string, context: C) => DirectiveResult<T>
  ) {
    super(false, (context: C) => {
      const raw = context.part(key);
      if (raw === undefined) return failure([`required ${describePartKey(key)} is missing`]);
      return convertingErrors(key, read(raw, context));
    });
  }

  /** Convert the value; failures are reported against this part's key. */
  convert<U>(f: (value: T) => DirectiveResult<U>): KeyedPart<U, C> {
    return new KeyedPart<U, C>(this.key, (raw: string, context: C) => {
      const result = this.read(raw, context);
      return result.ok ? f(result.value) : result;
    });
  }

  /** Yield undefined instead of failing when the part is absent. */
  optional(): DirectivePart<T | undefined, C> {
    return new DirectivePart<T | undefined, C>(false, (context) => {
      const raw = context.part(this.key);
      if (raw === undefined) return success(undefined);
      return convertingErrors(this.key, this.read(raw, context));
    });
  }
}

// ============================================================================
// Part factories
// ============================================================================

/** An attribute as a string. Without a name, the default attribute. */
export function attribute(name?: string): KeyedPart<string> {
  return new KeyedPart<string>(attributeKey(name), (raw) => success(raw));
}

/** A body as its raw source string. */
export function body(name?: string): KeyedPart<string> {
  return new KeyedPart<string>(bodyKey(name), (raw) => success(raw));
}

/** A body parsed as spans with the surrounding markup's span parser. */
export function spanBody(name?: string): KeyedPart<Span[], SpanDirectiveContext> {
  return new KeyedPart<Span[], SpanDirectiveContext>(bodyKey(name), (raw, context) =>
    success(context.parser.parseSpans(raw))
  );
}

/** A body parsed as blocks with the surrounding markup's block parser. */
export function blockBody(name?: string): KeyedPart<Block[], BlockDirectiveContext> {
  return new KeyedPart<Block[], BlockDirectiveContext>(bodyKey(name), (raw, context) =>
    success(context.parser.parseBlocks(raw))
  );
}

/** A body parsed as template spans. */
export function templateBody(name?: string): KeyedPart<TemplateSpan[], TemplateDirectiveContext> {
  return new KeyedPart<TemplateSpan[], TemplateDirectiveContext>(bodyKey(name), (raw, context) =>
    success(context.parser.parseTemplate(raw))
  );
}

/**
 * The document cursor. A directive using it is deferred to the rewrite
 * pass.
 */
export function cursor(): DirectivePart<DocumentCursor> {
  return new DirectivePart<DocumentCursor>(true, (context) =>
    context.cursor === undefined ? failure(["no document cursor available"]) : success(context.cursor)
  );
}

// ============================================================================
// Directive definitions
// ============================================================================

/**
 * Converters that reject a value. Used with `KeyedPart.convert`.
 */
export const converters = {
  integer(value: string): DirectiveResult<number> {
    return /^-?\d+$/.test(value.trim())
      ? success(Number.parseInt(value, 10))
      : failure([`not an integer: ${value}`]);
  },
  boolean(value: string): DirectiveResult<boolean> {
    switch (value.trim()) {
      case "true":
        return success(true);
      case "false":
        return success(false);
      default:
        return failure([`not a boolean: ${value}`]);
    }
  },
};

export interface DirectiveDefinition<T, E, C extends DirectiveContext> {
  readonly name: string;
  readonly parts: DirectivePart<T, C>;
  /** Build the element. A thrown error is reported like a part error. */
  readonly run: (value: T, context: C) => E;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function define<T, E, C extends DirectiveContext>(definition: DirectiveDefinition<T, E, C>): Directive<E, C> {
  const { name, parts, run } = definition;
  return {
    name,
    requiresContext: parts.requiresContext,
    apply(context: C): DirectiveResult<E> {
      const extracted = parts.extract(context);
      if (!extracted.ok) return failure(extracted.messages);
      try {
        return success(run(extracted.value, context));
      } catch (error) {
        return failure([describeError(error)]);
      }
    },
  };
}

export function spanDirective<T>(definition: DirectiveDefinition<T, Span, SpanDirectiveContext>): SpanDirective {
  return define(definition);
}

export function blockDirective<T>(
  definition: DirectiveDefinition<T, Block, BlockDirectiveContext>
): BlockDirective {
  return define(definition);
}

export function templateDirective<T>(
  definition: DirectiveDefinition<T, TemplateSpan, TemplateDirectiveContext>
): TemplateDirective {
  return define(definition);
}
