/**
 * Directive application
 *
 * Turns a parsed directive into a tree element: the registered directive's
 * result, an invalid element carrying every collected message, or a
 * placeholder when the directive needs the finished document tree.
 */

import { PlaceholderError } from "@marklet/core";
import type { DocumentCursor } from "../cursor.js";
import type { ParsedDirective } from "./grammar.js";
import { describePartKey, PartMap, partKeyId } from "./keys.js";
import type { Part, PartKey } from "./keys.js";
import { combine, failure, success } from "./result.js";
import type { DirectiveResult } from "./result.js";
import type { Directive, DirectiveContext, DirectiveKind, DirectiveRegistry } from "./types.js";

export interface ApplyDirectiveOptions<E, C extends DirectiveContext> {
  readonly registry: DirectiveRegistry<Directive<E, C>>;
  readonly parsed: ParsedDirective;
  readonly createContext: (parts: PartMap, cursor: DocumentCursor | undefined) => C;
  readonly createPlaceholder: (resolve: (cursor: DocumentCursor) => E) => E;
  readonly createInvalid: (message: string) => E;
  readonly kind: DirectiveKind;
}

/**
 * Map the parts by key. Every key declared more than once yields exactly
 * one message, in the order the keys were first seen.
 */
export function buildPartMap(parts: readonly Part[]): DirectiveResult<PartMap> {
  const seen = new Map<string, { key: PartKey; count: number }>();
  for (const part of parts) {
    const id = partKeyId(part.key);
    const entry = seen.get(id);
    if (entry) entry.count++;
    else seen.set(id, { key: part.key, count: 1 });
  }

  const duplicates = [...seen.values()]
    .filter((entry) => entry.count > 1)
    .map((entry) => `Duplicate ${describePartKey(entry.key)}`);

  return duplicates.length > 0 ? failure(duplicates) : success(new PartMap(parts));
}

function lookup<D>(registry: DirectiveRegistry<D>, name: string, kind: DirectiveKind): DirectiveResult<D> {
  const directive = registry.get(name);
  return directive === undefined
    ? failure([`No ${kind} directive registered with name: ${name}`])
    : success(directive);
}

function once<E>(name: string, resolve: (cursor: DocumentCursor) => E): (cursor: DocumentCursor) => E {
  let called = false;
  return (cursor) => {
    if (called) {
      throw new PlaceholderError(`Placeholder for directive '${name}' has already been resolved`);
    }
    called = true;
    return resolve(cursor);
  };
}

export function applyDirective<E, C extends DirectiveContext>(options: ApplyDirectiveOptions<E, C>): E {
  const { parsed, kind } = options;

  const collapse = (result: DirectiveResult<E>): E =>
    result.ok
      ? result.value
      : options.createInvalid(
          `One or more errors processing directive '${parsed.name}': ${result.messages.join(", ")}`
        );

  const checked = combine(lookup(options.registry, parsed.name, kind), buildPartMap(parsed.parts));
  if (!checked.ok) {
    return collapse(failure(checked.messages));
  }

  const [directive, parts] = checked.value;
  const run = (cursor: DocumentCursor | undefined): E =>
    collapse(directive.apply(options.createContext(parts, cursor)));

  if (directive.requiresContext) {
    return options.createPlaceholder(once(parsed.name, run));
  }
  return run(undefined);
}

/** The context members shared by every directive kind. */
export function baseContext(parts: PartMap, cursor: DocumentCursor | undefined): DirectiveContext {
  return {
    parts,
    cursor,
    part: (key) => parts.get(key),
  };
}
