/**
 * Results of directive processing. Unlike parse results these carry every
 * message collected, not just the first.
 */

export type DirectiveResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly messages: readonly string[] };

export function success<T>(value: T): DirectiveResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(messages: readonly string[]): DirectiveResult<T> {
  return { ok: false, messages };
}

/** Combine two results, collecting the messages of both on failure. */
export function combine<A, B>(a: DirectiveResult<A>, b: DirectiveResult<B>): DirectiveResult<[A, B]> {
  if (a.ok && b.ok) return success<[A, B]>([a.value, b.value]);
  return failure([...(a.ok ? [] : a.messages), ...(b.ok ? [] : b.messages)]);
}
