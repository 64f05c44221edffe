/**
 * Keys identifying the parts of a directive.
 */

export type PartKind = "attribute" | "body";

/** An attribute or body key; an absent name is the default part of its kind. */
export interface PartKey {
  readonly kind: PartKind;
  readonly name?: string;
}

/** One attribute or body of a parsed directive, as raw source text. */
export interface Part {
  readonly key: PartKey;
  readonly content: string;
}

export function attributeKey(name?: string): PartKey {
  return name === undefined ? { kind: "attribute" } : { kind: "attribute", name };
}

export function bodyKey(name?: string): PartKey {
  return name === undefined ? { kind: "body" } : { kind: "body", name };
}

/** Stable identity of a key, distinct for the default and every named part. */
export function partKeyId(key: PartKey): string {
  return key.name === undefined ? key.kind : `${key.kind}:${key.name}`;
}

/** Human-readable key, as used in directive error messages. */
export function describePartKey(key: PartKey): string {
  return key.name === undefined ? `default ${key.kind}` : `${key.kind}: ${key.name}`;
}

/** Immutable mapping from part keys to their raw content. */
export class PartMap {
  private readonly entries: ReadonlyMap<string, Part>;

  constructor(parts: Iterable<Part>) {
    const entries = new Map<string, Part>();
    for (const part of parts) entries.set(partKeyId(part.key), part);
    this.entries = entries;
  }

  get(key: PartKey): string | undefined {
    return this.entries.get(partKeyId(key))?.content;
  }

  has(key: PartKey): boolean {
    return this.entries.has(partKeyId(key));
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): PartKey[] {
    return [...this.entries.values()].map((p) => p.key);
  }
}
