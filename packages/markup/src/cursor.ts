/**
 * Documents, document trees and the cursor handed to deferred directives.
 */

import { getNestedValue } from "@marklet/core";
import type { Block } from "./elements.js";

export type DocumentConfig = Readonly<Record<string, unknown>>;

export interface Document {
  readonly type: "document";
  readonly path: string;
  readonly title?: string;
  readonly content: readonly Block[];
  readonly config?: DocumentConfig;
}

export interface DocumentTree {
  readonly type: "documentTree";
  readonly path: string;
  readonly content: readonly (Document | DocumentTree)[];
  readonly config?: DocumentConfig;
}

/** A position in the assembled document set. */
export interface DocumentCursor {
  readonly target: Document;
  readonly root: DocumentTree | undefined;
  readonly path: string;
  /**
   * Value of a reference such as `document.title`, `config.version` or
   * `version`. Undefined when nothing provides it.
   */
  resolveReference(ref: string): string | undefined;
  /** Every document reachable from the root, or the target alone. */
  allDocuments(): Document[];
}

export function document(
  path: string,
  content: readonly Block[],
  extra: { title?: string; config?: DocumentConfig } = {}
): Document {
  return { type: "document", path, content, ...extra };
}

export function documentTree(
  path: string,
  content: readonly (Document | DocumentTree)[],
  config?: DocumentConfig
): DocumentTree {
  return config === undefined
    ? { type: "documentTree", path, content }
    : { type: "documentTree", path, content, config };
}

function collectDocuments(tree: DocumentTree): Document[] {
  return tree.content.flatMap((child) => (child.type === "document" ? [child] : collectDocuments(child)));
}

/** Trees enclosing `target`, innermost first. */
function ancestors(tree: DocumentTree, target: Document): DocumentTree[] | undefined {
  for (const child of tree.content) {
    if (child === target) return [tree];
    if (child.type === "documentTree") {
      const found = ancestors(child, target);
      if (found) return [...found, tree];
    }
  }
  return undefined;
}

function display(value: unknown): string | undefined {
  switch (typeof value) {
    case "string":
      return value;
    case "number":
    case "boolean":
      return String(value);
    default:
      return undefined;
  }
}

export function createCursor(target: Document, root?: DocumentTree): DocumentCursor {
  const scopes: DocumentConfig[] = [];
  if (target.config) scopes.push(target.config);
  if (root) {
    for (const tree of ancestors(root, target) ?? [root]) {
      if (tree.config) scopes.push(tree.config);
    }
  }

  const fromConfig = (key: string): string | undefined => {
    for (const scope of scopes) {
      const value = display(getNestedValue(scope, key));
      if (value !== undefined) return value;
    }
    return undefined;
  };

  return {
    target,
    root,
    path: target.path,
    resolveReference(ref) {
      switch (ref) {
        case "document.title":
          return target.title;
        case "document.path":
          return target.path;
        default:
          return fromConfig(ref.startsWith("config.") ? ref.slice("config.".length) : ref);
      }
    },
    allDocuments() {
      return root ? collectDocuments(root) : [target];
    },
  };
}
