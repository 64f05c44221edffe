/**
 * Style model for @marklet/css
 *
 * Selectors match tree elements by element type, id and style names, with
 * an optional parent selector for the descendant and child combinators.
 */

export type Predicate =
  | { readonly type: "elementType"; readonly name: string }
  | { readonly type: "id"; readonly id: string }
  | { readonly type: "styleName"; readonly name: string };

export interface ParentSelector {
  readonly selector: Selector;
  /** True for the child combinator `>`, false for a descendant. */
  readonly immediate: boolean;
}

export interface Selector {
  readonly predicates: readonly Predicate[];
  readonly parent?: ParentSelector;
}

export interface StyleDeclaration {
  readonly selector: Selector;
  readonly styles: Readonly<Record<string, string>>;
  /** Position in the style sheet, counting each selector of a group separately. */
  readonly order: number;
}

export interface StyleDeclarationSet {
  readonly paths: readonly string[];
  readonly declarations: readonly StyleDeclaration[];
}

/** Counts of id, style name and element type predicates, then source order. */
export interface Specificity {
  readonly ids: number;
  readonly classes: number;
  readonly types: number;
  readonly order: number;
}

export function elementType(name: string): Predicate {
  return { type: "elementType", name };
}

export function id(value: string): Predicate {
  return { type: "id", id: value };
}

export function styleName(name: string): Predicate {
  return { type: "styleName", name };
}

export function selector(predicates: readonly Predicate[], parent?: ParentSelector): Selector {
  return parent === undefined ? { predicates } : { predicates, parent };
}

/** Specificity of a selector, including its parent selectors. */
export function specificity(sel: Selector, order = 0): Specificity {
  let ids = 0;
  let classes = 0;
  let types = 0;
  for (let current: Selector | undefined = sel; current; current = current.parent?.selector) {
    for (const p of current.predicates) {
      switch (p.type) {
        case "id":
          ids++;
          break;
        case "styleName":
          classes++;
          break;
        case "elementType":
          types++;
          break;
      }
    }
  }
  return { ids, classes, types, order };
}

/** Negative when `a` is less specific than `b`. */
export function compareSpecificity(a: Specificity, b: Specificity): number {
  return a.ids - b.ids || a.classes - b.classes || a.types - b.types || a.order - b.order;
}

/**
 * Declarations sorted from least to most specific, so that later entries
 * override earlier ones when merged.
 */
export function byPrecedence(set: StyleDeclarationSet): StyleDeclaration[] {
  return [...set.declarations].sort((a, b) =>
    compareSpecificity(specificity(a.selector, a.order), specificity(b.selector, b.order))
  );
}

/** Combine style sheets; declarations of `b` come after those of `a`. */
export function mergeStyleSheets(a: StyleDeclarationSet, b: StyleDeclarationSet): StyleDeclarationSet {
  const offset = a.declarations.length;
  return {
    paths: [...a.paths, ...b.paths],
    declarations: [...a.declarations, ...b.declarations.map((d) => ({ ...d, order: d.order + offset }))],
  };
}
