/**
 * @marklet/css
 *
 * Parser for the CSS subset used to style marklet documents, and the
 * selector and declaration model it produces.
 *
 * @module
 */

export {
  byPrecedence,
  compareSpecificity,
  elementType,
  id,
  mergeStyleSheets,
  selector as createSelector,
  specificity,
  styleName,
  type ParentSelector,
  type Predicate,
  type Selector,
  type Specificity,
  type StyleDeclaration,
  type StyleDeclarationSet,
} from "./styles.js";

export {
  combinator,
  comment,
  parseStyleSheet,
  parseStyles,
  predicate,
  selector,
  selectorGroup,
  simpleSelectorSequence,
  style,
  styleDeclarations,
  styleRefName,
  styleValue,
  wsOrNl,
  type Combinator,
  type Style,
} from "./parser.js";
