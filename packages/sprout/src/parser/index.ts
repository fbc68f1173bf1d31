/**
 * Sprout front end: chevrotain lexer, token-tree builder and the
 * recursive-descent grammar parser.
 */
export { parseSprout, reservedReason } from "./parser.js";
export type { SproutParseResult } from "./parser.js";
export { buildTokenTrees, tokenSpan } from "./token-tree.js";
export type { Delimiter, Group, Leaf, TokenTree, TokenTreeResult } from "./token-tree.js";
export { SproutLexer, allTokens } from "./lexer.js";
