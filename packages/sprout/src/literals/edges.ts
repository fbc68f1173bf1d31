/**
 * Four-sided shorthands built from one to four lengths, `_` standing for the
 * default (`Auto`).
 */
import { type Length, readLength } from "./length.js";
import { LiteralTokens } from "./tokens.js";

export type Edges = { top: Length; right: Length; bottom: Length; left: Length };

export type Corners = {
  topLeft: Length;
  topRight: Length;
  bottomRight: Length;
  bottomLeft: Length;
};

function readValues(text: string): Length[] {
  const tokens = LiteralTokens.lex(text);
  const values: Length[] = [];
  while (!tokens.atEnd() && values.length < 4) {
    values.push(readLength(tokens, true));
  }
  if (!tokens.atEnd() || values.length === 0) throw tokens.error("Expected 1-4 values or \"_\"");
  return values;
}

/**
 * CSS shorthand order:
 *   a         all sides
 *   v h       vertical, horizontal
 *   t h b     top, horizontal, bottom
 *   t r b l   each side
 */
export function edges(text: string): Edges {
  const [a, b = a, c = a, d = b] = readValues(text);
  return { top: a, right: b, bottom: c, left: d };
}

/**
 *   a         all corners
 *   t b       top corners, bottom corners
 *   tl tr b   top-left, top-right, bottom corners
 *   tl tr br bl
 */
export function corners(text: string): Corners {
  const values = readValues(text);
  const [a] = values;
  switch (values.length) {
    case 1:
      return { topLeft: a, topRight: a, bottomRight: a, bottomLeft: a };
    case 2:
      return { topLeft: a, topRight: a, bottomRight: values[1], bottomLeft: values[1] };
    case 3:
      return { topLeft: a, topRight: values[1], bottomRight: values[2], bottomLeft: values[2] };
    default:
      return { topLeft: a, topRight: values[1], bottomRight: values[2], bottomLeft: values[3] };
  }
}
