/**
 * Literal converters for layout lengths and colors. Pure functions of their
 * input text; malformed input throws `LiteralError`.
 */
export { length, AUTO } from "./length.js";
export type { Length, LengthUnit } from "./length.js";
export { edges, corners } from "./edges.js";
export type { Edges, Corners } from "./edges.js";
export { color, cssColorNames } from "./color.js";
export type {
  Color,
  ColorValue,
  Hsla,
  Hsva,
  Hwba,
  Laba,
  Lcha,
  LinearRgba,
  Oklaba,
  Oklcha,
  Srgba,
  Xyza,
} from "./color.js";
export { LiteralError } from "./tokens.js";
