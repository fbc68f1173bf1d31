/**
 * Color literals, following CSS color syntax:
 *
 *   #rgb | #rgba | #rrggbb | #rrggbbaa
 *   srgb | linear | hsl | hsv | hwb | lab | lch | oklab | oklch | xyz (a, b, c[, alpha])
 *   any of the 149 CSS color names
 *
 * The result is tagged with its color space. A leading `!` returns the
 * space's value without the tag.
 */
import { readFileSync } from "node:fs";
import {
  Bang,
  Hex,
  LitComma,
  LitLParen,
  LitRParen,
  LiteralError,
  LiteralTokens,
  Minus,
  Num,
  PercentSign,
  Word,
} from "./tokens.js";

export type Srgba = { red: number; green: number; blue: number; alpha: number };
export type LinearRgba = { red: number; green: number; blue: number; alpha: number };
export type Hsla = { hue: number; saturation: number; lightness: number; alpha: number };
export type Hsva = { hue: number; saturation: number; value: number; alpha: number };
export type Hwba = { hue: number; whiteness: number; blackness: number; alpha: number };
export type Laba = { lightness: number; a: number; b: number; alpha: number };
export type Lcha = { lightness: number; chroma: number; hue: number; alpha: number };
export type Oklaba = { lightness: number; a: number; b: number; alpha: number };
export type Oklcha = { lightness: number; chroma: number; hue: number; alpha: number };
export type Xyza = { x: number; y: number; z: number; alpha: number };

export type Color =
  | { type: "Srgba"; value: Srgba }
  | { type: "LinearRgba"; value: LinearRgba }
  | { type: "Hsla"; value: Hsla }
  | { type: "Hsva"; value: Hsva }
  | { type: "Hwba"; value: Hwba }
  | { type: "Laba"; value: Laba }
  | { type: "Lcha"; value: Lcha }
  | { type: "Oklaba"; value: Oklaba }
  | { type: "Oklcha"; value: Oklcha }
  | { type: "Xyza"; value: Xyza };

/** The value inside a `Color`, as returned for `!`-prefixed literals. */
export type ColorValue = Color["value"];

type Channels = [number, number, number, number];

const FUNCTIONS: Record<string, (c: Channels) => Color> = {
  srgb: ([red, green, blue, alpha]) => ({ type: "Srgba", value: { red, green, blue, alpha } }),
  linear: ([red, green, blue, alpha]) => ({ type: "LinearRgba", value: { red, green, blue, alpha } }),
  hsl: ([hue, saturation, lightness, alpha]) => ({ type: "Hsla", value: { hue, saturation, lightness, alpha } }),
  hsv: ([hue, saturation, value, alpha]) => ({ type: "Hsva", value: { hue, saturation, value, alpha } }),
  hwb: ([hue, whiteness, blackness, alpha]) => ({ type: "Hwba", value: { hue, whiteness, blackness, alpha } }),
  lab: ([lightness, a, b, alpha]) => ({ type: "Laba", value: { lightness, a, b, alpha } }),
  lch: ([lightness, chroma, hue, alpha]) => ({ type: "Lcha", value: { lightness, chroma, hue, alpha } }),
  oklab: ([lightness, a, b, alpha]) => ({ type: "Oklaba", value: { lightness, a, b, alpha } }),
  oklch: ([lightness, chroma, hue, alpha]) => ({ type: "Oklcha", value: { lightness, chroma, hue, alpha } }),
  xyz: ([x, y, z, alpha]) => ({ type: "Xyza", value: { x, y, z, alpha } }),
};

const FUNCTION_NAMES = new Map(Object.entries(FUNCTIONS));

// ── Named colors ─────────────────────────────────────────────────────────────

let namedColors: Map<string, string> | undefined;

/** CSS color names mapped to `#rrggbb` / `#rrggbbaa`, loaded on first use. */
export function cssColorNames(): Map<string, string> {
  if (!namedColors) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../../data/css-colors.json", import.meta.url), "utf8"),
    );
    const table = new Map<string, string>();
    if (typeof raw === "object" && raw !== null) {
      for (const [name, hex] of Object.entries(raw)) {
        if (typeof hex === "string") table.set(name, hex);
      }
    }
    namedColors = table;
  }
  return namedColors;
}

// ── Parsing ──────────────────────────────────────────────────────────────────

/** Parse one color literal. */
export function color(text: string): Color | ColorValue {
  const tokens = LiteralTokens.lex(text);
  const unwrap = tokens.peek(Bang) !== undefined;
  if (unwrap) tokens.next();

  const result = readColor(tokens);
  if (!tokens.atEnd()) throw tokens.error("Unexpected input after color");
  return unwrap ? result.value : result;
}

function readColor(tokens: LiteralTokens): Color {
  const hash = tokens.peek(Hex);
  if (hash) {
    tokens.next();
    return { type: "Srgba", value: hexColor(hash.image.slice(1), tokens.input) };
  }

  const word = tokens.peek(Word);
  if (!word) throw tokens.error("Expected a color");
  tokens.next();

  const build = FUNCTION_NAMES.get(word.image);
  if (build) return build(readChannels(tokens));

  const named = cssColorNames().get(word.image);
  if (named) return { type: "Srgba", value: hexColor(named.slice(1), tokens.input) };

  if (tokens.peek(LitLParen)) {
    throw new LiteralError(`Unknown color function "${word.image}"`, tokens.input);
  }
  throw new LiteralError(`Unknown color name "${word.image}"`, tokens.input);
}

function hexColor(digits: string, input: string): Srgba {
  if (!/^[0-9a-fA-F]*$/.test(digits)) throw new LiteralError("Invalid hex color", input);

  const short = (i: number) => parseInt(digits[i], 16) / 15;
  const long = (i: number) => parseInt(digits.slice(i, i + 2), 16) / 255;

  switch (digits.length) {
    case 3:
      return { red: short(0), green: short(1), blue: short(2), alpha: 1 };
    case 4:
      return { red: short(0), green: short(1), blue: short(2), alpha: short(3) };
    case 6:
      return { red: long(0), green: long(2), blue: long(4), alpha: 1 };
    case 8:
      return { red: long(0), green: long(2), blue: long(4), alpha: long(6) };
    default:
      throw new LiteralError(`Invalid hex color: expected 3, 4, 6 or 8 digits, got ${digits.length}`, input);
  }
}

/** `( n, n, n [, n] )`, where each n may be negative or a percentage. */
function readChannels(tokens: LiteralTokens): Channels {
  tokens.expect(LitLParen, "\"(\"");
  const values: number[] = [];
  while (!tokens.peek(LitRParen)) {
    values.push(readNumber(tokens));
    if (!tokens.peek(LitComma)) break;
    tokens.next();
  }
  tokens.expect(LitRParen, "\")\"");

  if (values.length !== 3 && values.length !== 4) {
    throw new LiteralError(`Expected 3 or 4 components, got ${values.length}`, tokens.input);
  }
  const [a, b, c, alpha = 1] = values;
  return [a, b, c, alpha];
}

function readNumber(tokens: LiteralTokens): number {
  const negative = tokens.peek(Minus) !== undefined;
  if (negative) tokens.next();
  const number = tokens.expect(Num, "a number");
  let value = Number(number.image);
  if (tokens.peek(PercentSign)) {
    tokens.next();
    value /= 100;
  }
  return negative ? -value : value;
}
