/**
 * Length literals.
 *
 *   auto | @ | <n>% | <n>px | <n>vw | <n>vh | <n>vmin | <n>vmax
 *
 * A unit must follow its number without a space; `%` may be separated.
 */
import { adjacent, At, LiteralError, LiteralTokens, Num, Omit, PercentSign, Word } from "./tokens.js";

export type LengthUnit = "Percent" | "Px" | "Vw" | "Vh" | "Vmin" | "Vmax";

export type Length =
  | { type: "Auto" }
  | { type: LengthUnit; value: number };

const UNITS = new Map<string, LengthUnit>([
  ["px", "Px"],
  ["vw", "Vw"],
  ["vh", "Vh"],
  ["vmin", "Vmin"],
  ["vmax", "Vmax"],
]);

export const AUTO: Length = Object.freeze({ type: "Auto" });

/** Parse one length literal. */
export function length(text: string): Length {
  const tokens = LiteralTokens.lex(text);
  const value = readLength(tokens);
  if (!tokens.atEnd()) throw tokens.error("Unexpected input after length");
  return value;
}

/** Read one length, or `_` (the default) when `allowOmit` is set. */
export function readLength(tokens: LiteralTokens, allowOmit = false): Length {
  if (allowOmit && tokens.peek(Omit)) {
    tokens.next();
    return AUTO;
  }
  if (tokens.peek(At)) {
    tokens.next();
    return AUTO;
  }

  const word = tokens.peek(Word);
  if (word) {
    if (word.image !== "auto") throw tokens.error("Invalid value");
    tokens.next();
    return AUTO;
  }

  const number = tokens.peek(Num);
  if (!number) throw tokens.error(allowOmit ? "Expected a length or \"_\"" : "Expected a length");
  tokens.next();
  const value = Number(number.image);

  if (tokens.peek(PercentSign)) {
    tokens.next();
    return { type: "Percent", value };
  }

  const unit = tokens.peek(Word);
  if (!unit) throw tokens.error("Expected a unit: px, vw, vh, vmin, vmax or %");
  const type = UNITS.get(unit.image);
  if (!type) {
    throw new LiteralError(`Invalid unit "${unit.image}", expected px, vw, vh, vmin, vmax or %`, tokens.input);
  }
  if (!adjacent(number, unit)) {
    throw new LiteralError(`Unexpected space between "${number.image}" and "${unit.image}"`, tokens.input);
  }
  tokens.next();
  return { type, value };
}
