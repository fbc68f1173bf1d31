/**
 * Literal macro tests: lengths, edge and corner shorthands, colors.
 */
import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  AUTO,
  LiteralError,
  color,
  corners,
  cssColorNames,
  edges,
  length,
} from "../src/literals/index.js";

const px = (value: number) => ({ type: "Px", value });

describe("length", () => {
  it("reads each unit", () => {
    assert.deepEqual(length("10px"), { type: "Px", value: 10 });
    assert.deepEqual(length("2.5vmin"), { type: "Vmin", value: 2.5 });
    assert.deepEqual(length("50vh"), { type: "Vh", value: 50 });
    assert.deepEqual(length("10%"), { type: "Percent", value: 10 });
  });

  it("allows a space before %", () => {
    assert.deepEqual(length("10 %"), { type: "Percent", value: 10 });
  });

  it("reads auto and its shorthand", () => {
    assert.deepEqual(length("auto"), AUTO);
    assert.deepEqual(length("@"), AUTO);
  });

  it("rejects a space between a number and its unit", () => {
    assert.throws(() => length("10 vw"), {
      name: "LiteralError",
      message: 'Unexpected space between "10" and "vw" in "10 vw"',
    });
  });

  it("rejects an unknown unit", () => {
    assert.throws(() => length("10em"), {
      message: 'Invalid unit "em", expected px, vw, vh, vmin, vmax or % in "10em"',
    });
  });

  it("rejects words other than auto", () => {
    assert.throws(() => length("abc"), { message: 'Invalid value, found "abc" in "abc"' });
  });

  it("rejects a number without a unit", () => {
    assert.throws(() => length("10"), {
      message: 'Expected a unit: px, vw, vh, vmin, vmax or % at end of input in "10"',
    });
  });

  it("rejects empty input and trailing input", () => {
    assert.throws(() => length(""), { message: 'Expected a length at end of input in ""' });
    assert.throws(() => length("10px 5px"), { message: 'Unexpected input after length, found "5" in "10px 5px"' });
  });
});

describe("edges", () => {
  it("expands one to four values like CSS", () => {
    assert.deepEqual(edges("1px"), { top: px(1), right: px(1), bottom: px(1), left: px(1) });
    assert.deepEqual(edges("1px 2px"), { top: px(1), right: px(2), bottom: px(1), left: px(2) });
    assert.deepEqual(edges("1px 2px 3px"), { top: px(1), right: px(2), bottom: px(3), left: px(2) });
    assert.deepEqual(edges("1px 2px 3px 4px"), { top: px(1), right: px(2), bottom: px(3), left: px(4) });
  });

  it("reads _ as the default", () => {
    assert.deepEqual(edges("1px _ 3px 4px").right, AUTO);
  });

  it("rejects more than four values", () => {
    assert.throws(() => edges("1px 2px 3px 4px 5px"), LiteralError);
  });

  it("rejects an empty shorthand", () => {
    assert.throws(() => edges(""), { message: 'Expected 1-4 values or "_" at end of input in ""' });
  });
});

describe("corners", () => {
  it("shares values between corners", () => {
    assert.deepEqual(corners("4px"), { topLeft: px(4), topRight: px(4), bottomRight: px(4), bottomLeft: px(4) });
    assert.deepEqual(corners("1px 2px"), { topLeft: px(1), topRight: px(1), bottomRight: px(2), bottomLeft: px(2) });
    assert.deepEqual(corners("1px 2px 3px"), {
      topLeft: px(1),
      topRight: px(2),
      bottomRight: px(3),
      bottomLeft: px(3),
    });
    assert.deepEqual(corners("1px 2px 3px 4px"), {
      topLeft: px(1),
      topRight: px(2),
      bottomRight: px(3),
      bottomLeft: px(4),
    });
  });
});

describe("color", () => {
  it("reads the short and long hex forms alike", () => {
    assert.deepEqual(color("#fff"), color("#ffffff"));
    assert.deepEqual(color("#FFF"), { type: "Srgba", value: { red: 1, green: 1, blue: 1, alpha: 1 } });
  });

  it("reads hex alpha", () => {
    assert.deepEqual(color("#0f08"), { type: "Srgba", value: { red: 0, green: 1, blue: 0, alpha: 8 / 15 } });
    assert.deepEqual(color("#ff000080"), { type: "Srgba", value: { red: 1, green: 0, blue: 0, alpha: 128 / 255 } });
  });

  it("unwraps the value with !", () => {
    assert.deepEqual(color("!#000"), { red: 0, green: 0, blue: 0, alpha: 1 });
  });

  it("reads color functions with percentages and negative values", () => {
    assert.deepEqual(color("hsl(120, 50%, 25%)"), {
      type: "Hsla",
      value: { hue: 120, saturation: 0.5, lightness: 0.25, alpha: 1 },
    });
    assert.deepEqual(color("lab(50, -20, 30, 0.5)"), {
      type: "Laba",
      value: { lightness: 50, a: -20, b: 30, alpha: 0.5 },
    });
  });

  it("reads CSS color names", () => {
    assert.equal(cssColorNames().size, 149);
    assert.deepEqual(color("red"), { type: "Srgba", value: { red: 1, green: 0, blue: 0, alpha: 1 } });
    assert.deepEqual(color("!transparent"), { red: 0, green: 0, blue: 0, alpha: 0 });
  });

  it("rejects malformed colors", () => {
    assert.throws(() => color("#12345"), {
      message: 'Invalid hex color: expected 3, 4, 6 or 8 digits, got 5 in "#12345"',
    });
    assert.throws(() => color("#ggg"), { message: 'Invalid hex color in "#ggg"' });
    assert.throws(() => color("nocolor"), { message: 'Unknown color name "nocolor" in "nocolor"' });
    assert.throws(() => color("rgb(1, 2, 3)"), { message: 'Unknown color function "rgb" in "rgb(1, 2, 3)"' });
    assert.throws(() => color("srgb(1, 2)"), { message: 'Expected 3 or 4 components, got 2 in "srgb(1, 2)"' });
  });
});
