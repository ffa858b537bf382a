import { describe, expect, it } from "vitest";
import {
  clampFilterValue,
  describeActivity,
  filtersToCss,
  NO_FILTERS,
  pickRandomIndex,
  sizeToClassName,
  sizeToWidth,
} from "./gallery.js";

describe("thumbnail sizes", () => {
  it("maps sizes to widths", () => {
    expect(sizeToWidth("small")).toBe(50);
    expect(sizeToWidth("medium")).toBe(100);
    expect(sizeToWidth("large")).toBe(200);
  });

  it("builds the container class", () => {
    expect(sizeToClassName("medium")).toBe("thumbnails-medium");
  });
});

describe("filtersToCss", () => {
  it("returns none when every slider is at zero", () => {
    expect(filtersToCss(NO_FILTERS)).toBe("none");
  });

  it("scales each slider into its CSS function", () => {
    expect(filtersToCss({ hue: 2, ripple: 11, noise: 4 })).toBe(
      "hue-rotate(60deg) blur(2.00px) contrast(120%)"
    );
  });

  it("keeps two decimals on the blur", () => {
    expect(filtersToCss({ hue: 0, ripple: 1, noise: 0 })).toBe(
      "hue-rotate(0deg) blur(0.18px) contrast(100%)"
    );
  });
});

describe("clampFilterValue", () => {
  it("keeps values inside 0..11", () => {
    expect(clampFilterValue(-3)).toBe(0);
    expect(clampFilterValue(40)).toBe(11);
    expect(clampFilterValue(4.6)).toBe(5);
  });

  it("reads NaN as zero", () => {
    expect(clampFilterValue(Number.NaN)).toBe(0);
  });
});

describe("pickRandomIndex", () => {
  it("returns null for an empty list", () => {
    expect(pickRandomIndex(0, () => 0.5)).toBeNull();
  });

  it("scales the random number onto the list", () => {
    expect(pickRandomIndex(4, () => 0)).toBe(0);
    expect(pickRandomIndex(4, () => 0.5)).toBe(2);
    expect(pickRandomIndex(4, () => 0.99)).toBe(3);
  });
});

it("describes the current filters", () => {
  expect(describeActivity({ hue: 1, ripple: 2, noise: 3 })).toBe(
    "Filters: hue 1, ripple 2, noise 3"
  );
});
