import { describe, expect, it } from "vitest";
import { doubleScores, doubleScoresInPlace, SAMPLE_SCORES, scoresLessThan } from "./scores.js";

describe("doubleScoresInPlace", () => {
  it("changes the caller's array", () => {
    const scores = [...SAMPLE_SCORES];
    const result = doubleScoresInPlace(scores, 2);

    expect(result).toBe(scores);
    expect(scores).toEqual([632, 640, 740, 674, 636, 628]);
  });
});

describe("doubleScores", () => {
  it("returns a new array and leaves the input alone", () => {
    const scores = [...SAMPLE_SCORES];
    const result = doubleScores(scores, 3);

    expect(result).toEqual([948, 960, 1110, 1011, 954, 942]);
    expect(result).not.toBe(scores);
    expect(scores).toEqual([316, 320, 370, 337, 318, 314]);
  });
});

describe("scoresLessThan", () => {
  it("keeps scores strictly below the limit", () => {
    expect(scoresLessThan(SAMPLE_SCORES, 320)).toEqual([316, 318, 314]);
  });
});
