import { describe, expect, it } from "vitest";

import {
  isValidConfidence,
  isValidScore,
  MIN_CONFIDENCE,
  passesFraudThreshold,
  recalculateScore,
} from "../src/scoring.js";

describe("recalculateScore", () => {
  it("weights model confidence 60/40 against the prior score", () => {
    expect(recalculateScore(80, 60)).toBe(72);
    expect(recalculateScore(80, 75)).toBe(78);
  });

  it("truncates fractional results", () => {
    // (80 * 60 + 78 * 40) / 100 = 79.2
    expect(recalculateScore(80, 78)).toBe(79);
    // (71 * 60 + 0) / 100 = 42.6
    expect(recalculateScore(71, 0)).toBe(42);
  });

  it("stays within bounds at the extremes", () => {
    expect(recalculateScore(100, 100)).toBe(100);
    expect(recalculateScore(70, 0)).toBe(42);
  });
});

describe("score validation", () => {
  it("accepts integers between 0 and 100 inclusive", () => {
    expect(isValidScore(0)).toBe(true);
    expect(isValidScore(100)).toBe(true);
    expect(isValidScore(-1)).toBe(false);
    expect(isValidScore(101)).toBe(false);
    expect(isValidScore(50.5)).toBe(false);
  });

  it("requires model confidence of at least the minimum", () => {
    expect(MIN_CONFIDENCE).toBe(70);
    expect(isValidConfidence(69)).toBe(false);
    expect(isValidConfidence(70)).toBe(true);
    expect(isValidConfidence(100)).toBe(true);
    expect(isValidConfidence(101)).toBe(false);
  });

  it("uses the same floor for the transfer threshold", () => {
    expect(passesFraudThreshold(69)).toBe(false);
    expect(passesFraudThreshold(70)).toBe(true);
  });
});
