import { describe, expect, it } from "vitest";
import { describeCategorical, describeNumeric, quantile } from "../lib/profile";

describe("numeric statistics", () => {
  it("summarizes a symmetric sample", () => {
    const stats = describeNumeric([1, 2, 3, 4, 5]);

    expect(stats.count).toBe(5);
    expect(stats.mean).toBe(3);
    expect(stats.median).toBe(3);
    expect(stats.q1).toBe(2);
    expect(stats.q3).toBe(4);
    expect(stats.min).toBe(1);
    expect(stats.max).toBe(5);
    expect(stats.sum).toBe(15);
    expect(stats.range).toBe(4);
    expect(stats.iqr).toBe(2);
    expect(stats.variance).toBe(2.5);
    expect(stats.std).toBeCloseTo(Math.sqrt(2.5), 12);
    expect(stats.skewness).toBeCloseTo(0, 12);
    expect(stats.kurtosis).toBeCloseTo(-1.2, 10);
  });

  it("uses linear interpolation between order statistics", () => {
    const sorted = [1, 2, 3, 4];
    expect(quantile(sorted, 0.25)).toBe(1.75);
    expect(quantile(sorted, 0.5)).toBe(2.5);
    expect(quantile(sorted, 0.75)).toBe(3.25);
    expect(quantile(sorted, 1)).toBe(4);
    expect(quantile([], 0.5)).toBeNull();
  });

  it("does not depend on input order", () => {
    expect(describeNumeric([5, 1, 4, 2, 3])).toEqual(describeNumeric([1, 2, 3, 4, 5]));
  });

  it("marks every measure undefined for an empty sample", () => {
    const stats = describeNumeric([]);
    expect(stats.count).toBe(0);
    expect(stats.mean).toBeNull();
    expect(stats.min).toBeNull();
    expect(stats.median).toBeNull();
    expect(stats.std).toBeNull();
    expect(stats.skewness).toBeNull();
  });

  it("marks dispersion and shape undefined for a single value", () => {
    const stats = describeNumeric([7]);
    expect(stats.mean).toBe(7);
    expect(stats.min).toBe(7);
    expect(stats.max).toBe(7);
    expect(stats.median).toBe(7);
    expect(stats.std).toBeNull();
    expect(stats.variance).toBeNull();
    expect(stats.skewness).toBeNull();
    expect(stats.kurtosis).toBeNull();
  });

  it("needs three values for skewness and four for kurtosis", () => {
    const three = describeNumeric([1, 2, 10]);
    expect(three.skewness).not.toBeNull();
    expect(three.skewness ?? 0).toBeGreaterThan(0);
    expect(three.kurtosis).toBeNull();

    expect(describeNumeric([1, 2]).skewness).toBeNull();
    expect(describeNumeric([1, 2, 3, 10]).kurtosis).not.toBeNull();
  });

  it("reports zero dispersion and undefined shape for a constant sample", () => {
    const stats = describeNumeric([0.1, 0.1, 0.1, 0.1]);
    expect(stats.std).toBe(0);
    expect(stats.variance).toBe(0);
    expect(stats.skewness).toBeNull();
    expect(stats.kurtosis).toBeNull();
  });

  it("keeps dispersion and shape finite for very large values", () => {
    const stats = describeNumeric([1e160, 2e160, 3e160, 4e160]);

    expect((stats.mean ?? 0) / 2.5e160).toBeCloseTo(1, 12);
    expect((stats.std ?? 0) / 1e160).toBeCloseTo(Math.sqrt(5 / 3), 10);
    expect(stats.skewness).toBeCloseTo(0, 12);
    expect(stats.kurtosis).toBeCloseTo(-1.2, 10);
  });

  it("keeps dispersion finite for very small values", () => {
    const stats = describeNumeric([1e-170, 2e-170, 3e-170, 4e-170]);

    expect((stats.std ?? 0) / 1e-170).toBeCloseTo(Math.sqrt(5 / 3), 10);
    expect(stats.kurtosis).toBeCloseTo(-1.2, 8);
  });

  it("scales the variance back to the units of the values", () => {
    const stats = describeNumeric([1e150, 2e150, 3e150, 4e150]);
    expect((stats.variance ?? 0) / 1e300).toBeCloseTo(5 / 3, 10);
  });

  it("averages values whose sum overflows", () => {
    const stats = describeNumeric([1e308, 1.5e308]);
    expect((stats.mean ?? 0) / 1e308).toBeCloseTo(1.25, 12);
    expect(stats.sum).toBe(Infinity);
  });
});

describe("categorical statistics", () => {
  it("counts values and picks the most frequent", () => {
    const stats = describeCategorical(["red", "blue", "red", "green"]);

    expect(stats.count).toBe(4);
    expect(stats.distinctCount).toBe(3);
    expect(stats.mostFrequent).toEqual({ value: "red", count: 2 });
    expect(stats.frequencies).toEqual([
      { value: "red", count: 2 },
      { value: "blue", count: 1 },
      { value: "green", count: 1 }
    ]);
  });

  it("breaks ties by first-seen order", () => {
    const stats = describeCategorical(["b", "a", "a", "b", "c"]);
    expect(stats.frequencies.map((entry) => entry.value)).toEqual(["b", "a", "c"]);
    expect(stats.mostFrequent).toEqual({ value: "b", count: 2 });
  });

  it("matches values exactly, including case and whitespace", () => {
    const stats = describeCategorical(["a", "A", " a", "a"]);
    expect(stats.frequencies).toEqual([
      { value: "a", count: 2 },
      { value: "A", count: 1 },
      { value: " a", count: 1 }
    ]);
  });

  it("returns an empty summary without values", () => {
    expect(describeCategorical([])).toEqual({
      count: 0,
      distinctCount: 0,
      mostFrequent: null,
      frequencies: []
    });
  });
});
