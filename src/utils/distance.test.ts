import { describe, expect, it } from "vitest";
import { haversineKm } from "./distance";

describe("haversineKm", () => {
  it("is zero for identical points", () => {
    expect(haversineKm(0, 0, 0, 0)).toBe(0);
    expect(haversineKm(28.7041, 77.1025, 28.7041, 77.1025)).toBe(0);
  });

  it("rounds to two decimals", () => {
    expect(haversineKm(0, 0, 0, 1)).toBe(111.19);
    expect(haversineKm(28.7041, 77.1025, 19.076, 72.8777)).toBe(1153.24);
    expect(haversineKm(12.9716, 77.5946, 12.9352, 77.6245)).toBe(5.18);
  });

  it("returns undefined when a coordinate is missing", () => {
    expect(haversineKm(null, 77.1, 28.7, 77.1)).toBeUndefined();
    expect(haversineKm(28.7, 77.1, 28.7, undefined)).toBeUndefined();
  });
});
