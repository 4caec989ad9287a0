import { describe, it, expect } from "vitest";
import { floorDiv, mod } from "../src/engine";

describe("modular arithmetic", () => {
  it("wraps negative values into [0, m)", () => {
    expect(mod(-18, 100)).toBe(82);
    expect(mod(-100, 100)).toBe(0);
    expect(mod(-101, 100)).toBe(99);
    expect(mod(250, 100)).toBe(50);
  });

  it("rounds division toward negative infinity", () => {
    expect(floorDiv(1050, 100)).toBe(10);
    expect(floorDiv(99, 100)).toBe(0);
    expect(floorDiv(-1, 100)).toBe(-1);
    expect(floorDiv(-18, 100)).toBe(-1);
    expect(floorDiv(-100, 100)).toBe(-1);
    expect(floorDiv(-101, 100)).toBe(-2);
  });

  it("differs from truncating division for negative operands", () => {
    expect(Math.trunc(-18 / 100)).toBe(0);
    expect(floorDiv(-18, 100)).toBe(-1);
  });
});
