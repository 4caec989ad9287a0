// src/engine/modular.ts

/** Wrap `a` into [0, m). */
export function mod(a: number, m: number): number {
  return ((a % m) + m) % m;
}

/**
 * Integer division rounding toward negative infinity.
 * `a - mod(a, m)` is an exact multiple of m, so the division is exact.
 */
export function floorDiv(a: number, m: number): number {
  return (a - mod(a, m)) / m;
}
