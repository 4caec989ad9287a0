import type { StepCommand } from "../src/types";

export const L = (magnitude: number): StepCommand => ({ direction: "lower", magnitude });
export const R = (magnitude: number): StepCommand => ({ direction: "higher", magnitude });

/**
 * Reference count: walk one click at a time and count every arrival on a
 * multiple of the modulus.
 */
export function bruteForceCrossings(pre: number, command: StepCommand, modulus = 100): number {
  const delta = command.direction === "higher" ? 1 : -1;
  let pos = pre;
  let hits = 0;
  for (let i = 0; i < command.magnitude; i++) {
    pos += delta;
    if (pos % modulus === 0) hits++;
  }
  return hits;
}
