// Shared assertions for the test suites.

import { expect } from "vitest";

/** Component-wise toBeCloseTo; tolerates -0 vs 0 and f32 rounding. */
export function expectClose(actual: ArrayLike<number>, expected: readonly number[], digits = 5): void {
  expect(actual.length).toBe(expected.length);
  for (let i = 0; i < expected.length; i++) {
    expect(actual[i]).toBeCloseTo(expected[i], digits);
  }
}
