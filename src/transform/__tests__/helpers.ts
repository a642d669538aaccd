import { expect } from 'vitest';
import type { Matrix, Vector } from '../matrix.js';
import type { AffineTransform } from '../transformations.js';

export function expectMatrixCloseTo(actual: Matrix, expected: Matrix, digits = 8): void {
  expect(actual.length).toBe(expected.length);
  expected.forEach((row, r) => {
    expect(actual[r].length).toBe(row.length);
    row.forEach((value, c) => {
      expect(actual[r][c]).toBeCloseTo(value, digits);
    });
  });
}

export function expectPointsCloseTo(actual: readonly Vector[], expected: readonly Vector[], digits = 8): void {
  expect(actual.length).toBe(expected.length);
  expected.forEach((point, i) => {
    expect(actual[i].length).toBe(point.length);
    point.forEach((value, k) => {
      expect(actual[i][k]).toBeCloseTo(value, digits);
    });
  });
}

export function expectTransformCloseTo(
  actual: AffineTransform,
  expected: AffineTransform,
  axes: readonly string[],
  digits = 8
): void {
  expectMatrixCloseTo(actual.toMatrix(axes, axes), expected.toMatrix(axes, axes), digits);
}
