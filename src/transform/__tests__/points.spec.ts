import { describe, it, expect } from 'vitest';
import { transformPointCoordinates } from '../points.js';
import { AffineMap, Identity, Scale, Translation } from '../transformations.js';
import { AxisMismatchError } from '../../utils/errors.js';
import { expectPointsCloseTo } from './helpers.js';

describe('transformPointCoordinates', () => {
  const triangle = [
    [0, 0],
    [1, 0],
    [0, 1],
  ];

  it('scales coordinates', () => {
    expect(transformPointCoordinates(triangle, ['x', 'y'], new Scale([2, 2], ['x', 'y']))).toEqual([
      [0, 0],
      [2, 0],
      [0, 2],
    ]);
  });

  it('leaves coordinates unchanged under the identity', () => {
    expect(transformPointCoordinates(triangle, ['x', 'y'], new Identity())).toEqual(triangle);
  });

  it('maps 3D points, passing untouched axes through', () => {
    const result = transformPointCoordinates(
      [
        [1, 2, 3],
        [4, 5, 6],
      ],
      ['x', 'y', 'z'],
      new Translation([10], ['z'])
    );
    expect(result).toEqual([
      [1, 2, 13],
      [4, 5, 16],
    ]);
  });

  it('rotates points', () => {
    const rotation = new AffineMap(
      [
        [0, -1, 0],
        [1, 0, 0],
        [0, 0, 1],
      ],
      ['x', 'y'],
      ['x', 'y']
    );
    expectPointsCloseTo(transformPointCoordinates(triangle, ['x', 'y'], rotation), [
      [0, 0],
      [0, 1],
      [-1, 0],
    ]);
  });

  it('does not modify its input', () => {
    const input = [[1, 1]];
    transformPointCoordinates(input, ['x', 'y'], new Scale([3, 3], ['x', 'y']));
    expect(input).toEqual([[1, 1]]);
  });

  it('rejects rows that do not match the axes', () => {
    expect(() => transformPointCoordinates([[1, 2, 3]], ['x', 'y'], new Identity())).toThrow(AxisMismatchError);
  });
});
