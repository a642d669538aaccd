import { describe, it, expect, vi } from 'vitest';
import { createNDArray } from '../../elements/ndarray.js';
import { AxisMismatchError, InvalidArgumentError } from '../../utils/errors.js';
import { eagerCompute, type ArrayCompute } from '../resample.js';
import { spatialDimsOf, transformRaster } from '../raster.js';
import { AffineMap, Identity, Scale, Translation } from '../transformations.js';

// y' = x, x' = -y
const rotate90 = new AffineMap(
  [
    [0, 1, 0],
    [-1, 0, 0],
    [0, 0, 1],
  ],
  ['y', 'x'],
  ['y', 'x']
);

describe('transformRaster', () => {
  it('keeps the pixels of a pure translation and moves them by the raster translation', () => {
    const values = Array.from({ length: 100 }, (_, i) => i);
    const array = createNDArray(values, [1, 10, 10]);

    const result = transformRaster(array, ['c', 'y', 'x'], new Translation([5, 5], ['y', 'x']));

    expect(result.array.shape).toEqual([1, 10, 10]);
    expect(Array.from(result.array.data)).toEqual(values);
    expect(result.rasterTranslation.equals(new Translation([5, 5], ['y', 'x']))).toBe(true);
  });

  it('returns a non-integer translation exactly', () => {
    const values = Array.from({ length: 100 }, (_, i) => i);
    const array = createNDArray(values, [1, 10, 10]);
    const translation = new Translation([0.1, 0.01], ['y', 'x']);

    const result = transformRaster(array, ['c', 'y', 'x'], translation);

    expect(result.array.shape).toEqual([1, 10, 10]);
    expect(Array.from(result.array.data)).toEqual(values);
    expect(result.rasterTranslation.translation).toEqual([0.1, 0.01]);
    expect(result.rasterTranslation.equals(translation)).toBe(true);
  });

  it('swaps the extents under a 90 degree rotation and zero-fills the uncovered pixels', () => {
    const array = createNDArray([1, 2, 3, 4, 5, 6], [2, 3], 'int32');

    const result = transformRaster(array, ['y', 'x'], rotate90);

    expect(result.array.shape).toEqual([3, 2]);
    expect(result.array.data).toBeInstanceOf(Int32Array);
    expect(Array.from(result.array.data)).toEqual([0, 4, 0, 5, 0, 6]);
    expect(result.rasterTranslation.axes).toEqual(['y', 'x']);
    expect(result.rasterTranslation.translation[0]).toBe(-0.25);
    expect(result.rasterTranslation.translation[1]).toBeCloseTo(-1.8333333333, 8);
  });

  it('leaves the data unchanged under the identity', () => {
    const array = createNDArray([1, 2, 3, 4], [2, 2], 'uint8');
    const result = transformRaster(array, ['y', 'x'], new Identity());

    expect(Array.from(result.array.data)).toEqual([1, 2, 3, 4]);
    expect(result.rasterTranslation.translation).toEqual([0, 0]);
  });

  it('upsamples by a scale', () => {
    const array = createNDArray([1, 2, 3, 4], [2, 2], 'uint8');
    const result = transformRaster(array, ['y', 'x'], new Scale([2, 2], ['y', 'x']));

    expect(result.array.shape).toEqual([4, 4]);
    // nearest neighbour of output index i is round(i / 2)
    expect(Array.from(result.array.data)).toEqual([1, 2, 2, 0, 3, 4, 4, 0, 3, 4, 4, 0, 0, 0, 0, 0]);
    expect(result.rasterTranslation.translation).toEqual([-0.5, -0.5]);
  });

  it('does not grow the output for extents within rounding noise of an integer', () => {
    const array = createNDArray(new Array<number>(100).fill(1), [10, 10]);
    const result = transformRaster(array, ['y', 'x'], new Scale([0.1 * 3, 0.1 * 3], ['y', 'x']));

    // 10 * 0.30000000000000004 is just above 3
    expect(result.array.shape).toEqual([3, 3]);
  });

  it('hands a data-only plan to the compute collaborator', () => {
    const compute: ArrayCompute = { affineResample: vi.fn(eagerCompute.affineResample) };
    const array = createNDArray([1, 2, 3, 4], [2, 2]);

    transformRaster(array, ['y', 'x'], new Translation([1, 0], ['y', 'x']), { compute, order: 1 });

    expect(compute.affineResample).toHaveBeenCalledWith(array, {
      matrix: [
        [1, 0, 0],
        [0, 1, 0],
        [0, 0, 1],
      ],
      outputShape: [2, 2],
      order: 1,
      prefilter: false,
      cval: 0,
    });
  });

  it('rejects transformations over axes the raster does not have', () => {
    const array = createNDArray([1, 2, 3, 4], [2, 2]);
    expect(() => transformRaster(array, ['y', 'x'], new Translation([1], ['z']))).toThrow(AxisMismatchError);
    expect(() => transformRaster(array, ['c', 'y', 'x'], new Identity())).toThrow(AxisMismatchError);
  });

  it('rejects rasters without spatial extent', () => {
    const array = createNDArray([], [0, 2]);
    expect(() => transformRaster(array, ['y', 'x'], new Identity())).toThrow(InvalidArgumentError);
  });

  it('lists spatial dims in array order', () => {
    expect(spatialDimsOf(['c', 'z', 'y', 'x'])).toEqual(['z', 'y', 'x']);
  });
});
