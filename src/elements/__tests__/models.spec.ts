import { describe, it, expect } from 'vitest';
import { TransformationRegistry } from '../../transform/registry.js';
import type { MultiscaleRaster, PointTable, PolygonSet, Raster } from '../../types.js';
import { SchemaValidationError } from '../../utils/errors.js';
import { getAxesNames, getModel, isMultiscale, isPointTable, validateElement } from '../models.js';
import { createNDArray, downsample, getValue } from '../ndarray.js';

const anchored = TransformationRegistry.placeholder();

function raster(overrides: Partial<Raster> = {}): Raster {
  return {
    kind: 'raster',
    role: 'image',
    dims: ['c', 'y', 'x'],
    array: createNDArray([1, 2, 3, 4], [1, 2, 2], 'uint8'),
    registry: anchored,
    ...overrides,
  };
}

function points(overrides: Partial<PointTable> = {}): PointTable {
  return {
    kind: 'points',
    axes: ['x', 'y'],
    coordinates: [
      [0, 0],
      [1, 1],
    ],
    columns: {},
    registry: anchored,
    ...overrides,
  };
}

const square = {
  type: 'Polygon' as const,
  coordinates: [
    [
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 1],
      [0, 0],
    ],
  ],
};

function shapes(overrides: Partial<PolygonSet> = {}): PolygonSet {
  return { kind: 'shapes', geometries: [square], attributes: {}, registry: anchored, ...overrides };
}

describe('validateElement', () => {
  describe('rasters', () => {
    it('accepts a well-formed image', () => {
      expect(() => validateElement(raster())).not.toThrow();
    });

    it('rejects dims that do not fit the role', () => {
      expect(() => validateElement(raster({ dims: ['y', 'x', 'c'] }))).toThrow(SchemaValidationError);
      expect(() => validateElement(raster({ role: 'labels', array: createNDArray([1, 2, 3, 4], [1, 2, 2], 'int32') }))).toThrow(
        SchemaValidationError
      );
    });

    it('rejects data that does not match the shape', () => {
      const broken = raster({ array: { shape: [1, 2, 2], data: new Uint8Array(3) } });
      expect(() => validateElement(broken)).toThrow('Data has 3 values, shape [1, 2, 2] needs 4');
    });

    it('requires an integer dtype for labels', () => {
      const labels = raster({ role: 'labels', dims: ['y', 'x'], array: createNDArray([0, 1, 1, 0], [2, 2]) });
      expect(() => validateElement(labels)).toThrow('Labels must have an integer dtype');
    });

    it('requires one channel name per channel', () => {
      expect(() => validateElement(raster({ channelNames: ['dapi', 'cd3'] }))).toThrow(
        '2 channel names for 1 channels'
      );
    });

    it('requires at least one anchoring', () => {
      expect(() => validateElement(raster({ registry: TransformationRegistry.empty() }))).toThrow(
        'An element must be anchored in at least one coordinate system'
      );
    });
  });

  describe('multiscale rasters', () => {
    const level0 = raster({ array: createNDArray(new Array<number>(16).fill(0), [1, 4, 4], 'uint8') });
    const level1 = raster({ array: createNDArray(new Array<number>(4).fill(0), [1, 2, 2], 'uint8') });

    function pyramid(levels: Raster[]): MultiscaleRaster {
      return { kind: 'multiscale', role: 'image', dims: ['c', 'y', 'x'], levels, registry: anchored };
    }

    it('accepts shrinking levels', () => {
      expect(() => validateElement(pyramid([level0, level1]))).not.toThrow();
    });

    it('rejects a level larger than the one before', () => {
      expect(() => validateElement(pyramid([level1, level0]))).toThrow('Level 1 is larger than level 0');
    });

    it('rejects an empty pyramid', () => {
      expect(() => validateElement(pyramid([]))).toThrow(SchemaValidationError);
    });
  });

  describe('points', () => {
    it('accepts 2D points with columns', () => {
      expect(() => validateElement(points({ columns: { gene: ['a', 'b'] } }))).not.toThrow();
    });

    it('rejects rows of the wrong length', () => {
      expect(() => validateElement(points({ coordinates: [[0, 0, 0]] }))).toThrow(
        'Point 0 has 3 coordinates for 2 axes'
      );
    });

    it('rejects columns named after an axis or of the wrong length', () => {
      expect(() => validateElement(points({ columns: { x: [1, 2] } }))).toThrow(
        "Column 'x' clashes with a coordinate axis"
      );
      expect(() => validateElement(points({ columns: { gene: ['a'] } }))).toThrow(
        "Column 'gene' has 1 values for 2 points"
      );
    });
  });

  describe('shapes', () => {
    it('accepts closed polygons', () => {
      expect(() => validateElement(shapes())).not.toThrow();
    });

    it('rejects open rings', () => {
      const open = {
        type: 'Polygon' as const,
        coordinates: [
          [
            [0, 0],
            [1, 0],
            [1, 1],
            [0, 1],
          ],
        ],
      };
      expect(() => validateElement(shapes({ geometries: [open] }))).toThrow(
        'A polygon ring must be closed (first position equals last)'
      );
    });

    it('requires a positive radius for circles', () => {
      const circle = { type: 'Point' as const, coordinates: [1, 1] };
      expect(() => validateElement(shapes({ geometries: [circle] }))).toThrow(
        'Point geometries are circles and need a positive radius attribute'
      );
      expect(() => validateElement(shapes({ geometries: [circle], attributes: { radius: [0] } }))).toThrow(
        SchemaValidationError
      );
      expect(() => validateElement(shapes({ geometries: [circle], attributes: { radius: [2] } }))).not.toThrow();
    });

    it('rejects geometries that mix 2D and 3D positions', () => {
      const geometries = [
        { type: 'Point' as const, coordinates: [0, 0] },
        { type: 'Point' as const, coordinates: [0, 0, 1] },
      ];
      expect(() => validateElement(shapes({ geometries, attributes: { radius: [1, 1] } }))).toThrow(
        'Invalid shapes element: geometries mix 2D and 3D positions'
      );
    });
  });
});

describe('element introspection', () => {
  it('reports the model of each element', () => {
    expect(getModel(raster())).toBe('image');
    expect(getModel(raster({ role: 'labels' }))).toBe('labels');
    expect(getModel(points())).toBe('points');
    expect(getModel(shapes())).toBe('shapes');
  });

  it('reports axis names in element order', () => {
    expect(getAxesNames(raster())).toEqual(['c', 'y', 'x']);
    expect(getAxesNames(points({ axes: ['x', 'y', 'z'], coordinates: [[0, 0, 0]] }))).toEqual(['x', 'y', 'z']);
    expect(getAxesNames(shapes())).toEqual(['x', 'y']);
  });

  it('narrows by kind', () => {
    expect(isPointTable(points())).toBe(true);
    expect(isPointTable(raster())).toBe(false);
    expect(isMultiscale(raster())).toBe(false);
  });
});

describe('ndarray', () => {
  it('copies values into the requested dtype', () => {
    const array = createNDArray([1.7, 2.2], [2], 'int16');
    expect(array.data).toBeInstanceOf(Int16Array);
    expect(Array.from(array.data)).toEqual([1, 2]);
  });

  it('rejects a shape that does not match the values', () => {
    expect(() => createNDArray([1, 2, 3], [2, 2])).toThrow('Array of 3 values does not match shape [2, 2]');
  });

  it('reads values by multi-index', () => {
    const array = createNDArray([0, 1, 2, 3, 4, 5], [2, 3]);
    expect(getValue(array, [1, 2])).toBe(5);
    expect(getValue(array, [0, 1])).toBe(1);
  });

  it('downsamples by keeping every n-th sample', () => {
    const array = createNDArray([0, 1, 2, 3, 4, 5, 6, 7, 8], [3, 3]);
    const half = downsample(array, [2, 2]);
    expect(half.shape).toEqual([1, 1]);
    expect(Array.from(half.data)).toEqual([0]);
    expect(() => downsample(array, [2])).toThrow('Downsampling factors must be positive integers, one per axis');
  });
});
