import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Polygon } from 'geojson';

const warn = vi.hoisted(() => vi.fn());

vi.mock('../../utils/logger.js', () => ({
  createLogger: () => ({ warn, info: vi.fn(), debug: vi.fn(), error: vi.fn() }),
}));

import { radiusScaleFactor, shapeAxes, transformShapes } from '../polygons.js';
import { AffineMap, Scale, Translation } from '../transformations.js';
import type { ShapeGeometry } from '../../types.js';

const square: Polygon = {
  type: 'Polygon',
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

beforeEach(() => {
  warn.mockClear();
});

describe('transformShapes', () => {
  it('translates every vertex of a polygon', () => {
    const result = transformShapes([square], {}, new Translation([1, 2], ['x', 'y']));

    expect(result.geometries).toEqual([
      {
        type: 'Polygon',
        coordinates: [
          [
            [1, 2],
            [2, 2],
            [2, 3],
            [1, 3],
            [1, 2],
          ],
        ],
      },
    ]);
    expect(result.attributes).toEqual({});
  });

  it('maps multipolygons', () => {
    const multi: ShapeGeometry = {
      type: 'MultiPolygon',
      coordinates: [square.coordinates, square.coordinates],
    };
    const result = transformShapes([multi], {}, new Scale([2, 3], ['x', 'y']));
    const [geometry] = result.geometries;

    expect(geometry.type).toBe('MultiPolygon');
    if (geometry.type === 'MultiPolygon') {
      expect(geometry.coordinates[1][0][2]).toEqual([2, 3]);
    }
  });

  it('scales circle radii by a uniform scale', () => {
    const circles: ShapeGeometry[] = [
      { type: 'Point', coordinates: [1, 1] },
      { type: 'Point', coordinates: [2, 3] },
    ];
    const result = transformShapes(circles, { radius: [1, 0.5], id: [7, 8] }, new Scale([2, 2], ['x', 'y']));

    expect(result.geometries).toEqual([
      { type: 'Point', coordinates: [2, 2] },
      { type: 'Point', coordinates: [4, 6] },
    ]);
    expect(result.attributes).toEqual({ radius: [2, 1], id: [7, 8] });
    expect(warn).not.toHaveBeenCalled();
  });

  it('uses the mean eigenvalue magnitude for anisotropic maps and warns', () => {
    const circles: ShapeGeometry[] = [{ type: 'Point', coordinates: [0, 0] }];
    const result = transformShapes(circles, { radius: [1] }, new Scale([2, 4], ['x', 'y']));

    expect(result.attributes.radius).toEqual([3]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('does not modify its input', () => {
    const attributes = { radius: [1] };
    const circles: ShapeGeometry[] = [{ type: 'Point', coordinates: [1, 1] }];
    transformShapes(circles, attributes, new Scale([5, 5], ['x', 'y']));

    expect(attributes.radius).toEqual([1]);
    expect(circles[0]).toEqual({ type: 'Point', coordinates: [1, 1] });
  });
});

describe('radiusScaleFactor', () => {
  it('treats scaled rotations as isotropic', () => {
    const rotation = new AffineMap(
      [
        [0, -3, 0],
        [3, 0, 0],
        [0, 0, 1],
      ],
      ['x', 'y'],
      ['x', 'y']
    );
    expect(radiusScaleFactor(rotation.toMatrix(['x', 'y'], ['x', 'y']))).toBeCloseTo(3, 10);
    expect(warn).not.toHaveBeenCalled();
  });
});

describe('shapeAxes', () => {
  it('reads the dimensionality from the first position', () => {
    expect(shapeAxes([square])).toEqual(['x', 'y']);
    expect(shapeAxes([{ type: 'Point', coordinates: [1, 2, 3] }])).toEqual(['x', 'y', 'z']);
    expect(shapeAxes([])).toEqual(['x', 'y']);
  });
});
