/**
 * Shape (GeoJSON geometry) Transformation
 *
 * Positions are mapped by the full affine transform. Circles (Point
 * geometries with a `radius` attribute) get their radius scaled by the
 * magnitude of the eigenvalues of the linear part; under anisotropic maps
 * that is only an approximation (the mean magnitude) and a warning is logged.
 */

import type { Position } from 'geojson';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import type { ShapeGeometry, SpatialAxis } from '../types.js';
import { AxisMismatchError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { eigenvalueMagnitudes, linearPart, transformPoint, type Matrix } from './matrix.js';
import type { AffineTransform } from './transformations.js';

const logger = createLogger('shapes');

const SHAPE_AXES: readonly SpatialAxis[] = ['x', 'y', 'z'];

export interface ShapesTransformResult {
  geometries: ShapeGeometry[];
  attributes: Record<string, number[]>;
}

function firstPosition(geometry: ShapeGeometry): Position | undefined {
  switch (geometry.type) {
    case 'Point':
      return geometry.coordinates;
    case 'Polygon':
      return geometry.coordinates[0]?.[0];
    case 'MultiPolygon':
      return geometry.coordinates[0]?.[0]?.[0];
  }
}

/**
 * Axes of a set of geometries: x, y and, for 3D coordinates, z
 */
export function shapeAxes(geometries: readonly ShapeGeometry[]): SpatialAxis[] {
  const first = geometries.length > 0 ? firstPosition(geometries[0]) : undefined;
  const ndim = first && first.length >= 3 ? 3 : 2;
  return SHAPE_AXES.slice(0, ndim);
}

function mapGeometry(geometry: ShapeGeometry, map: (p: Position) => Position): ShapeGeometry {
  switch (geometry.type) {
    case 'Point':
      return { type: 'Point', coordinates: map(geometry.coordinates) };
    case 'Polygon':
      return { type: 'Polygon', coordinates: geometry.coordinates.map((ring) => ring.map(map)) };
    case 'MultiPolygon':
      return {
        type: 'MultiPolygon',
        coordinates: geometry.coordinates.map((polygon) => polygon.map((ring) => ring.map(map))),
      };
  }
}

/**
 * Factor by which a circle radius scales under the linear part of `matrix`
 */
export function radiusScaleFactor(matrix: Matrix, config: EngineConfig = DEFAULT_ENGINE_CONFIG): number {
  const magnitudes = eigenvalueMagnitudes(linearPart(matrix));
  const reference = magnitudes[0];
  const { rtol, atol } = config.isotropy;
  const isotropic = magnitudes.every((m) => Math.abs(m - reference) <= atol + rtol * Math.abs(reference));

  if (isotropic) return reference;

  logger.warn(
    { eigenvalueMagnitudes: magnitudes },
    'The transformation matrix is not isotropic, the radius will be scaled by the average of the ' +
      'eigenvalue magnitudes of the affine transformation matrix'
  );
  return magnitudes.reduce((sum, m) => sum + m, 0) / magnitudes.length;
}

/**
 * Apply `transformation` to every geometry (and circle radius)
 */
export function transformShapes(
  geometries: readonly ShapeGeometry[],
  attributes: Readonly<Record<string, readonly number[]>>,
  transformation: AffineTransform,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): ShapesTransformResult {
  const axes = shapeAxes(geometries);
  const matrix = transformation.toMatrix(axes, axes);

  const map = (p: Position): Position => {
    if (p.length < axes.length) {
      throw new AxisMismatchError(
        `Position [${p.join(', ')}] has fewer coordinates than the axes [${axes.join(', ')}]`
      );
    }
    return transformPoint(matrix, p.slice(0, axes.length));
  };

  const transformedAttributes: Record<string, number[]> = {};
  for (const [name, values] of Object.entries(attributes)) {
    transformedAttributes[name] = [...values];
  }

  const radius = attributes.radius;
  if (geometries[0]?.type === 'Point' && radius !== undefined) {
    const factor = radiusScaleFactor(matrix, config);
    transformedAttributes.radius = radius.map((r) => r * factor);
  }

  return {
    geometries: geometries.map((g) => mapGeometry(g, map)),
    attributes: transformedAttributes,
  };
}
