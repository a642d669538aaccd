/**
 * Point Table Transformation
 */

import type { SpatialAxis } from '../types.js';
import { AxisMismatchError } from '../utils/errors.js';
import { applyToPoints } from './matrix.js';
import type { AffineTransform } from './transformations.js';

/**
 * Transform N x D coordinate rows whose columns are `axes`.
 * Points carry no discretisation, so no translation correction is needed.
 */
export function transformPointCoordinates(
  coordinates: readonly (readonly number[])[],
  axes: readonly SpatialAxis[],
  transformation: AffineTransform
): number[][] {
  const bad = coordinates.findIndex((row) => row.length !== axes.length);
  if (bad >= 0) {
    throw new AxisMismatchError(
      `Point ${bad} has ${coordinates[bad].length} coordinates for axes [${axes.join(', ')}]`
    );
  }

  const matrix = transformation.toMatrix(axes, axes);
  return applyToPoints(matrix, coordinates.map((row) => [...row]));
}
