/**
 * Raster Transformation
 *
 * Resamples an image or label grid under an affine transformation and
 * computes the translation that keeps the resampled grid aligned with the
 * continuous-space result.
 *
 * Only the linear part changes the pixels. The offset of the output grid
 * (including the corner padding that rotations introduce) is returned as
 * `rasterTranslation` and goes into the element's registry.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import type { AxisName, InterpolationOrder, NDArray } from '../types.js';
import { AxisMismatchError, InvalidArgumentError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { transformPoint } from './matrix.js';
import { eagerCompute, type ArrayCompute, type ResamplePlan } from './resample.js';
import { Sequence, Translation, type AffineTransform } from './transformations.js';

const logger = createLogger('raster');

export interface RasterTransformOptions {
  order?: InterpolationOrder;
  prefilter?: boolean;
  compute?: ArrayCompute;
  config?: EngineConfig;
}

export interface RasterTransformResult {
  array: NDArray;

  /** Offset + half-pixel correction of the resampled grid */
  rasterTranslation: Translation;
}

/**
 * Spatial dims of a raster, in array order (everything except `c`)
 */
export function spatialDimsOf(dims: readonly AxisName[]): AxisName[] {
  return dims.filter((d) => d !== 'c');
}

/**
 * Integer size covering a continuous extent; extents within rounding noise of
 * an integer are not bumped to the next one
 */
function extentToSize(extent: number, epsilon: number): number {
  const rounded = Math.round(extent);
  if (Math.abs(extent - rounded) <= epsilon * Math.max(1, Math.abs(extent))) {
    return rounded;
  }
  return Math.ceil(extent);
}

/**
 * Corners of the spatial extent as points over all dims (channel at 0)
 */
function cornerPoints(dims: readonly AxisName[], shape: readonly number[]): number[][] {
  const spatialIndices = dims.flatMap((d, i) => (d === 'c' ? [] : [i]));
  const corners: number[][] = [];

  for (let bits = 0; bits < 1 << spatialIndices.length; bits++) {
    const point = new Array<number>(dims.length).fill(0);
    spatialIndices.forEach((axisIndex, k) => {
      const upper = (bits >> (spatialIndices.length - 1 - k)) & 1;
      point[axisIndex] = upper * shape[axisIndex];
    });
    corners.push(point);
  }

  return corners;
}

/**
 * Apply `transformation` to a dense raster
 *
 * @throws AxisMismatchError when the transformation reads an axis the raster lacks
 */
export function transformRaster(
  array: NDArray,
  dims: readonly AxisName[],
  transformation: AffineTransform,
  options: RasterTransformOptions = {}
): RasterTransformResult {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const compute = options.compute ?? eagerCompute;

  if (dims.length !== array.shape.length) {
    throw new AxisMismatchError(
      `Raster has ${array.shape.length} dimensions but ${dims.length} axis names [${dims.join(', ')}]`
    );
  }
  const missing = transformation.inputAxes.filter((axis) => !dims.some((d) => d === axis));
  if (missing.length > 0) {
    throw new AxisMismatchError(
      `Transformation reads axes [${missing.join(', ')}] that the raster [${dims.join(', ')}] does not have`,
      { transformation: transformation.toString() }
    );
  }

  const spatialDims = spatialDimsOf(dims);
  const spatialIndices = dims.flatMap((d, i) => (d === 'c' ? [] : [i]));
  const spatialShape = spatialIndices.map((i) => array.shape[i]);
  if (spatialShape.some((n) => n === 0)) {
    throw new InvalidArgumentError('Cannot transform a raster with an empty spatial extent');
  }

  const matrix = transformation.toMatrix(dims, dims);
  const mapped = cornerPoints(dims, array.shape).map((p) => transformPoint(matrix, p));

  const min = spatialIndices.map((i) => Math.min(...mapped.map((p) => p[i])));
  const max = spatialIndices.map((i) => Math.max(...mapped.map((p) => p[i])));
  const newSpatialShape = min.map((lo, k) => extentToSize(max[k] - lo, config.epsilon));

  const outputShape = [...array.shape];
  spatialIndices.forEach((axisIndex, k) => {
    outputShape[axisIndex] = newSpatialShape[k];
  });

  const translation = new Translation(min, spatialDims);

  // maps output indices back into the input grid
  const plan: ResamplePlan = {
    matrix: new Sequence([translation, transformation.inverse(config.epsilon)]).toMatrix(dims, dims),
    outputShape,
    order: options.order ?? config.rasterOrder,
    prefilter: options.prefilter ?? false,
    cval: 0,
  };

  logger.debug(
    { dims, inputShape: array.shape, outputShape, order: plan.order },
    'Resampling raster'
  );

  const resampled = compute.affineResample(array, plan);

  const rasterTranslation = new Translation(
    min.map((offset, k) => offset + (0.5 - newSpatialShape[k] / spatialShape[k] / 2)),
    spatialDims
  );

  return { array: resampled, rasterTranslation };
}
