/**
 * Multiscale Raster Transformation
 *
 * Every pyramid level is resampled with the transformation conjugated by the
 * level's own scale, so all levels stay aligned to the same physical result.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import type { AxisName, MultiscaleRaster, Raster } from '../types.js';
import { InvariantViolationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ArrayCompute } from './resample.js';
import { spatialDimsOf, transformRaster } from './raster.js';
import { TransformationRegistry } from './registry.js';
import { Identity, Scale, Sequence, type AffineTransform, type Translation } from './transformations.js';

const logger = createLogger('multiscale');

export interface MultiscaleTransformResult {
  levels: Raster[];

  /** Taken from level 0 */
  rasterTranslation: Translation;
}

/**
 * Scale of a level relative to level 0, read from the level's own registry
 * (the diagonal of its default-system transformation)
 */
export function levelScale(level: Raster, config: EngineConfig = DEFAULT_ENGINE_CONFIG): Scale {
  const spatial = spatialDimsOf(level.dims);
  const t = level.registry.has(config.defaultCoordinateSystem)
    ? level.registry.get(config.defaultCoordinateSystem)
    : new Identity();
  const matrix = t.toMatrix(spatial, spatial);
  return new Scale(
    spatial.map((_, i) => matrix[i][i]),
    spatial
  );
}

/**
 * Scale of a level derived from its shape relative to level 0
 */
export function scaleFromShapes(
  base: readonly number[],
  level: readonly number[],
  dims: readonly AxisName[]
): Scale {
  const spatial = spatialDimsOf(dims);
  const factors = dims.flatMap((d, i) => (d === 'c' ? [] : [base[i] / level[i]]));
  return new Scale(factors, spatial);
}

/**
 * Anchor every level in the default coordinate system with its intrinsic scale
 */
export function anchorLevels(
  levels: readonly Raster[],
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): Raster[] {
  if (levels.length === 0) return [];
  const base = levels[0].array.shape;

  return levels.map((level, i) => {
    const scale: AffineTransform =
      i === 0 ? new Identity() : scaleFromShapes(base, level.array.shape, level.dims);
    return {
      ...level,
      registry: TransformationRegistry.fromEntries([[config.defaultCoordinateSystem, scale]]),
    };
  });
}

/**
 * Apply `transformation` to every level of a pyramid
 */
export function transformMultiscale(
  data: MultiscaleRaster,
  transformation: AffineTransform,
  options: { compute?: ArrayCompute; config?: EngineConfig } = {}
): MultiscaleTransformResult {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  if (data.levels.length === 0) {
    throw new InvariantViolationError('Multiscale raster has no levels');
  }

  // label values must stay discrete
  const order = data.role === 'labels' ? 0 : config.multiscaleImageOrder;

  const levels: Raster[] = [];
  let rasterTranslation: Translation | undefined;

  for (const [i, level] of data.levels.entries()) {
    let composed: AffineTransform = transformation;
    if (i > 0) {
      const scale = levelScale(level, config);
      composed = new Sequence([scale, transformation, scale.inverse()]);
    }

    const result = transformRaster(level.array, level.dims, composed, {
      order,
      prefilter: false,
      compute: options.compute,
      config,
    });
    rasterTranslation ??= result.rasterTranslation;

    logger.debug({ level: i, shape: result.array.shape }, 'Transformed pyramid level');

    levels.push({
      kind: 'raster',
      role: level.role,
      dims: level.dims,
      array: result.array,
      ...(level.channelNames && { channelNames: level.channelNames }),
      registry: TransformationRegistry.placeholder(config.defaultCoordinateSystem),
    });
  }

  if (!rasterTranslation) {
    throw new InvariantViolationError('Level 0 produced no raster translation');
  }

  return { levels, rasterTranslation };
}
