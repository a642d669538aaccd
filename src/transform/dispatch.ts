/**
 * Transform Dispatcher
 *
 * Single entry point that applies a transformation to any element: resolve
 * what to apply, transform the data with the transformer for its kind,
 * rewrite the registry, validate the result.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import { SpatialDataset } from '../elements/dataset.js';
import { validateElement } from '../elements/models.js';
import type { MultiscaleRaster, PointTable, PolygonSet, Raster, SpatialEntity } from '../types.js';
import { AmbiguousTransformError, InvalidArgumentError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { adjustTransformations } from './adjust.js';
import { anchorLevels, transformMultiscale } from './multiscale.js';
import { transformPointCoordinates } from './points.js';
import { transformShapes } from './polygons.js';
import { transformRaster } from './raster.js';
import { TransformationRegistry } from './registry.js';
import type { ArrayCompute } from './resample.js';
import { resolveForTransform, TARGET_COORDINATE_SYSTEM_REQUIRED } from './resolver.js';
import type { AffineTransform, Translation } from './transformations.js';

const logger = createLogger('dispatch');

export interface TransformOptions {
  transformation?: AffineTransform;
  toCoordinateSystem?: string;
  maintainPositioning?: boolean;
  config?: EngineConfig;
  compute?: ArrayCompute;
}

interface TransformedData<T extends SpatialEntity> {
  entity: T;
  rasterTranslation: Translation | null;
}

function transformData(
  entity: SpatialEntity,
  transformation: AffineTransform,
  config: EngineConfig,
  compute: ArrayCompute | undefined
): TransformedData<SpatialEntity> {
  const placeholder = TransformationRegistry.placeholder(config.defaultCoordinateSystem);

  switch (entity.kind) {
    case 'raster': {
      const result = transformRaster(entity.array, entity.dims, transformation, { compute, config });
      const raster: Raster = { ...entity, array: result.array, registry: placeholder };
      return { entity: raster, rasterTranslation: result.rasterTranslation };
    }
    case 'multiscale': {
      const result = transformMultiscale(entity, transformation, { compute, config });
      const multiscale: MultiscaleRaster = { ...entity, levels: result.levels, registry: placeholder };
      return { entity: multiscale, rasterTranslation: result.rasterTranslation };
    }
    case 'points': {
      const points: PointTable = {
        ...entity,
        coordinates: transformPointCoordinates(entity.coordinates, entity.axes, transformation),
        columns: { ...entity.columns },
        registry: placeholder,
      };
      return { entity: points, rasterTranslation: null };
    }
    case 'shapes': {
      const result = transformShapes(entity.geometries, entity.attributes, transformation, config);
      const shapes: PolygonSet = { ...entity, ...result, registry: placeholder };
      return { entity: shapes, rasterTranslation: null };
    }
  }
}

/**
 * Apply a transformation to an element
 *
 * Without `maintainPositioning` the result is anchored only in
 * `toCoordinateSystem`, by a transformation that is the identity up to the
 * raster offset. With it, the element keeps every anchoring it had and stays
 * where it was in each of them.
 *
 * @throws AmbiguousTransformError | InvalidArgumentError | CoordinateSystemNotFoundError
 *   when the request cannot be resolved
 * @throws SchemaValidationError when the result is not a valid element
 */
export function applyTransform<T extends SpatialEntity>(entity: T, options?: TransformOptions): T;
export function applyTransform(entity: SpatialEntity, options: TransformOptions = {}): SpatialEntity {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const maintainPositioning = options.maintainPositioning ?? false;

  const resolved = resolveForTransform(
    entity.registry,
    {
      transformation: options.transformation,
      toCoordinateSystem: options.toCoordinateSystem,
      maintainPositioning,
    },
    config
  );

  logger.debug(
    {
      kind: entity.kind,
      transformation: resolved.transformation.toString(),
      toCoordinateSystem: resolved.toCoordinateSystem,
      maintainPositioning,
    },
    'Applying transformation'
  );

  const transformed = transformData(entity, resolved.transformation, config, options.compute);

  let result = adjustTransformations(
    transformed.entity,
    {
      oldRegistry: entity.registry,
      transformation: resolved.transformation,
      rasterTranslation: transformed.rasterTranslation,
      maintainPositioning,
      toCoordinateSystem: resolved.toCoordinateSystem,
    },
    config
  );

  if (result.kind === 'multiscale') {
    result = { ...result, levels: anchorLevels(result.levels, config) };
  }

  validateElement(result);
  return result;
}

/**
 * Apply a transformation to every element of a dataset
 *
 * Without `maintainPositioning` only a target coordinate system is accepted;
 * elements not anchored in it are left out of the result.
 */
export function transformDataset(dataset: SpatialDataset, options: TransformOptions = {}): SpatialDataset {
  const maintainPositioning = options.maintainPositioning ?? false;
  let source = dataset;

  if (!maintainPositioning) {
    if (options.transformation !== undefined || options.toCoordinateSystem === undefined) {
      throw new AmbiguousTransformError(TARGET_COORDINATE_SYSTEM_REQUIRED, {
        toCoordinateSystem: options.toCoordinateSystem,
      });
    }
    source = dataset.filterByCoordinateSystem(options.toCoordinateSystem);
    const dropped = dataset.size - source.size;
    if (dropped > 0) {
      logger.info(
        { toCoordinateSystem: options.toCoordinateSystem, dropped },
        'Elements not anchored in the target coordinate system were dropped'
      );
    }
  } else if ((options.transformation === undefined) === (options.toCoordinateSystem === undefined)) {
    throw new InvalidArgumentError(
      'When maintainPositioning is true, exactly one of transformation and toCoordinateSystem must be given'
    );
  }

  return SpatialDataset.fromEntries(
    source.entries().map(({ name, element }) => ({
      name,
      element: applyTransform(element, options),
    }))
  );
}
