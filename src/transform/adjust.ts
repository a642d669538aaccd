/**
 * Registry Adjustment After a Transform
 *
 * Rewrites the registry of a freshly transformed element so that it is either
 * anchored in the target coordinate system only, or (maintained positioning)
 * still placed where it was in every coordinate system it had before.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import type { SpatialEntity } from '../types.js';
import { InvariantViolationError } from '../utils/errors.js';
import { TransformationRegistry } from './registry.js';
import { Identity, Sequence, type AffineTransform, type Translation } from './transformations.js';

export interface AdjustmentInput {
  /** Registry of the element before its data was transformed */
  oldRegistry: TransformationRegistry;

  /** Transformation that was applied to the data */
  transformation: AffineTransform;

  /** Raster elements only: offset and padding correction of the resampled grid */
  rasterTranslation: Translation | null;

  maintainPositioning: boolean;

  /** Target system; must be null when positioning is maintained */
  toCoordinateSystem: string | null;
}

/**
 * Transformation to prepend to the anchorings of the transformed element
 */
export function transformationToPrepend(
  entity: SpatialEntity,
  input: AdjustmentInput,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): AffineTransform {
  const { transformation, rasterTranslation, maintainPositioning } = input;

  switch (entity.kind) {
    case 'raster':
    case 'multiscale':
      if (!rasterTranslation) {
        throw new InvariantViolationError(`A ${entity.kind} element needs a raster translation`);
      }
      return maintainPositioning
        ? new Sequence([rasterTranslation, transformation.inverse(config.epsilon)])
        : rasterTranslation;
    case 'points':
    case 'shapes':
      if (rasterTranslation) {
        throw new InvariantViolationError(`A raster translation was given for a ${entity.kind} element`);
      }
      return maintainPositioning ? transformation.inverse(config.epsilon) : new Identity();
  }
}

/**
 * Registry the transformed element ends up with
 *
 * @throws InvariantViolationError when the element's registry is not the
 *   placeholder `{ [default]: Identity }` every transformer produces
 */
export function adjustTransformations<T extends SpatialEntity>(
  entity: T,
  input: AdjustmentInput,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): T {
  if (input.maintainPositioning && input.toCoordinateSystem !== null) {
    throw new InvariantViolationError(
      'toCoordinateSystem must be null when positioning is maintained',
      { toCoordinateSystem: input.toCoordinateSystem }
    );
  }

  if (!entity.registry.isPlaceholder(config.defaultCoordinateSystem)) {
    throw new InvariantViolationError(
      `A transformed element must carry only { ${config.defaultCoordinateSystem}: Identity } before adjustment`,
      { coordinateSystems: entity.registry.names() }
    );
  }

  const toPrepend = transformationToPrepend(entity, input, config);

  let registry: TransformationRegistry;
  if (input.maintainPositioning) {
    registry = TransformationRegistry.fromEntries(
      input.oldRegistry.entries().map(([cs, old]) => [cs, new Sequence([toPrepend, old])] as const)
    );
  } else {
    registry = TransformationRegistry.fromEntries([
      [input.toCoordinateSystem ?? config.defaultCoordinateSystem, toPrepend],
    ]);
  }

  return { ...entity, registry };
}
