/**
 * Coordinate System Resolution
 *
 * Decides which single transformation a `transform` call applies, given the
 * element's registry and what the caller asked for.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { AmbiguousTransformError, InvalidArgumentError } from '../utils/errors.js';
import type { TransformationRegistry } from './registry.js';
import type { AffineTransform } from './transformations.js';

const logger = createLogger('resolver');

export const TARGET_COORDINATE_SYSTEM_REQUIRED =
  'transform() requires `toCoordinateSystem` instead of `transformation` when positioning is not maintained, ' +
  'to avoid ambiguity when an element is anchored in several coordinate systems. ' +
  'If the transformation is not present in the element, add it to its registry first.';

export interface TransformIntent {
  transformation?: AffineTransform;
  toCoordinateSystem?: string;
  maintainPositioning: boolean;
}

export interface ResolvedTransform {
  transformation: AffineTransform;

  /** Coordinate system the result is anchored in; null when positioning is maintained */
  toCoordinateSystem: string | null;
}

/**
 * Resolve the transformation to apply to an element
 *
 * @throws AmbiguousTransformError when positioning is not maintained and the
 *   request does not name exactly one known coordinate system
 * @throws InvalidArgumentError when positioning is maintained and not exactly
 *   one of `transformation` / `toCoordinateSystem` is given
 * @throws CoordinateSystemNotFoundError when a maintained-positioning target is unknown
 */
export function resolveForTransform(
  registry: TransformationRegistry,
  intent: TransformIntent,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): ResolvedTransform {
  const { transformation, toCoordinateSystem, maintainPositioning } = intent;

  if (!maintainPositioning) {
    if (transformation === undefined && toCoordinateSystem !== undefined) {
      if (!registry.has(toCoordinateSystem)) {
        throw new AmbiguousTransformError(
          `Coordinate system '${toCoordinateSystem}' not found in element`,
          { available: registry.names() }
        );
      }
      return { transformation: registry.get(toCoordinateSystem), toCoordinateSystem };
    }

    if (
      config.allowExplicitTransformShim &&
      transformation !== undefined &&
      toCoordinateSystem === undefined &&
      registry.size === 1
    ) {
      const [[name, only]] = registry.entries();
      if (transformation.equals(only)) {
        logger.warn({ coordinateSystem: name }, TARGET_COORDINATE_SYSTEM_REQUIRED);
        return { transformation, toCoordinateSystem: name };
      }
    }

    throw new AmbiguousTransformError(TARGET_COORDINATE_SYSTEM_REQUIRED, {
      available: registry.names(),
      transformation: transformation?.toString(),
      toCoordinateSystem,
    });
  }

  const exactlyOne =
    'When maintainPositioning is true, exactly one of transformation and toCoordinateSystem must be given';

  if (transformation !== undefined) {
    if (toCoordinateSystem !== undefined) {
      throw new InvalidArgumentError(exactlyOne, { toCoordinateSystem });
    }
    return { transformation, toCoordinateSystem: null };
  }

  if (toCoordinateSystem === undefined) {
    throw new InvalidArgumentError(exactlyOne);
  }

  return { transformation: registry.get(toCoordinateSystem), toCoordinateSystem: null };
}
