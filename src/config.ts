/**
 * Engine Configuration
 *
 * Shared, immutable settings passed explicitly (with a default) to every
 * operation of the transformation engine.
 */

import type { InterpolationOrder } from './types.js';

export interface IsotropyTolerance {
  /** Relative tolerance when comparing eigenvalue magnitudes */
  rtol: number;

  /** Absolute tolerance when comparing eigenvalue magnitudes */
  atol: number;
}

export interface EngineConfig {
  /** Coordinate system every freshly built element is anchored in */
  defaultCoordinateSystem: string;

  /** Threshold under which determinants and extents are treated as zero */
  epsilon: number;

  /** Tolerance deciding whether a linear map scales radii isotropically */
  isotropy: IsotropyTolerance;

  /**
   * Accept an explicit transformation without a target coordinate system when
   * the element has exactly one, identical, anchoring. Deprecated behaviour.
   */
  allowExplicitTransformShim: boolean;

  /** Interpolation order for single-scale rasters */
  rasterOrder: InterpolationOrder;

  /** Interpolation order for multiscale images (labels always use 0) */
  multiscaleImageOrder: InterpolationOrder;
}

export const DEFAULT_COORDINATE_SYSTEM = 'global';

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze<EngineConfig>({
  defaultCoordinateSystem: DEFAULT_COORDINATE_SYSTEM,
  epsilon: 1e-10,
  isotropy: Object.freeze({ rtol: 1e-5, atol: 1e-8 }),
  allowExplicitTransformShim: true,
  rasterOrder: 0,
  multiscaleImageOrder: 1,
});

/**
 * Create an engine configuration, overriding selected defaults
 */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    isotropy: { ...DEFAULT_ENGINE_CONFIG.isotropy, ...overrides.isotropy },
  };
}
