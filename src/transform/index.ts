/**
 * Transform Module
 *
 * Affine transformations between named coordinate systems and their
 * application to every kind of spatial element.
 */

export {
  AffineTransform,
  Identity,
  Translation,
  Scale,
  AffineMap,
  Sequence,
  compose,
  type TransformationType,
} from './transformations.js';

export {
  createIdentity,
  multiply,
  composeSteps,
  transformPoint,
  applyToPoints,
  linearPart,
  translationPart,
  determinant,
  invert,
  isIdentity,
  matricesClose,
  eigenvalueMagnitudes,
  type Matrix,
  type Vector,
} from './matrix.js';

export {
  TransformationRegistry,
  CoordinateSystemCatalog,
  defineCoordinateSystem,
  type CoordinateSystem,
} from './registry.js';

export {
  resolveForTransform,
  type TransformIntent,
  type ResolvedTransform,
} from './resolver.js';

export { eagerCompute, type ArrayCompute, type ResamplePlan } from './resample.js';
export { transformRaster, spatialDimsOf, type RasterTransformOptions, type RasterTransformResult } from './raster.js';
export { transformMultiscale, levelScale, scaleFromShapes, anchorLevels } from './multiscale.js';
export { transformPointCoordinates } from './points.js';
export { transformShapes, radiusScaleFactor, shapeAxes } from './polygons.js';
export { adjustTransformations, transformationToPrepend, type AdjustmentInput } from './adjust.js';
export { applyTransform, transformDataset, type TransformOptions } from './dispatch.js';

export {
  transformationToJSON,
  transformationFromJSON,
  registryToJSON,
  registryFromJSON,
  type TransformationJSON,
} from './serialize.js';
