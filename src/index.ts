/**
 * spatial-align
 *
 * Affine alignment of images, labels, points and shapes across named
 * coordinate systems.
 */

// Core pipeline
export { runPipeline, createDefaultConfig } from './pipeline.js';

// Configuration
export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_COORDINATE_SYSTEM,
  createEngineConfig,
  type EngineConfig,
  type IsotropyTolerance,
} from './config.js';

// Types
export type {
  // Arrays
  DType,
  NDArray,
  NumericArray,
  InterpolationOrder,

  // Axes
  Axis,
  AxisName,
  AxisType,
  SpatialAxis,

  // Elements
  Raster,
  RasterRole,
  MultiscaleRaster,
  PointTable,
  PolygonSet,
  ShapeGeometry,
  ColumnValue,
  SpatialEntity,
  ElementKind,
  ElementModel,

  // Pipeline
  PipelineConfig,
  ProcessingResult,
} from './types.js';

// Transform
export * from './transform/index.js';

// Elements
export * from './elements/index.js';

// Documents
export {
  readDocument,
  writeDocument,
  loadDocument,
  saveDocument,
  buildCatalog,
  type DatasetDocument,
  type LoadedDocument,
} from './io/document.js';

// Error types
export {
  SpatialAlignError,
  AxisMismatchError,
  CoordinateSystemNotFoundError,
  AmbiguousTransformError,
  InvalidArgumentError,
  NonInvertibleTransformError,
  SchemaValidationError,
  InvariantViolationError,
  DocumentError,
} from './utils/errors.js';

// Logger
export { createLogger, setLogLevel } from './utils/logger.js';
