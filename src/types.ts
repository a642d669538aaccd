/**
 * spatial-align Type Definitions
 */

import type { MultiPolygon, Point, Polygon } from 'geojson';
import type { TransformationRegistry } from './transform/registry.js';

// ============================================================================
// Axes
// ============================================================================

export type SpatialAxis = 'x' | 'y' | 'z';

/** Axis of an element; `c` is the channel axis of images */
export type AxisName = SpatialAxis | 'c';

export type AxisType = 'space' | 'channel';

export interface Axis {
  name: string;
  type: AxisType;
}

// ============================================================================
// Arrays
// ============================================================================

export type DType =
  | 'uint8'
  | 'uint16'
  | 'uint32'
  | 'int8'
  | 'int16'
  | 'int32'
  | 'float32'
  | 'float64';

export type NumericArray =
  | Uint8Array
  | Uint16Array
  | Uint32Array
  | Int8Array
  | Int16Array
  | Int32Array
  | Float32Array
  | Float64Array;

/**
 * Dense N-dimensional array, row-major (last axis varies fastest)
 */
export interface NDArray {
  readonly shape: readonly number[];
  readonly data: NumericArray;
}

/** 0 = nearest neighbour, 1 = multilinear */
export type InterpolationOrder = 0 | 1;

// ============================================================================
// Spatial Elements
// ============================================================================

export type RasterRole = 'image' | 'labels';

export interface Raster {
  readonly kind: 'raster';

  /** Intensity image (with a `c` axis) or integer label mask (without) */
  readonly role: RasterRole;

  /** Axis names in array order, e.g. ['c', 'y', 'x'] */
  readonly dims: readonly AxisName[];

  readonly array: NDArray;

  /** Optional names for the entries of the `c` axis */
  readonly channelNames?: readonly (string | number)[];

  readonly registry: TransformationRegistry;
}

export interface MultiscaleRaster {
  readonly kind: 'multiscale';
  readonly role: RasterRole;
  readonly dims: readonly AxisName[];

  /** Pyramid levels, level 0 at full resolution */
  readonly levels: readonly Raster[];

  readonly registry: TransformationRegistry;
}

export type ColumnValue = number | string;

export interface PointTable {
  readonly kind: 'points';

  /** Coordinate columns, e.g. ['x', 'y'] */
  readonly axes: readonly SpatialAxis[];

  /** One row per point, one entry per axis */
  readonly coordinates: readonly (readonly number[])[];

  /** Non-coordinate columns, one value per point */
  readonly columns: Readonly<Record<string, readonly ColumnValue[]>>;

  readonly registry: TransformationRegistry;
}

export type ShapeGeometry = Point | Polygon | MultiPolygon;

export interface PolygonSet {
  readonly kind: 'shapes';
  readonly geometries: readonly ShapeGeometry[];

  /** Per-geometry scalar attributes, e.g. `radius` for circles */
  readonly attributes: Readonly<Record<string, readonly number[]>>;

  readonly registry: TransformationRegistry;
}

export type SpatialEntity = Raster | MultiscaleRaster | PointTable | PolygonSet;

export type ElementKind = SpatialEntity['kind'];

/** Schema model tag of an element */
export type ElementModel = RasterRole | 'points' | 'shapes';

// ============================================================================
// Pipeline
// ============================================================================

export interface PipelineConfig {
  input: {
    /** Path of the dataset document to read */
    documentPath: string;
  };

  transform: {
    /** Target coordinate system */
    toCoordinateSystem?: string;

    /** Explicit transformation, NGFF JSON */
    transformation?: unknown;

    maintainPositioning: boolean;

    /** Transform only this element instead of the whole dataset */
    element?: string;
  };

  output: {
    /** Path of the dataset document to write */
    documentPath: string;
  };
}

export interface ProcessingResult {
  outputPath: string;
  elementCount: number;
  coordinateSystems: string[];
  processingTimeMs: number;
}
