/**
 * Element Factories
 *
 * Build validated elements from plain data. An element created without
 * explicit transformations is anchored in the default coordinate system by
 * the identity.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import type {
  AxisName,
  ColumnValue,
  MultiscaleRaster,
  NDArray,
  PointTable,
  PolygonSet,
  Raster,
  RasterRole,
  ShapeGeometry,
  SpatialAxis,
} from '../types.js';
import { anchorLevels } from '../transform/multiscale.js';
import { TransformationRegistry } from '../transform/registry.js';
import type { AffineTransform } from '../transform/transformations.js';
import { InvalidArgumentError } from '../utils/errors.js';
import { validateElement } from './models.js';
import { downsample } from './ndarray.js';

export interface ElementOptions {
  /** Coordinate system name -> transformation from the element's intrinsic system */
  transformations?: Readonly<Record<string, AffineTransform>>;
  config?: EngineConfig;
}

export interface RasterOptions extends ElementOptions {
  dims?: readonly AxisName[];
  channelNames?: readonly (string | number)[];
}

export interface MultiscaleOptions extends RasterOptions {
  /** Downsampling factor of each level relative to the previous one */
  scaleFactors?: readonly number[];
}

function registryFrom(options: ElementOptions): TransformationRegistry {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  return options.transformations
    ? TransformationRegistry.fromRecord(options.transformations)
    : TransformationRegistry.placeholder(config.defaultCoordinateSystem);
}

function defaultDims(role: RasterRole, ndim: number): AxisName[] {
  if (role === 'image') {
    if (ndim === 3) return ['c', 'y', 'x'];
    if (ndim === 4) return ['c', 'z', 'y', 'x'];
  } else {
    if (ndim === 2) return ['y', 'x'];
    if (ndim === 3) return ['z', 'y', 'x'];
  }
  throw new InvalidArgumentError(`Cannot infer dims of a ${ndim}D ${role} array; pass dims explicitly`);
}

export function createRaster(role: RasterRole, array: NDArray, options: RasterOptions = {}): Raster {
  const raster: Raster = {
    kind: 'raster',
    role,
    dims: options.dims ? [...options.dims] : defaultDims(role, array.shape.length),
    array,
    ...(options.channelNames && { channelNames: [...options.channelNames] }),
    registry: registryFrom(options),
  };
  validateElement(raster);
  return raster;
}

export function createImage(array: NDArray, options: RasterOptions = {}): Raster {
  return createRaster('image', array, options);
}

export function createLabels(array: NDArray, options: RasterOptions = {}): Raster {
  return createRaster('labels', array, options);
}

/**
 * Nearest-neighbour pyramid of `array`: level i+1 keeps every
 * `scaleFactors[i]`-th sample of level i along each spatial axis
 */
export function buildPyramid(
  array: NDArray,
  dims: readonly AxisName[],
  scaleFactors: readonly number[]
): NDArray[] {
  const levels = [array];
  for (const factor of scaleFactors) {
    const previous = levels[levels.length - 1];
    levels.push(downsample(previous, dims.map((d) => (d === 'c' ? 1 : factor))));
  }
  return levels;
}

/**
 * Multiscale raster from explicit levels (full resolution first), or from
 * a single array and `scaleFactors`
 */
export function createMultiscaleRaster(
  role: RasterRole,
  levels: NDArray | readonly NDArray[],
  options: MultiscaleOptions = {}
): MultiscaleRaster {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const arrays =
    'shape' in levels
      ? buildPyramid(levels, options.dims ?? defaultDims(role, levels.shape.length), options.scaleFactors ?? [])
      : [...levels];

  if (arrays.length === 0) {
    throw new InvalidArgumentError('A multiscale raster needs at least one level');
  }

  const dims = options.dims ? [...options.dims] : defaultDims(role, arrays[0].shape.length);
  const placeholder = TransformationRegistry.placeholder(config.defaultCoordinateSystem);
  const rasters: Raster[] = arrays.map((array) => ({
    kind: 'raster',
    role,
    dims,
    array,
    ...(options.channelNames && { channelNames: [...options.channelNames] }),
    registry: placeholder,
  }));

  const multiscale: MultiscaleRaster = {
    kind: 'multiscale',
    role,
    dims,
    levels: anchorLevels(rasters, config),
    registry: registryFrom(options),
  };
  validateElement(multiscale);
  return multiscale;
}

export interface PointOptions extends ElementOptions {
  axes?: readonly SpatialAxis[];
  columns?: Readonly<Record<string, readonly ColumnValue[]>>;
}

export function createPointTable(
  coordinates: readonly (readonly number[])[],
  options: PointOptions = {}
): PointTable {
  const ndim = coordinates[0]?.length ?? 2;
  const points: PointTable = {
    kind: 'points',
    axes: options.axes ? [...options.axes] : ndim === 3 ? ['x', 'y', 'z'] : ['x', 'y'],
    coordinates: coordinates.map((row) => [...row]),
    columns: { ...options.columns },
    registry: registryFrom(options),
  };
  validateElement(points);
  return points;
}

export interface ShapeOptions extends ElementOptions {
  attributes?: Readonly<Record<string, readonly number[]>>;
}

export function createPolygonSet(
  geometries: readonly ShapeGeometry[],
  options: ShapeOptions = {}
): PolygonSet {
  const shapes: PolygonSet = {
    kind: 'shapes',
    geometries: [...geometries],
    attributes: { ...options.attributes },
    registry: registryFrom(options),
  };
  validateElement(shapes);
  return shapes;
}

/**
 * Circles: Point geometries with a radius each
 */
export function createCircles(
  centers: readonly (readonly number[])[],
  radius: number | readonly number[],
  options: ShapeOptions = {}
): PolygonSet {
  const radii = typeof radius === 'number' ? centers.map(() => radius) : [...radius];
  return createPolygonSet(
    centers.map((c): ShapeGeometry => ({ type: 'Point', coordinates: [...c] })),
    { ...options, attributes: { ...options.attributes, radius: radii } }
  );
}
