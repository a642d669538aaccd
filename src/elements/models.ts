/**
 * Element Models
 *
 * zod schemas describing what a valid element of each kind looks like, plus
 * the small introspection helpers the transformation engine relies on.
 */

import { z } from 'zod';
import type {
  AxisName,
  ElementModel,
  MultiscaleRaster,
  NumericArray,
  PointTable,
  SpatialEntity,
} from '../types.js';
import { TransformationRegistry } from '../transform/registry.js';
import { shapeAxes } from '../transform/polygons.js';
import { SchemaValidationError } from '../utils/errors.js';
import { dtypeOf, isIntegerDType, sizeOf } from './ndarray.js';

const IMAGE_DIMS: readonly (readonly AxisName[])[] = [
  ['c', 'y', 'x'],
  ['c', 'z', 'y', 'x'],
];

const LABELS_DIMS: readonly (readonly AxisName[])[] = [
  ['y', 'x'],
  ['z', 'y', 'x'],
];

function isNumericArray(value: unknown): value is NumericArray {
  return (
    value instanceof Uint8Array ||
    value instanceof Uint16Array ||
    value instanceof Uint32Array ||
    value instanceof Int8Array ||
    value instanceof Int16Array ||
    value instanceof Int32Array ||
    value instanceof Float32Array ||
    value instanceof Float64Array
  );
}

const numericArraySchema = z.custom<NumericArray>(isNumericArray, {
  message: 'Expected a numeric typed array',
});

const registrySchema = z
  .custom<TransformationRegistry>((v) => v instanceof TransformationRegistry, {
    message: 'Expected a transformation registry',
  })
  .refine((r) => r.size > 0, 'An element must be anchored in at least one coordinate system');

const finite = z.number().finite();

// ============================================================================
// Rasters
// ============================================================================

const rasterSchema = z
  .object({
    kind: z.literal('raster'),
    role: z.enum(['image', 'labels']),
    dims: z.array(z.enum(['c', 'x', 'y', 'z'])),
    array: z.object({
      shape: z.array(z.number().int().positive()),
      data: numericArraySchema,
    }),
    channelNames: z.array(z.union([z.string(), z.number()])).optional(),
    registry: registrySchema,
  })
  .superRefine((raster, ctx) => {
    const allowed = raster.role === 'image' ? IMAGE_DIMS : LABELS_DIMS;
    if (!allowed.some((dims) => dims.join() === raster.dims.join())) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['dims'],
        message: `Invalid dims [${raster.dims.join(', ')}] for ${raster.role}; expected one of ${allowed
          .map((d) => `[${d.join(', ')}]`)
          .join(' or ')}`,
      });
    }
    if (raster.array.shape.length !== raster.dims.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['array', 'shape'],
        message: `Shape has ${raster.array.shape.length} axes, dims has ${raster.dims.length}`,
      });
    }
    if (raster.array.data.length !== sizeOf(raster.array.shape)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['array', 'data'],
        message: `Data has ${raster.array.data.length} values, shape [${raster.array.shape.join(', ')}] needs ${sizeOf(raster.array.shape)}`,
      });
    }
    if (raster.role === 'labels' && !isIntegerDType(dtypeOf(raster.array.data))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['array', 'data'],
        message: 'Labels must have an integer dtype',
      });
    }
    if (raster.channelNames && raster.channelNames.length !== raster.array.shape[0]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['channelNames'],
        message: `${raster.channelNames.length} channel names for ${raster.array.shape[0]} channels`,
      });
    }
  });

const multiscaleSchema = z
  .object({
    kind: z.literal('multiscale'),
    role: z.enum(['image', 'labels']),
    dims: z.array(z.enum(['c', 'x', 'y', 'z'])),
    levels: z.array(rasterSchema).min(1),
    registry: registrySchema,
  })
  .superRefine((data, ctx) => {
    data.levels.forEach((level, i) => {
      if (level.role !== data.role || level.dims.join() !== data.dims.join()) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['levels', i],
          message: `Level ${i} does not share the pyramid's role and dims`,
        });
      }
      if (i === 0) return;
      const previous = data.levels[i - 1].array.shape;
      const grows = level.array.shape.some((n, axis) => n > previous[axis]);
      if (grows) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['levels', i, 'array', 'shape'],
          message: `Level ${i} is larger than level ${i - 1}`,
        });
      }
      if (data.dims[0] === 'c' && level.array.shape[0] !== data.levels[0].array.shape[0]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['levels', i, 'array', 'shape'],
          message: `Level ${i} has a different number of channels`,
        });
      }
    });
  });

// ============================================================================
// Points
// ============================================================================

const pointsSchema = z
  .object({
    kind: z.literal('points'),
    axes: z.union([z.tuple([z.literal('x'), z.literal('y')]), z.tuple([z.literal('x'), z.literal('y'), z.literal('z')])]),
    coordinates: z.array(z.array(finite)),
    columns: z.record(z.array(z.union([z.number(), z.string()]))),
    registry: registrySchema,
  })
  .superRefine((points, ctx) => {
    points.coordinates.forEach((row, i) => {
      if (row.length !== points.axes.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['coordinates', i],
          message: `Point ${i} has ${row.length} coordinates for ${points.axes.length} axes`,
        });
      }
    });
    for (const [name, values] of Object.entries(points.columns)) {
      if (points.axes.some((a) => a === name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['columns', name],
          message: `Column '${name}' clashes with a coordinate axis`,
        });
      }
      if (values.length !== points.coordinates.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['columns', name],
          message: `Column '${name}' has ${values.length} values for ${points.coordinates.length} points`,
        });
      }
    }
  });

// ============================================================================
// Shapes
// ============================================================================

const positionSchema = z.array(finite).min(2).max(3);

const ringSchema = z
  .array(positionSchema)
  .min(4)
  .refine(
    (ring) => ring[0].every((v, i) => v === ring[ring.length - 1][i]),
    'A polygon ring must be closed (first position equals last)'
  );

const geometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Point'), coordinates: positionSchema }),
  z.object({ type: z.literal('Polygon'), coordinates: z.array(ringSchema).min(1) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(ringSchema).min(1)).min(1) }),
]);

const shapesSchema = z
  .object({
    kind: z.literal('shapes'),
    geometries: z.array(geometrySchema),
    attributes: z.record(z.array(finite)),
    registry: registrySchema,
  })
  .superRefine((shapes, ctx) => {
    for (const [name, values] of Object.entries(shapes.attributes)) {
      if (values.length !== shapes.geometries.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['attributes', name],
          message: `Attribute '${name}' has ${values.length} values for ${shapes.geometries.length} geometries`,
        });
      }
    }

    const hasCircles = shapes.geometries.some((g) => g.type === 'Point');
    const radius = shapes.attributes.radius;
    if (hasCircles && (radius === undefined || radius.some((r) => r <= 0))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['attributes', 'radius'],
        message: 'Point geometries are circles and need a positive radius attribute',
      });
    }
  });

const SCHEMAS = {
  raster: rasterSchema,
  multiscale: multiscaleSchema,
  points: pointsSchema,
  shapes: shapesSchema,
} as const;

/**
 * Validate an element against the schema of its kind
 *
 * @throws SchemaValidationError listing every issue found
 */
export function validateElement(entity: SpatialEntity): void {
  const result = SCHEMAS[entity.kind].safeParse(entity);
  if (!result.success) {
    throw new SchemaValidationError(
      `Invalid ${getModel(entity)} element: ${result.error.issues.map((i) => i.message).join('; ')}`,
      { issues: result.error.issues }
    );
  }

  if (entity.kind === 'shapes') {
    const ndim = shapeAxes(entity.geometries).length;
    const mixed = entity.geometries.some((g) => {
      const coords = g.type === 'Point' ? [g.coordinates] : g.type === 'Polygon' ? g.coordinates.flat() : g.coordinates.flat(2);
      return coords.some((p) => p.length !== ndim);
    });
    if (mixed) {
      throw new SchemaValidationError('Invalid shapes element: geometries mix 2D and 3D positions');
    }
  }
}

/**
 * Structural model of an element
 */
export function getModel(entity: SpatialEntity): ElementModel {
  switch (entity.kind) {
    case 'raster':
    case 'multiscale':
      return entity.role;
    case 'points':
    case 'shapes':
      return entity.kind;
  }
}

/**
 * Ordered axis names of an element
 */
export function getAxesNames(entity: SpatialEntity): string[] {
  switch (entity.kind) {
    case 'raster':
    case 'multiscale':
      return [...entity.dims];
    case 'points':
      return [...entity.axes];
    case 'shapes':
      return shapeAxes(entity.geometries);
  }
}

export function isMultiscale(entity: SpatialEntity): entity is MultiscaleRaster {
  return entity.kind === 'multiscale';
}

export function isPointTable(entity: SpatialEntity): entity is PointTable {
  return entity.kind === 'points';
}
