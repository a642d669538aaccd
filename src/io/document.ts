/**
 * Dataset Document I/O
 *
 * A dataset is stored as a single JSON document:
 *
 * ```json
 * {
 *   "coordinateSystems": [{ "name": "global", "axes": [{ "name": "y", "type": "space" }, ...] }],
 *   "images": { "raw": { "dims": ["c", "y", "x"], "dtype": "uint8", "shape": [1, 4, 4], "data": [...],
 *                        "transformations": { "global": { "type": "identity" } } } },
 *   "labels": { ... }, "points": { ... }, "shapes": { ... }
 * }
 * ```
 *
 * Multiscale rasters list their `levels` (`{ shape, data }`, full resolution
 * first) instead of `shape` and `data`.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { SpatialDataset, type DatasetEntry, type ElementGroup } from '../elements/dataset.js';
import {
  createMultiscaleRaster,
  createPointTable,
  createPolygonSet,
  createRaster,
} from '../elements/factories.js';
import { getAxesNames } from '../elements/models.js';
import { createNDArray, dtypeOf, DTYPES } from '../elements/ndarray.js';
import { CoordinateSystemCatalog, defineCoordinateSystem } from '../transform/registry.js';
import {
  registryFromJSON,
  registrySchema,
  registryToJSON,
  type TransformationJSON,
} from '../transform/serialize.js';
import type { AffineTransform } from '../transform/transformations.js';
import type { NDArray, RasterRole, SpatialEntity } from '../types.js';
import { DocumentError, SpatialAlignError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('document');

// ============================================================================
// Schema
// ============================================================================

const dtypeSchema = z.enum(DTYPES);
const axisNameSchema = z.enum(['c', 'x', 'y', 'z']);
const levelSchema = z.object({
  shape: z.array(z.number().int().nonnegative()),
  data: z.array(z.number()),
});

const singleScaleSchema = levelSchema.extend({
  dims: z.array(axisNameSchema),
  dtype: dtypeSchema.default('float64'),
  channelNames: z.array(z.union([z.string(), z.number()])).optional(),
  transformations: registrySchema.optional(),
});

const multiscaleSchema = z.object({
  dims: z.array(axisNameSchema),
  dtype: dtypeSchema.default('float64'),
  levels: z.array(levelSchema).min(1),
  channelNames: z.array(z.union([z.string(), z.number()])).optional(),
  transformations: registrySchema.optional(),
});

const rasterSchema = z.union([multiscaleSchema, singleScaleSchema]);

const pointsSchema = z.object({
  axes: z.array(z.enum(['x', 'y', 'z'])),
  coordinates: z.array(z.array(z.number())),
  columns: z.record(z.array(z.union([z.number(), z.string()]))).optional(),
  transformations: registrySchema.optional(),
});

const position = z.array(z.number());

const geometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Point'), coordinates: position }),
  z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(position)) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(z.array(position))) }),
]);

const shapesSchema = z.object({
  geometries: z.array(geometrySchema),
  attributes: z.record(z.array(z.number())).optional(),
  transformations: registrySchema.optional(),
});

const coordinateSystemSchema = z.object({
  name: z.string().min(1),
  axes: z.array(
    z.object({
      name: z.string().min(1),
      type: z.enum(['space', 'channel']),
    })
  ),
});

export const documentSchema = z.object({
  coordinateSystems: z.array(coordinateSystemSchema).optional(),
  images: z.record(rasterSchema).optional(),
  labels: z.record(rasterSchema).optional(),
  points: z.record(pointsSchema).optional(),
  shapes: z.record(shapesSchema).optional(),
});

export type DatasetDocument = z.input<typeof documentSchema>;

type RasterDocument = z.output<typeof rasterSchema>;

export interface LoadedDocument {
  dataset: SpatialDataset;
  catalog: CoordinateSystemCatalog;
}

// ============================================================================
// Reading
// ============================================================================

function transformationsOf(
  json: Record<string, TransformationJSON> | undefined
): Record<string, AffineTransform> | undefined {
  return json ? Object.fromEntries(registryFromJSON(json).entries()) : undefined;
}

function buildRaster(role: RasterRole, doc: RasterDocument): SpatialEntity {
  const array = (level: { shape: number[]; data: number[] }): NDArray =>
    createNDArray(level.data, level.shape, doc.dtype);
  const options = {
    dims: doc.dims,
    channelNames: doc.channelNames,
    transformations: transformationsOf(doc.transformations),
  };

  if ('levels' in doc) {
    return createMultiscaleRaster(role, doc.levels.map(array), options);
  }
  return createRaster(role, array(doc), options);
}

/**
 * Run `build`, reporting engine errors as document errors about `context`
 */
function inDocument<T>(context: string, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof SpatialAlignError) {
      throw new DocumentError(`${context}: ${error.message}`, {
        code: error.code,
        details: error.details,
      });
    }
    throw error;
  }
}

const CANONICAL_AXES = ['c', 'z', 'y', 'x'];

/**
 * Catalog of the declared coordinate systems, completed with the systems the
 * elements reference but the document does not declare (axes inferred from
 * those elements)
 */
export function buildCatalog(
  dataset: SpatialDataset,
  declared: readonly z.output<typeof coordinateSystemSchema>[] = []
): CoordinateSystemCatalog {
  const catalog = new CoordinateSystemCatalog();
  for (const system of declared) {
    catalog.register(defineCoordinateSystem(system.name, system.axes));
  }

  const inferred = new Map<string, Set<string>>();
  for (const { element } of dataset.entries()) {
    for (const name of element.registry.names()) {
      if (catalog.has(name)) continue;
      const axes = inferred.get(name) ?? new Set<string>();
      getAxesNames(element).forEach((a) => axes.add(a));
      inferred.set(name, axes);
    }
  }
  for (const [name, axes] of inferred) {
    catalog.register(defineCoordinateSystem(name, CANONICAL_AXES.filter((a) => axes.has(a))));
  }

  return catalog;
}

/**
 * Build a dataset (and its coordinate-system catalog) from a parsed document
 *
 * @throws DocumentError when the document or any element in it is invalid
 */
export function readDocument(json: unknown): LoadedDocument {
  const parsed = documentSchema.safeParse(json);
  if (!parsed.success) {
    throw new DocumentError('Invalid dataset document', { issues: parsed.error.issues });
  }
  const doc = parsed.data;
  const entries: Omit<DatasetEntry, 'group'>[] = [];

  for (const [name, raster] of Object.entries(doc.images ?? {})) {
    entries.push({ name, element: inDocument(`Image '${name}'`, () => buildRaster('image', raster)) });
  }
  for (const [name, raster] of Object.entries(doc.labels ?? {})) {
    entries.push({ name, element: inDocument(`Labels '${name}'`, () => buildRaster('labels', raster)) });
  }
  for (const [name, points] of Object.entries(doc.points ?? {})) {
    entries.push({
      name,
      element: inDocument(`Points '${name}'`, () =>
        createPointTable(points.coordinates, {
          axes: points.axes,
          columns: points.columns,
          transformations: transformationsOf(points.transformations),
        })
      ),
    });
  }
  for (const [name, shapes] of Object.entries(doc.shapes ?? {})) {
    entries.push({
      name,
      element: inDocument(`Shapes '${name}'`, () =>
        createPolygonSet(shapes.geometries, {
          attributes: shapes.attributes,
          transformations: transformationsOf(shapes.transformations),
        })
      ),
    });
  }

  const dataset = inDocument('Dataset', () => SpatialDataset.fromEntries(entries));
  const catalog = inDocument('Coordinate systems', () => buildCatalog(dataset, doc.coordinateSystems));

  logger.debug(
    { elements: dataset.size, coordinateSystems: catalog.names() },
    'Read dataset document'
  );

  return { dataset, catalog };
}

// ============================================================================
// Writing
// ============================================================================

function elementToJSON(element: SpatialEntity): unknown {
  const transformations = registryToJSON(element.registry);
  switch (element.kind) {
    case 'raster':
      return {
        dims: [...element.dims],
        dtype: dtypeOf(element.array.data),
        shape: [...element.array.shape],
        data: Array.from(element.array.data),
        ...(element.channelNames && { channelNames: [...element.channelNames] }),
        transformations,
      };
    case 'multiscale': {
      const channelNames = element.levels[0]?.channelNames;
      return {
        dims: [...element.dims],
        dtype: dtypeOf(element.levels[0].array.data),
        levels: element.levels.map((level) => ({
          shape: [...level.array.shape],
          data: Array.from(level.array.data),
        })),
        ...(channelNames && { channelNames: [...channelNames] }),
        transformations,
      };
    }
    case 'points':
      return {
        axes: [...element.axes],
        coordinates: element.coordinates.map((row) => [...row]),
        columns: { ...element.columns },
        transformations,
      };
    case 'shapes':
      return {
        geometries: [...element.geometries],
        attributes: { ...element.attributes },
        transformations,
      };
  }
}

/**
 * JSON document of a dataset
 */
export function writeDocument(
  dataset: SpatialDataset,
  catalog: CoordinateSystemCatalog = buildCatalog(dataset)
): Record<string, unknown> {
  const used = new Set(dataset.coordinateSystems());
  const groups: Record<ElementGroup, Record<string, unknown>> = { images: {}, labels: {}, points: {}, shapes: {} };
  for (const { group, name, element } of dataset.entries()) {
    groups[group][name] = elementToJSON(element);
  }

  const document: Record<string, unknown> = {
    coordinateSystems: catalog
      .list()
      .filter((cs) => used.has(cs.name))
      .map((cs) => ({ name: cs.name, axes: cs.axes.map((a) => ({ ...a })) })),
  };
  for (const [group, members] of Object.entries(groups)) {
    if (Object.keys(members).length > 0) document[group] = members;
  }
  return document;
}

// ============================================================================
// Files
// ============================================================================

/**
 * Read a dataset document from disk
 *
 * @throws DocumentError when the file cannot be read, is not JSON or is invalid
 */
export async function loadDocument(documentPath: string): Promise<LoadedDocument> {
  let text: string;
  try {
    text = await fs.readFile(documentPath, 'utf-8');
  } catch (error) {
    throw new DocumentError(`Cannot read dataset document ${documentPath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new DocumentError(`Dataset document ${documentPath} is not valid JSON`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return readDocument(json);
}

/**
 * Write a dataset document to disk, creating parent directories
 */
export async function saveDocument(
  documentPath: string,
  dataset: SpatialDataset,
  catalog?: CoordinateSystemCatalog
): Promise<void> {
  await fs.mkdir(path.dirname(documentPath), { recursive: true });
  await fs.writeFile(documentPath, JSON.stringify(writeDocument(dataset, catalog), null, 2), 'utf-8');
  logger.info({ documentPath, elements: dataset.size }, 'Wrote dataset document');
}
