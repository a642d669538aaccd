/**
 * Spatial Dataset
 *
 * Named elements grouped by model (images, labels, points, shapes). Element
 * names are unique across groups.
 */

import type { MultiscaleRaster, PointTable, PolygonSet, Raster, SpatialEntity } from '../types.js';
import { InvalidArgumentError } from '../utils/errors.js';

export type ElementGroup = 'images' | 'labels' | 'points' | 'shapes';

export type RasterElement = Raster | MultiscaleRaster;

export interface DatasetElements {
  images?: Readonly<Record<string, RasterElement>>;
  labels?: Readonly<Record<string, RasterElement>>;
  points?: Readonly<Record<string, PointTable>>;
  shapes?: Readonly<Record<string, PolygonSet>>;
}

export interface DatasetEntry {
  group: ElementGroup;
  name: string;
  element: SpatialEntity;
}

/**
 * Group an element belongs to
 */
export function groupOf(entity: SpatialEntity): ElementGroup {
  switch (entity.kind) {
    case 'raster':
    case 'multiscale':
      return entity.role === 'image' ? 'images' : 'labels';
    case 'points':
      return 'points';
    case 'shapes':
      return 'shapes';
  }
}

export class SpatialDataset {
  readonly images: ReadonlyMap<string, RasterElement>;
  readonly labels: ReadonlyMap<string, RasterElement>;
  readonly points: ReadonlyMap<string, PointTable>;
  readonly shapes: ReadonlyMap<string, PolygonSet>;

  constructor(elements: DatasetElements = {}) {
    this.images = new Map(Object.entries(elements.images ?? {}));
    this.labels = new Map(Object.entries(elements.labels ?? {}));
    this.points = new Map(Object.entries(elements.points ?? {}));
    this.shapes = new Map(Object.entries(elements.shapes ?? {}));

    const seen = new Set<string>();
    for (const { group, name, element } of this.entries()) {
      if (seen.has(name)) {
        throw new InvalidArgumentError(`Element name '${name}' is used more than once`);
      }
      seen.add(name);
      if (groupOf(element) !== group) {
        throw new InvalidArgumentError(
          `Element '${name}' is a ${groupOf(element)} element and cannot be stored under ${group}`
        );
      }
    }
  }

  /**
   * Every element, in group order then insertion order
   */
  entries(): DatasetEntry[] {
    const groups: [ElementGroup, ReadonlyMap<string, SpatialEntity>][] = [
      ['images', this.images],
      ['labels', this.labels],
      ['points', this.points],
      ['shapes', this.shapes],
    ];
    return groups.flatMap(([group, map]) =>
      [...map].map(([name, element]) => ({ group, name, element }))
    );
  }

  get size(): number {
    return this.images.size + this.labels.size + this.points.size + this.shapes.size;
  }

  has(name: string): boolean {
    return this.entries().some((e) => e.name === name);
  }

  /**
   * @throws InvalidArgumentError when no element has that name
   */
  element(name: string): SpatialEntity {
    const entry = this.entries().find((e) => e.name === name);
    if (!entry) {
      throw new InvalidArgumentError(`No element named '${name}'`, {
        available: this.entries().map((e) => e.name),
      });
    }
    return entry.element;
  }

  /**
   * Names of every coordinate system some element is anchored in, sorted
   */
  coordinateSystems(): string[] {
    const names = new Set<string>();
    for (const { element } of this.entries()) {
      for (const name of element.registry.names()) names.add(name);
    }
    return [...names].sort();
  }

  /**
   * Dataset restricted to the elements anchored in `coordinateSystem`
   */
  filterByCoordinateSystem(coordinateSystem: string): SpatialDataset {
    return SpatialDataset.fromEntries(
      this.entries().filter((e) => e.element.registry.has(coordinateSystem))
    );
  }

  /**
   * Copy with one element added or replaced
   */
  withElement(name: string, element: SpatialEntity): SpatialDataset {
    const entries = this.entries();
    const index = entries.findIndex((e) => e.name === name);
    const entry = { group: groupOf(element), name, element };
    if (index >= 0) {
      entries[index] = entry;
    } else {
      entries.push(entry);
    }
    return SpatialDataset.fromEntries(entries);
  }

  static fromEntries(entries: Iterable<Omit<DatasetEntry, 'group'>>): SpatialDataset {
    const images: Record<string, RasterElement> = {};
    const labels: Record<string, RasterElement> = {};
    const points: Record<string, PointTable> = {};
    const shapes: Record<string, PolygonSet> = {};

    const seen = new Set<string>();
    for (const { name, element } of entries) {
      if (seen.has(name)) {
        throw new InvalidArgumentError(`Element name '${name}' is used more than once`);
      }
      seen.add(name);
      switch (element.kind) {
        case 'raster':
        case 'multiscale':
          if (element.role === 'image') images[name] = element;
          else labels[name] = element;
          break;
        case 'points':
          points[name] = element;
          break;
        case 'shapes':
          shapes[name] = element;
          break;
      }
    }

    return new SpatialDataset({ images, labels, points, shapes });
  }
}
