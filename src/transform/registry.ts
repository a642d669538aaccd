/**
 * Coordinate Systems and Per-Element Transformation Registries
 */

import { DEFAULT_COORDINATE_SYSTEM } from '../config.js';
import type { Axis } from '../types.js';
import { AxisMismatchError, CoordinateSystemNotFoundError } from '../utils/errors.js';
import { Identity, type AffineTransform } from './transformations.js';

// ============================================================================
// Coordinate systems
// ============================================================================

export interface CoordinateSystem {
  readonly name: string;
  readonly axes: readonly Axis[];
}

export function defineCoordinateSystem(name: string, axes: readonly (string | Axis)[]): CoordinateSystem {
  return {
    name,
    axes: axes.map((axis): Axis =>
      typeof axis === 'string' ? { name: axis, type: axis === 'c' ? 'channel' : 'space' } : { ...axis }
    ),
  };
}

function sameAxes(a: readonly Axis[], b: readonly Axis[]): boolean {
  return a.length === b.length && a.every((axis, i) => axis.name === b[i].name && axis.type === b[i].type);
}

/**
 * Coordinate systems known to a dataset, identified by name.
 * Two registrations under one name must agree on the axes.
 */
export class CoordinateSystemCatalog {
  private readonly systems = new Map<string, CoordinateSystem>();

  register(system: CoordinateSystem): this {
    const existing = this.systems.get(system.name);
    if (existing && !sameAxes(existing.axes, system.axes)) {
      throw new AxisMismatchError(
        `Coordinate system '${system.name}' is already registered with different axes`,
        { registered: existing.axes, requested: system.axes }
      );
    }
    this.systems.set(system.name, system);
    return this;
  }

  get(name: string): CoordinateSystem {
    const system = this.systems.get(name);
    if (!system) {
      throw new CoordinateSystemNotFoundError(`Coordinate system '${name}' is not registered`, {
        available: this.names(),
      });
    }
    return system;
  }

  has(name: string): boolean {
    return this.systems.has(name);
  }

  names(): string[] {
    return [...this.systems.keys()];
  }

  list(): CoordinateSystem[] {
    return [...this.systems.values()];
  }
}

// ============================================================================
// Transformation registry
// ============================================================================

/**
 * Immutable mapping from coordinate-system name to the transformation
 * anchoring one element in that system
 */
export class TransformationRegistry {
  private readonly transformations: ReadonlyMap<string, AffineTransform>;

  private constructor(entries: Iterable<readonly [string, AffineTransform]>) {
    this.transformations = new Map(entries);
  }

  static empty(): TransformationRegistry {
    return new TransformationRegistry([]);
  }

  static fromEntries(entries: Iterable<readonly [string, AffineTransform]>): TransformationRegistry {
    return new TransformationRegistry(entries);
  }

  static fromRecord(record: Readonly<Record<string, AffineTransform>>): TransformationRegistry {
    return new TransformationRegistry(Object.entries(record));
  }

  /**
   * `{ [defaultCoordinateSystem]: Identity }`, the registry every freshly
   * transformed element starts with
   */
  static placeholder(defaultCoordinateSystem = DEFAULT_COORDINATE_SYSTEM): TransformationRegistry {
    return new TransformationRegistry([[defaultCoordinateSystem, new Identity()]]);
  }

  get size(): number {
    return this.transformations.size;
  }

  /**
   * @throws CoordinateSystemNotFoundError
   */
  get(coordinateSystem: string): AffineTransform {
    const t = this.transformations.get(coordinateSystem);
    if (!t) {
      throw new CoordinateSystemNotFoundError(
        `Coordinate system '${coordinateSystem}' not found in element`,
        { available: this.names() }
      );
    }
    return t;
  }

  has(coordinateSystem: string): boolean {
    return this.transformations.has(coordinateSystem);
  }

  names(): string[] {
    return [...this.transformations.keys()];
  }

  entries(): [string, AffineTransform][] {
    return [...this.transformations.entries()];
  }

  /** New registry with `coordinateSystem` set to `transformation` */
  with(coordinateSystem: string, transformation: AffineTransform): TransformationRegistry {
    const next = new Map(this.transformations);
    next.set(coordinateSystem, transformation);
    return new TransformationRegistry(next);
  }

  /** New registry without `coordinateSystem` */
  without(coordinateSystem: string): TransformationRegistry {
    const next = new Map(this.transformations);
    next.delete(coordinateSystem);
    return new TransformationRegistry(next);
  }

  isPlaceholder(defaultCoordinateSystem = DEFAULT_COORDINATE_SYSTEM): boolean {
    const only = this.transformations.get(defaultCoordinateSystem);
    return this.size === 1 && only instanceof Identity;
  }

  equals(other: TransformationRegistry): boolean {
    if (other.size !== this.size) return false;
    return this.entries().every(([name, t]) => other.has(name) && other.get(name).equals(t));
  }
}
