/**
 * Affine Transformations Between Named Axes
 *
 * Immutable value types. Every transformation knows the axes it reads and the
 * axes it writes; `toMatrix()` materialises it for any requested input/output
 * axis order, passing untouched axes through.
 */

import { DEFAULT_ENGINE_CONFIG } from '../config.js';
import {
  AxisMismatchError,
  InvalidArgumentError,
  NonInvertibleTransformError,
} from '../utils/errors.js';
import {
  composeSteps,
  createIdentity,
  createZeros,
  invert,
  matricesClose,
  type Matrix,
} from './matrix.js';

export type TransformationType = 'identity' | 'translation' | 'scale' | 'affine' | 'sequence';

function sameValues<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

function assertUniqueAxes(axes: readonly string[], what: string): void {
  if (new Set(axes).size !== axes.length) {
    throw new InvalidArgumentError(`${what} contain duplicates: [${axes.join(', ')}]`);
  }
}

function assertFinite(values: readonly number[], what: string): void {
  if (!values.every((v) => Number.isFinite(v))) {
    throw new InvalidArgumentError(`${what} must be finite numbers`, { values });
  }
}

function formatNumbers(values: readonly number[]): string {
  return `[${values.join(', ')}]`;
}

export abstract class AffineTransform {
  abstract readonly type: TransformationType;

  /** Axes the transformation reads */
  abstract get inputAxes(): readonly string[];

  /** Axes the transformation writes */
  abstract get outputAxes(): readonly string[];

  /**
   * Inverse transformation
   * @throws NonInvertibleTransformError when the linear part is singular
   */
  abstract inverse(epsilon?: number): AffineTransform;

  /** Exact structural equality */
  abstract equals(other: AffineTransform): boolean;

  abstract toString(): string;

  /** Homogeneous matrix over `inputAxes` -> `outputAxes` */
  protected abstract ownMatrix(): Matrix;

  /**
   * Materialise the transformation for the requested axis orders.
   *
   * Output axes the transformation writes take its row; axes it does not
   * touch are copied from the input. Anything else is an AxisMismatchError.
   */
  toMatrix(inputAxes: readonly string[], outputAxes: readonly string[]): Matrix {
    const own = this.ownMatrix();
    const ins = this.inputAxes;
    const outs = this.outputAxes;
    const n = inputAxes.length;

    const m = createZeros(outputAxes.length + 1, n + 1);
    m[outputAxes.length][n] = 1;

    outputAxes.forEach((axis, r) => {
      const ownRow = outs.indexOf(axis);
      if (ownRow >= 0) {
        ins.forEach((source, j) => {
          const coefficient = own[ownRow][j];
          if (coefficient === 0) return;
          const col = inputAxes.indexOf(source);
          if (col < 0) {
            throw new AxisMismatchError(
              `Axis '${source}' is needed to compute '${axis}' but is not among the input axes [${inputAxes.join(', ')}]`,
              { transformation: this.toString(), inputAxes, outputAxes }
            );
          }
          m[r][col] = coefficient;
        });
        m[r][n] = own[ownRow][ins.length];
        return;
      }

      const col = inputAxes.indexOf(axis);
      if (col >= 0 && !ins.includes(axis)) {
        m[r][col] = 1;
        return;
      }

      throw new AxisMismatchError(
        `Output axis '${axis}' is neither written by ${this.toString()} nor carried over from the input axes [${inputAxes.join(', ')}]`,
        { transformation: this.toString(), inputAxes, outputAxes }
      );
    });

    return m;
  }

  /**
   * Axes present after applying the transformation to data with `axes`
   */
  outputAxesFor(axes: readonly string[]): string[] {
    const result = axes.filter((a) => this.outputAxes.includes(a) || !this.inputAxes.includes(a));
    for (const axis of this.outputAxes) {
      if (!result.includes(axis)) result.push(axis);
    }
    return result;
  }

  /**
   * Compare materialised matrices over `axes` with a caller-supplied tolerance
   */
  isClose(other: AffineTransform, axes: readonly string[], tolerance = 1e-8): boolean {
    return matricesClose(this.toMatrix(axes, axes), other.toMatrix(axes, axes), tolerance);
  }
}

export class Identity extends AffineTransform {
  readonly type = 'identity';

  get inputAxes(): readonly string[] {
    return [];
  }

  get outputAxes(): readonly string[] {
    return [];
  }

  inverse(): Identity {
    return this;
  }

  equals(other: AffineTransform): boolean {
    return other instanceof Identity;
  }

  outputAxesFor(axes: readonly string[]): string[] {
    return [...axes];
  }

  toString(): string {
    return 'Identity()';
  }

  protected ownMatrix(): Matrix {
    return [[1]];
  }
}

export class Translation extends AffineTransform {
  readonly type = 'translation';
  readonly translation: readonly number[];
  readonly axes: readonly string[];

  constructor(translation: readonly number[], axes: readonly string[]) {
    super();
    if (translation.length !== axes.length) {
      throw new InvalidArgumentError(
        `Translation has ${translation.length} values for ${axes.length} axes`
      );
    }
    assertUniqueAxes(axes, 'Translation axes');
    assertFinite(translation, 'Translation values');
    this.translation = [...translation];
    this.axes = [...axes];
  }

  get inputAxes(): readonly string[] {
    return this.axes;
  }

  get outputAxes(): readonly string[] {
    return this.axes;
  }

  inverse(): Translation {
    return new Translation(
      this.translation.map((t) => -t),
      this.axes
    );
  }

  equals(other: AffineTransform): boolean {
    return (
      other instanceof Translation &&
      sameValues(this.axes, other.axes) &&
      sameValues(this.translation, other.translation)
    );
  }

  /** Acts only on axes that are already present */
  outputAxesFor(axes: readonly string[]): string[] {
    return [...axes];
  }

  toString(): string {
    return `Translation(${formatNumbers(this.translation)}, axes=[${this.axes.join(', ')}])`;
  }

  protected ownMatrix(): Matrix {
    const n = this.axes.length;
    const m = createIdentity(n + 1);
    this.translation.forEach((t, i) => {
      m[i][n] = t;
    });
    return m;
  }
}

export class Scale extends AffineTransform {
  readonly type = 'scale';
  readonly scale: readonly number[];
  readonly axes: readonly string[];

  constructor(scale: readonly number[], axes: readonly string[]) {
    super();
    if (scale.length !== axes.length) {
      throw new InvalidArgumentError(`Scale has ${scale.length} factors for ${axes.length} axes`);
    }
    assertUniqueAxes(axes, 'Scale axes');
    assertFinite(scale, 'Scale factors');
    this.scale = [...scale];
    this.axes = [...axes];
  }

  get inputAxes(): readonly string[] {
    return this.axes;
  }

  get outputAxes(): readonly string[] {
    return this.axes;
  }

  inverse(): Scale {
    if (this.scale.some((s) => s === 0)) {
      throw new NonInvertibleTransformError(`${this.toString()} has a zero factor`);
    }
    return new Scale(
      this.scale.map((s) => 1 / s),
      this.axes
    );
  }

  equals(other: AffineTransform): boolean {
    return (
      other instanceof Scale &&
      sameValues(this.axes, other.axes) &&
      sameValues(this.scale, other.scale)
    );
  }

  outputAxesFor(axes: readonly string[]): string[] {
    return [...axes];
  }

  toString(): string {
    return `Scale(${formatNumbers(this.scale)}, axes=[${this.axes.join(', ')}])`;
  }

  protected ownMatrix(): Matrix {
    const n = this.axes.length;
    const m = createIdentity(n + 1);
    this.scale.forEach((s, i) => {
      m[i][i] = s;
    });
    return m;
  }
}

/**
 * Arbitrary affine map given as a homogeneous matrix with
 * |outputAxes| + 1 rows and |inputAxes| + 1 columns
 */
export class AffineMap extends AffineTransform {
  readonly type = 'affine';
  readonly matrix: readonly (readonly number[])[];
  private readonly input: readonly string[];
  private readonly output: readonly string[];

  constructor(matrix: readonly (readonly number[])[], inputAxes: readonly string[], outputAxes: readonly string[]) {
    super();
    const rows = outputAxes.length + 1;
    const cols = inputAxes.length + 1;
    if (matrix.length !== rows || matrix.some((row) => row.length !== cols)) {
      throw new InvalidArgumentError(
        `Affine matrix must be ${rows}x${cols} for ${inputAxes.length} input and ${outputAxes.length} output axes`,
        { matrix }
      );
    }
    const last = matrix[rows - 1];
    if (!last.every((v, i) => v === (i === cols - 1 ? 1 : 0))) {
      throw new InvalidArgumentError('The last row of an affine matrix must be [0, ..., 0, 1]', {
        matrix,
      });
    }
    assertUniqueAxes(inputAxes, 'Affine input axes');
    assertUniqueAxes(outputAxes, 'Affine output axes');
    matrix.forEach((row) => assertFinite(row, 'Affine matrix entries'));

    this.matrix = matrix.map((row) => [...row]);
    this.input = [...inputAxes];
    this.output = [...outputAxes];
  }

  get inputAxes(): readonly string[] {
    return this.input;
  }

  get outputAxes(): readonly string[] {
    return this.output;
  }

  inverse(epsilon = DEFAULT_ENGINE_CONFIG.epsilon): AffineMap {
    if (this.input.length !== this.output.length) {
      throw new NonInvertibleTransformError(
        `${this.toString()} maps ${this.input.length} axes to ${this.output.length} and has no inverse`
      );
    }
    const inverted = invert(this.ownMatrix(), epsilon);
    if (!inverted) {
      throw new NonInvertibleTransformError(`${this.toString()} has a singular linear part`);
    }
    return new AffineMap(inverted, this.output, this.input);
  }

  equals(other: AffineTransform): boolean {
    return (
      other instanceof AffineMap &&
      sameValues(this.input, other.input) &&
      sameValues(this.output, other.output) &&
      this.matrix.every((row, r) => sameValues(row, other.matrix[r]))
    );
  }

  toString(): string {
    const rows = this.matrix.map((row) => formatNumbers(row)).join(', ');
    return `Affine([${rows}], input=[${this.input.join(', ')}], output=[${this.output.join(', ')}])`;
  }

  protected ownMatrix(): Matrix {
    return this.matrix.map((row) => [...row]);
  }
}

/**
 * Ordered list of transformations, applied first to last
 */
export class Sequence extends AffineTransform {
  readonly type = 'sequence';
  readonly transformations: readonly AffineTransform[];

  constructor(transformations: readonly AffineTransform[]) {
    super();
    this.transformations = [...transformations];
  }

  /** Nested sequences expanded in application order */
  flatten(): AffineTransform[] {
    return this.transformations.flatMap((t) => (t instanceof Sequence ? t.flatten() : [t]));
  }

  /** Axes read from outside the sequence, in order of first use */
  get inputAxes(): readonly string[] {
    const produced = new Set<string>();
    const needed: string[] = [];
    for (const t of this.flatten()) {
      for (const axis of t.inputAxes) {
        if (!produced.has(axis) && !needed.includes(axis)) needed.push(axis);
      }
      for (const axis of t.outputAxes) produced.add(axis);
    }
    return needed;
  }

  get outputAxes(): readonly string[] {
    return this.outputAxesFor(this.inputAxes);
  }

  outputAxesFor(axes: readonly string[]): string[] {
    return this.flatten().reduce<string[]>((current, t) => t.outputAxesFor(current), [...axes]);
  }

  inverse(epsilon?: number): Sequence {
    return new Sequence([...this.transformations].reverse().map((t) => t.inverse(epsilon)));
  }

  equals(other: AffineTransform): boolean {
    return (
      other instanceof Sequence &&
      other.transformations.length === this.transformations.length &&
      this.transformations.every((t, i) => t.equals(other.transformations[i]))
    );
  }

  toMatrix(inputAxes: readonly string[], outputAxes: readonly string[]): Matrix {
    const steps = this.flatten();
    if (steps.length === 0) {
      return new Identity().toMatrix(inputAxes, outputAxes);
    }

    let current: readonly string[] = inputAxes;
    const matrices = steps.map((t, i) => {
      const next = i === steps.length - 1 ? outputAxes : t.outputAxesFor(current);
      const m = t.toMatrix(current, next);
      current = next;
      return m;
    });

    return composeSteps(matrices, inputAxes.length + 1);
  }

  toString(): string {
    return `Sequence([${this.transformations.map((t) => t.toString()).join(', ')}])`;
  }

  protected ownMatrix(): Matrix {
    return this.toMatrix(this.inputAxes, this.outputAxes);
  }
}

/**
 * Apply `a` then `b`
 */
export function compose(a: AffineTransform, b: AffineTransform): Sequence {
  return new Sequence([a, b]);
}
