/**
 * Homogeneous Matrix Operations
 *
 * Matrices are row-major `number[][]`. An affine map from `n` input axes to
 * `m` output axes is an `(m + 1) x (n + 1)` matrix whose last row is
 * `[0, ..., 0, 1]`.
 *
 * Square matrices up to 4x4 are inverted through gl-matrix, switched to plain
 * double-precision arrays; larger ones fall back to Gauss-Jordan elimination.
 */

import { glMatrix, mat2, mat3, mat4 } from 'gl-matrix';
import { InvalidArgumentError } from '../utils/errors.js';

glMatrix.setMatrixArrayType(Array);

export type Matrix = number[][];
export type Vector = number[];

/**
 * Create an n x n identity matrix
 */
export function createIdentity(n: number): Matrix {
  const m = createZeros(n, n);
  for (let i = 0; i < n; i++) {
    m[i][i] = 1;
  }
  return m;
}

/**
 * Create a rows x cols matrix of zeros
 */
export function createZeros(rows: number, cols: number): Matrix {
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
}

export function cloneMatrix(m: Matrix): Matrix {
  return m.map((row) => [...row]);
}

/**
 * Multiply two matrices: Result = A * B
 */
export function multiply(a: Matrix, b: Matrix): Matrix {
  const inner = b.length;
  if (a.length > 0 && a[0].length !== inner) {
    throw new InvalidArgumentError(
      `Cannot multiply a ${a.length}x${a[0].length} matrix by a ${inner}x${b[0]?.length ?? 0} matrix`
    );
  }

  const cols = inner > 0 ? b[0].length : 0;
  const result = createZeros(a.length, cols);
  for (let r = 0; r < a.length; r++) {
    for (let c = 0; c < cols; c++) {
      let sum = 0;
      for (let k = 0; k < inner; k++) {
        sum += a[r][k] * b[k][c];
      }
      result[r][c] = sum;
    }
  }
  return result;
}

/**
 * Compose step matrices given first-applied first; an empty chain is the
 * identity of size `size`
 */
export function composeSteps(steps: readonly Matrix[], size: number): Matrix {
  return steps.reduce((result, step) => multiply(step, result), createIdentity(size));
}

/**
 * Transform one point (without the homogeneous 1) by a homogeneous matrix
 */
export function transformPoint(matrix: Matrix, point: Vector): Vector {
  const n = point.length;
  const out: Vector = [];
  for (let r = 0; r < matrix.length - 1; r++) {
    const row = matrix[r];
    let sum = row[n];
    for (let c = 0; c < n; c++) {
      sum += row[c] * point[c];
    }
    out.push(sum);
  }
  return out;
}

/**
 * Transform N x D coordinate rows by a homogeneous matrix
 */
export function applyToPoints(matrix: Matrix, coords: readonly Vector[]): Vector[] {
  return coords.map((point) => transformPoint(matrix, point));
}

/**
 * Linear block of a homogeneous matrix
 */
export function linearPart(matrix: Matrix): Matrix {
  return matrix.slice(0, -1).map((row) => row.slice(0, -1));
}

/**
 * Translation column of a homogeneous matrix
 */
export function translationPart(matrix: Matrix): Vector {
  return matrix.slice(0, -1).map((row) => row[row.length - 1]);
}

function assertSquare(m: Matrix, operation: string): number {
  const n = m.length;
  if (m.some((row) => row.length !== n)) {
    throw new InvalidArgumentError(`${operation} requires a square matrix`);
  }
  return n;
}

function toColumnMajor(m: Matrix): number[] {
  const n = m.length;
  const out = new Array<number>(n * n);
  for (let r = 0; r < n; r++) {
    for (let c = 0; c < n; c++) {
      out[c * n + r] = m[r][c];
    }
  }
  return out;
}

function fromColumnMajor(values: ArrayLike<number>, n: number): Matrix {
  const m = createZeros(n, n);
  for (let r = 0; r < n; r++) {
    for (let c = 0; c < n; c++) {
      m[r][c] = values[c * n + r];
    }
  }
  return m;
}

/**
 * Determinant of a square matrix
 */
export function determinant(m: Matrix): number {
  const n = assertSquare(m, 'determinant');

  switch (n) {
    case 0:
      return 1;
    case 1:
      return m[0][0];
    case 2:
      return mat2.determinant(toColumnMajor(m));
    case 3:
      return mat3.determinant(toColumnMajor(m));
    case 4:
      return mat4.determinant(toColumnMajor(m));
    default:
      return gaussJordan(m).determinant;
  }
}

/**
 * Invert a square matrix
 * @returns null when the matrix is singular (|det| <= epsilon)
 */
export function invert(m: Matrix, epsilon = 1e-10): Matrix | null {
  const n = assertSquare(m, 'invert');

  if (n > 4) {
    const { inverse, determinant: det } = gaussJordan(m);
    return Math.abs(det) <= epsilon ? null : inverse;
  }

  if (Math.abs(determinant(m)) <= epsilon) return null;

  if (n === 0) return [];
  if (n === 1) return [[1 / m[0][0]]];

  const values = toColumnMajor(m);
  const inverse =
    n === 2
      ? mat2.invert(mat2.create(), values)
      : n === 3
        ? mat3.invert(mat3.create(), values)
        : mat4.invert(mat4.create(), values);
  return inverse === null ? null : fromColumnMajor(inverse, n);
}

/**
 * Gauss-Jordan elimination with partial pivoting
 */
function gaussJordan(m: Matrix): { inverse: Matrix; determinant: number } {
  const n = m.length;
  const a = cloneMatrix(m);
  const inv = createIdentity(n);
  let det = 1;

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(a[r][col]) > Math.abs(a[pivot][col])) pivot = r;
    }

    if (a[pivot][col] === 0) {
      return { inverse: inv, determinant: 0 };
    }

    if (pivot !== col) {
      [a[pivot], a[col]] = [a[col], a[pivot]];
      [inv[pivot], inv[col]] = [inv[col], inv[pivot]];
      det = -det;
    }

    const p = a[col][col];
    det *= p;
    for (let c = 0; c < n; c++) {
      a[col][c] /= p;
      inv[col][c] /= p;
    }

    for (let r = 0; r < n; r++) {
      if (r === col) continue;
      const factor = a[r][col];
      if (factor === 0) continue;
      for (let c = 0; c < n; c++) {
        a[r][c] -= factor * a[col][c];
        inv[r][c] -= factor * inv[col][c];
      }
    }
  }

  return { inverse: inv, determinant: det };
}

/**
 * Check if a matrix is approximately identity
 */
export function isIdentity(matrix: Matrix, epsilon = 1e-10): boolean {
  return matricesClose(matrix, createIdentity(matrix.length), epsilon);
}

/**
 * Element-wise comparison with an absolute tolerance
 */
export function matricesClose(a: Matrix, b: Matrix, tolerance = 1e-10): boolean {
  if (a.length !== b.length) return false;
  for (let r = 0; r < a.length; r++) {
    if (a[r].length !== b[r].length) return false;
    for (let c = 0; c < a[r].length; c++) {
      if (Math.abs(a[r][c] - b[r][c]) > tolerance) return false;
    }
  }
  return true;
}

/**
 * Magnitudes of the (possibly complex) eigenvalues of a 1x1, 2x2 or 3x3 matrix
 */
export function eigenvalueMagnitudes(m: Matrix): number[] {
  const n = assertSquare(m, 'eigenvalueMagnitudes');

  switch (n) {
    case 1:
      return [Math.abs(m[0][0])];
    case 2:
      return quadraticRootMagnitudes(-(m[0][0] + m[1][1]), determinant(m));
    case 3:
      return cubicEigenvalueMagnitudes(m);
    default:
      throw new InvalidArgumentError(`Eigenvalues are only supported up to 3x3, got ${n}x${n}`);
  }
}

/**
 * |roots| of x^2 + b x + c
 */
function quadraticRootMagnitudes(b: number, c: number): number[] {
  const disc = b * b - 4 * c;
  if (disc >= 0) {
    const s = Math.sqrt(disc);
    return [Math.abs((-b + s) / 2), Math.abs((-b - s) / 2)];
  }
  // complex conjugate pair: |lambda|^2 = c
  const modulus = Math.sqrt(c);
  return [modulus, modulus];
}

function cubicEigenvalueMagnitudes(m: Matrix): number[] {
  // characteristic polynomial: x^3 + A x^2 + B x + C
  const trace = m[0][0] + m[1][1] + m[2][2];
  const minors =
    m[0][0] * m[1][1] - m[0][1] * m[1][0] +
    m[0][0] * m[2][2] - m[0][2] * m[2][0] +
    m[1][1] * m[2][2] - m[1][2] * m[2][1];
  const A = -trace;
  const B = minors;
  const C = -determinant(m);

  const real = realCubicRoot(A, B, C);

  // deflate: (x - r)(x^2 + b x + c)
  const b = real + A;
  const c = B + real * b;
  return [Math.abs(real), ...quadraticRootMagnitudes(b, c)];
}

/**
 * One real root of x^3 + A x^2 + B x + C
 */
function realCubicRoot(A: number, B: number, C: number): number {
  const p = B - (A * A) / 3;
  const q = (2 * A * A * A) / 27 - (A * B) / 3 + C;
  const shift = -A / 3;
  const delta = (q * q) / 4 + (p * p * p) / 27;

  if (delta > 0) {
    const s = Math.sqrt(delta);
    return Math.cbrt(-q / 2 + s) + Math.cbrt(-q / 2 - s) + shift;
  }

  if (p === 0) {
    return Math.cbrt(-q) + shift;
  }

  const arg = Math.min(1, Math.max(-1, ((3 * q) / (2 * p)) * Math.sqrt(-3 / p)));
  return 2 * Math.sqrt(-p / 3) * Math.cos(Math.acos(arg) / 3) + shift;
}
