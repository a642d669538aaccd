/**
 * N-dimensional Array Utilities
 */

import type { DType, NDArray, NumericArray } from '../types.js';
import { InvalidArgumentError } from '../utils/errors.js';

export const DTYPES = [
  'uint8',
  'uint16',
  'uint32',
  'int8',
  'int16',
  'int32',
  'float32',
  'float64',
] as const satisfies readonly DType[];

/**
 * Number of elements of an array with the given shape
 */
export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((acc, n) => acc * n, 1);
}

/**
 * Row-major strides (in elements)
 */
export function stridesOf(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

export function dtypeOf(data: NumericArray): DType {
  if (data instanceof Uint8Array) return 'uint8';
  if (data instanceof Uint16Array) return 'uint16';
  if (data instanceof Uint32Array) return 'uint32';
  if (data instanceof Int8Array) return 'int8';
  if (data instanceof Int16Array) return 'int16';
  if (data instanceof Int32Array) return 'int32';
  if (data instanceof Float32Array) return 'float32';
  return 'float64';
}

export function isIntegerDType(dtype: DType): boolean {
  return dtype !== 'float32' && dtype !== 'float64';
}

/**
 * Allocate a zero-filled typed array of the given dtype
 */
export function allocate(dtype: DType, length: number | ArrayLike<number>): NumericArray {
  switch (dtype) {
    case 'uint8':
      return typeof length === 'number' ? new Uint8Array(length) : Uint8Array.from(length);
    case 'uint16':
      return typeof length === 'number' ? new Uint16Array(length) : Uint16Array.from(length);
    case 'uint32':
      return typeof length === 'number' ? new Uint32Array(length) : Uint32Array.from(length);
    case 'int8':
      return typeof length === 'number' ? new Int8Array(length) : Int8Array.from(length);
    case 'int16':
      return typeof length === 'number' ? new Int16Array(length) : Int16Array.from(length);
    case 'int32':
      return typeof length === 'number' ? new Int32Array(length) : Int32Array.from(length);
    case 'float32':
      return typeof length === 'number' ? new Float32Array(length) : Float32Array.from(length);
    case 'float64':
      return typeof length === 'number' ? new Float64Array(length) : Float64Array.from(length);
  }
}

/**
 * Build an NDArray, copying `values` into a typed array of `dtype`
 */
export function createNDArray(
  values: ArrayLike<number>,
  shape: readonly number[],
  dtype: DType = 'float64'
): NDArray {
  if (shape.some((n) => !Number.isInteger(n) || n < 0)) {
    throw new InvalidArgumentError(`Invalid array shape [${shape.join(', ')}]`);
  }
  if (values.length !== sizeOf(shape)) {
    throw new InvalidArgumentError(
      `Array of ${values.length} values does not match shape [${shape.join(', ')}]`
    );
  }
  return { shape: [...shape], data: allocate(dtype, values) };
}

/**
 * Value at a multi-index (no bounds check)
 */
export function getValue(array: NDArray, index: readonly number[]): number {
  const strides = stridesOf(array.shape);
  let offset = 0;
  for (let i = 0; i < index.length; i++) {
    offset += index[i] * strides[i];
  }
  return array.data[offset];
}

/**
 * Every other sample along each spatial axis, used to build pyramid levels
 */
export function downsample(array: NDArray, factors: readonly number[]): NDArray {
  if (factors.length !== array.shape.length || factors.some((f) => !Number.isInteger(f) || f < 1)) {
    throw new InvalidArgumentError('Downsampling factors must be positive integers, one per axis');
  }

  const shape = array.shape.map((n, i) => Math.max(1, Math.floor(n / factors[i])));
  const out = allocate(dtypeOf(array.data), sizeOf(shape));
  const inStrides = stridesOf(array.shape);
  const outStrides = stridesOf(shape);

  for (let flat = 0; flat < out.length; flat++) {
    let rest = flat;
    let source = 0;
    for (let axis = 0; axis < shape.length; axis++) {
      const idx = Math.floor(rest / outStrides[axis]);
      rest -= idx * outStrides[axis];
      source += idx * factors[axis] * inStrides[axis];
    }
    out[flat] = array.data[source];
  }

  return { shape, data: out };
}
