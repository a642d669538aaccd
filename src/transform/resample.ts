/**
 * Affine Resampling
 *
 * The raster transformers only build a `ResamplePlan` (matrix + output shape);
 * realising it is the job of an `ArrayCompute` implementation, which may be
 * eager (the bundled `eagerCompute`) or chunked and deferred.
 */

import type { InterpolationOrder, NDArray } from '../types.js';
import { allocate, dtypeOf, isIntegerDType, sizeOf, stridesOf } from '../elements/ndarray.js';
import { InvalidArgumentError } from '../utils/errors.js';
import type { Matrix } from './matrix.js';

export interface ResamplePlan {
  /** Homogeneous matrix mapping output indices to input indices */
  readonly matrix: Matrix;

  readonly outputShape: readonly number[];

  /** 0 = nearest neighbour, 1 = multilinear */
  readonly order: InterpolationOrder;

  /** Spline prefiltering, only meaningful to collaborators with order > 1 */
  readonly prefilter: boolean;

  /** Value for output samples that map outside the input */
  readonly cval: number;
}

export interface ArrayCompute {
  affineResample(source: NDArray, plan: ResamplePlan): NDArray;
}

function validatePlan(source: NDArray, plan: ResamplePlan): void {
  const dims = source.shape.length;
  if (plan.outputShape.length !== dims) {
    throw new InvalidArgumentError(
      `Output shape has ${plan.outputShape.length} axes, the source has ${dims}`
    );
  }
  if (plan.matrix.length !== dims + 1 || plan.matrix.some((row) => row.length !== dims + 1)) {
    throw new InvalidArgumentError(`Resampling matrix must be ${dims + 1}x${dims + 1}`);
  }
}

/**
 * Resamples in memory, one output sample at a time
 */
export const eagerCompute: ArrayCompute = {
  affineResample(source: NDArray, plan: ResamplePlan): NDArray {
    validatePlan(source, plan);

    const dims = source.shape.length;
    const dtype = dtypeOf(source.data);
    const roundResult = isIntegerDType(dtype);
    const out = allocate(dtype, sizeOf(plan.outputShape));
    const outStrides = stridesOf(plan.outputShape);
    const inStrides = stridesOf(source.shape);
    const index = new Array<number>(dims).fill(0);
    const coord = new Array<number>(dims).fill(0);

    const sample =
      plan.order === 0
        ? (): number => sampleNearest(source, inStrides, coord, plan.cval)
        : (): number => sampleLinear(source, inStrides, coord, plan.cval);

    for (let flat = 0; flat < out.length; flat++) {
      let rest = flat;
      for (let axis = 0; axis < dims; axis++) {
        index[axis] = Math.floor(rest / outStrides[axis]);
        rest -= index[axis] * outStrides[axis];
      }

      for (let r = 0; r < dims; r++) {
        const row = plan.matrix[r];
        let value = row[dims];
        for (let c = 0; c < dims; c++) {
          value += row[c] * index[c];
        }
        coord[r] = value;
      }

      const value = sample();
      out[flat] = roundResult ? Math.round(value) : value;
    }

    return { shape: [...plan.outputShape], data: out };
  },
};

function sampleNearest(source: NDArray, strides: number[], coord: number[], cval: number): number {
  let offset = 0;
  for (let axis = 0; axis < coord.length; axis++) {
    const i = Math.round(coord[axis]);
    if (i < 0 || i >= source.shape[axis]) return cval;
    offset += i * strides[axis];
  }
  return source.data[offset];
}

function sampleLinear(source: NDArray, strides: number[], coord: number[], cval: number): number {
  const dims = coord.length;
  const base = coord.map((c) => Math.floor(c));
  const frac = coord.map((c, i) => c - base[i]);
  let result = 0;

  for (let corner = 0; corner < 1 << dims; corner++) {
    let weight = 1;
    let offset = 0;
    let inside = true;

    for (let axis = 0; axis < dims; axis++) {
      const upper = (corner >> (dims - 1 - axis)) & 1;
      weight *= upper ? frac[axis] : 1 - frac[axis];
      const i = base[axis] + upper;
      if (i < 0 || i >= source.shape[axis]) inside = false;
      offset += i * strides[axis];
    }

    if (weight === 0) continue;
    result += weight * (inside ? source.data[offset] : cval);
  }

  return result;
}
