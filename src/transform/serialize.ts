/**
 * Transformation Serialization
 *
 * NGFF-style `coordinateTransformations` JSON for every transformation
 * variant, and for whole registries (`{ [coordinateSystem]: json }`).
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../utils/errors.js';
import { TransformationRegistry } from './registry.js';
import {
  AffineMap,
  AffineTransform,
  Identity,
  Scale,
  Sequence,
  Translation,
} from './transformations.js';

export type TransformationJSON =
  | { type: 'identity' }
  | { type: 'translation'; translation: number[]; axes: string[] }
  | { type: 'scale'; scale: number[]; axes: string[] }
  | { type: 'affine'; affine: number[][]; input: string[]; output: string[] }
  | { type: 'sequence'; transformations: TransformationJSON[] };

const finite = z.number().finite();

export const transformationSchema: z.ZodType<TransformationJSON> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('identity') }),
    z.object({ type: z.literal('translation'), translation: z.array(finite), axes: z.array(z.string()) }),
    z.object({ type: z.literal('scale'), scale: z.array(finite), axes: z.array(z.string()) }),
    z.object({
      type: z.literal('affine'),
      affine: z.array(z.array(finite)),
      input: z.array(z.string()),
      output: z.array(z.string()),
    }),
    z.object({ type: z.literal('sequence'), transformations: z.array(transformationSchema) }),
  ])
);

export const registrySchema = z.record(transformationSchema);

export function transformationToJSON(transformation: AffineTransform): TransformationJSON {
  if (transformation instanceof Identity) {
    return { type: 'identity' };
  }
  if (transformation instanceof Translation) {
    return { type: 'translation', translation: [...transformation.translation], axes: [...transformation.axes] };
  }
  if (transformation instanceof Scale) {
    return { type: 'scale', scale: [...transformation.scale], axes: [...transformation.axes] };
  }
  if (transformation instanceof AffineMap) {
    return {
      type: 'affine',
      affine: transformation.matrix.map((row) => [...row]),
      input: [...transformation.inputAxes],
      output: [...transformation.outputAxes],
    };
  }
  if (transformation instanceof Sequence) {
    return { type: 'sequence', transformations: transformation.transformations.map(transformationToJSON) };
  }
  throw new InvalidArgumentError(`Cannot serialize transformation ${transformation.toString()}`);
}

function build(json: TransformationJSON): AffineTransform {
  switch (json.type) {
    case 'identity':
      return new Identity();
    case 'translation':
      return new Translation(json.translation, json.axes);
    case 'scale':
      return new Scale(json.scale, json.axes);
    case 'affine':
      return new AffineMap(json.affine, json.input, json.output);
    case 'sequence':
      return new Sequence(json.transformations.map(build));
  }
}

/**
 * Parse a transformation from its JSON form
 *
 * @throws InvalidArgumentError when `json` is not a valid transformation
 */
export function transformationFromJSON(json: unknown): AffineTransform {
  const result = transformationSchema.safeParse(json);
  if (!result.success) {
    throw new InvalidArgumentError('Invalid transformation JSON', { issues: result.error.issues });
  }
  return build(result.data);
}

export function registryToJSON(registry: TransformationRegistry): Record<string, TransformationJSON> {
  return Object.fromEntries(registry.entries().map(([name, t]) => [name, transformationToJSON(t)]));
}

/**
 * @throws InvalidArgumentError when any entry is not a valid transformation
 */
export function registryFromJSON(json: unknown): TransformationRegistry {
  const result = registrySchema.safeParse(json);
  if (!result.success) {
    throw new InvalidArgumentError('Invalid transformations JSON', { issues: result.error.issues });
  }
  return TransformationRegistry.fromEntries(
    Object.entries(result.data).map(([name, t]) => [name, build(t)] as const)
  );
}
