import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../../utils/errors.js';
import { TransformationRegistry } from '../registry.js';
import {
  registryFromJSON,
  registryToJSON,
  transformationFromJSON,
  transformationToJSON,
} from '../serialize.js';
import { AffineMap, Identity, Scale, Sequence, Translation } from '../transformations.js';

describe('transformationToJSON', () => {
  it('writes every variant in its JSON form', () => {
    expect(transformationToJSON(new Identity())).toEqual({ type: 'identity' });
    expect(transformationToJSON(new Translation([1, 2], ['x', 'y']))).toEqual({
      type: 'translation',
      translation: [1, 2],
      axes: ['x', 'y'],
    });
    expect(transformationToJSON(new Scale([2, 3], ['y', 'x']))).toEqual({
      type: 'scale',
      scale: [2, 3],
      axes: ['y', 'x'],
    });
    expect(
      transformationToJSON(
        new AffineMap(
          [
            [0, 1, 5],
            [1, 0, 6],
            [0, 0, 1],
          ],
          ['x', 'y'],
          ['x', 'y']
        )
      )
    ).toEqual({
      type: 'affine',
      affine: [
        [0, 1, 5],
        [1, 0, 6],
        [0, 0, 1],
      ],
      input: ['x', 'y'],
      output: ['x', 'y'],
    });
  });

  it('nests sequences', () => {
    const json = transformationToJSON(
      new Sequence([new Scale([2, 2], ['x', 'y']), new Translation([1, 0], ['x', 'y'])])
    );

    expect(json).toEqual({
      type: 'sequence',
      transformations: [
        { type: 'scale', scale: [2, 2], axes: ['x', 'y'] },
        { type: 'translation', translation: [1, 0], axes: ['x', 'y'] },
      ],
    });
  });
});

describe('transformationFromJSON', () => {
  it('reads back an equal transformation', () => {
    const original = new Sequence([
      new Identity(),
      new Scale([0.5, 4], ['y', 'x']),
      new AffineMap(
        [
          [1, 0, 2],
          [0, 1, 3],
          [0, 0, 1],
        ],
        ['y', 'x'],
        ['y', 'x']
      ),
    ]);

    const parsed = transformationFromJSON(JSON.parse(JSON.stringify(transformationToJSON(original))));

    expect(parsed).toBeInstanceOf(Sequence);
    expect(parsed.equals(original)).toBe(true);
  });

  it('rejects unknown types and malformed fields', () => {
    expect(() => transformationFromJSON({ type: 'rotation', angle: 90 })).toThrow(InvalidArgumentError);
    expect(() => transformationFromJSON({ type: 'scale', scale: ['2'], axes: ['x'] })).toThrow(
      InvalidArgumentError
    );
    expect(() => transformationFromJSON(null)).toThrow(InvalidArgumentError);
  });

  it('reports the schema issues', () => {
    try {
      transformationFromJSON({ type: 'translation', axes: ['x'] });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError);
      if (error instanceof InvalidArgumentError) {
        expect(error.message).toBe('Invalid transformation JSON');
        expect(error.details).toHaveProperty('issues');
      }
    }
  });
});

describe('registry JSON', () => {
  it('maps coordinate systems to transformations', () => {
    const registry = TransformationRegistry.fromRecord({
      global: new Identity(),
      physical: new Scale([0.5, 0.5], ['x', 'y']),
    });

    const json = registryToJSON(registry);
    expect(json).toEqual({
      global: { type: 'identity' },
      physical: { type: 'scale', scale: [0.5, 0.5], axes: ['x', 'y'] },
    });
    expect(registryFromJSON(json).equals(registry)).toBe(true);
  });

  it('rejects a registry with an invalid entry', () => {
    expect(() => registryFromJSON({ global: { type: 'identity' }, broken: { type: 'scale' } })).toThrow(
      InvalidArgumentError
    );
  });
});
