import { describe, it, expect } from 'vitest';
import { Identity, Scale } from '../../transform/transformations.js';
import { InvalidArgumentError } from '../../utils/errors.js';
import { groupOf, SpatialDataset } from '../dataset.js';
import { createImage, createLabels, createPointTable, createCircles } from '../factories.js';
import { createNDArray } from '../ndarray.js';

const image = createImage(createNDArray([1, 2, 3, 4], [1, 2, 2]), {
  transformations: { global: new Identity(), aligned: new Scale([2, 2], ['y', 'x']) },
});
const labels = createLabels(createNDArray([0, 1, 1, 0], [2, 2], 'uint8'));
const cells = createPointTable([[0.5, 0.5]], { transformations: { aligned: new Identity() } });
const spots = createCircles([[1, 1]], 0.5);

const dataset = new SpatialDataset({
  images: { raw: image },
  labels: { mask: labels },
  points: { cells },
  shapes: { spots },
});

describe('SpatialDataset', () => {
  it('lists entries by group', () => {
    expect(dataset.entries().map(({ group, name }) => [group, name])).toEqual([
      ['images', 'raw'],
      ['labels', 'mask'],
      ['points', 'cells'],
      ['shapes', 'spots'],
    ]);
    expect(dataset.size).toBe(4);
  });

  it('finds elements by name', () => {
    expect(dataset.has('mask')).toBe(true);
    expect(dataset.has('missing')).toBe(false);
    expect(dataset.element('cells')).toBe(cells);
    expect(() => dataset.element('missing')).toThrow("No element named 'missing'");
  });

  it('collects the coordinate systems of its elements', () => {
    expect(dataset.coordinateSystems()).toEqual(['aligned', 'global']);
  });

  it('filters elements by coordinate system', () => {
    const aligned = dataset.filterByCoordinateSystem('aligned');
    expect(aligned.entries().map((e) => e.name)).toEqual(['raw', 'cells']);
    expect(dataset.filterByCoordinateSystem('unknown').size).toBe(0);
  });

  it('replaces and adds elements without touching the original', () => {
    const replaced = dataset.withElement('cells', createPointTable([[2, 2]]));
    expect(replaced.size).toBe(4);
    expect(replaced.element('cells')).not.toBe(cells);
    expect(dataset.element('cells')).toBe(cells);

    const added = dataset.withElement('more', createPointTable([[3, 3]]));
    expect(added.size).toBe(5);
    expect(added.points.has('more')).toBe(true);
  });

  it('rejects names used in two groups', () => {
    expect(() => new SpatialDataset({ images: { a: image }, labels: { a: labels } })).toThrow(
      "Element name 'a' is used more than once"
    );
    expect(() =>
      SpatialDataset.fromEntries([
        { name: 'a', element: cells },
        { name: 'a', element: spots },
      ])
    ).toThrow(InvalidArgumentError);
  });

  it('rejects elements stored in the wrong group', () => {
    expect(() => new SpatialDataset({ images: { mask: labels } })).toThrow(
      "Element 'mask' is a labels element and cannot be stored under images"
    );
  });

  it('accepts names that shadow object properties', () => {
    const odd = SpatialDataset.fromEntries([{ name: 'constructor', element: cells }]);
    expect(odd.element('constructor')).toBe(cells);
  });
});

describe('groupOf', () => {
  it('maps elements to their dataset group', () => {
    expect(groupOf(image)).toBe('images');
    expect(groupOf(labels)).toBe('labels');
    expect(groupOf(cells)).toBe('points');
    expect(groupOf(spots)).toBe('shapes');
  });
});
