import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createDefaultConfig, runPipeline } from '../pipeline.js';
import { AmbiguousTransformError, InvalidArgumentError } from '../utils/errors.js';

const document = {
  images: {
    raw: {
      dims: ['c', 'y', 'x'],
      dtype: 'uint8',
      shape: [1, 2, 2],
      data: [1, 2, 3, 4],
      transformations: {
        global: { type: 'identity' },
        aligned: { type: 'scale', scale: [2, 2], axes: ['y', 'x'] },
      },
    },
  },
  points: {
    cells: {
      axes: ['x', 'y'],
      coordinates: [[0.5, 0.5]],
      transformations: { aligned: { type: 'identity' } },
    },
    unaligned: {
      axes: ['x', 'y'],
      coordinates: [[3, 4]],
    },
  },
};

describe('runPipeline', () => {
  let dir: string;
  let input: string;
  let output: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'spatial-align-pipeline-'));
    input = path.join(dir, 'input.json');
    output = path.join(dir, 'out', 'result.json');
    await fs.writeFile(input, JSON.stringify(document), 'utf-8');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function readOutput(): Promise<Record<string, Record<string, Record<string, unknown>>>> {
    return JSON.parse(await fs.readFile(output, 'utf-8'));
  }

  it('moves the dataset into the target coordinate system', async () => {
    const result = await runPipeline(createDefaultConfig(input, output, 'aligned'));

    expect(result.outputPath).toBe(output);
    expect(result.elementCount).toBe(2);
    expect(result.coordinateSystems).toEqual(['aligned']);

    const written = await readOutput();
    expect(Object.keys(written.points)).toEqual(['cells']);
    expect(written.images.raw.shape).toEqual([1, 4, 4]);
    expect(written.images.raw.transformations).toEqual({
      aligned: { type: 'translation', translation: [-0.5, -0.5], axes: ['y', 'x'] },
    });
    expect(written.points.cells.transformations).toEqual({ aligned: { type: 'identity' } });
  });

  it('transforms a single element in place', async () => {
    const result = await runPipeline({
      input: { documentPath: input },
      transform: {
        transformation: { type: 'scale', scale: [2, 2], axes: ['x', 'y'] },
        maintainPositioning: true,
        element: 'cells',
      },
      output: { documentPath: output },
    });

    expect(result.elementCount).toBe(3);
    const written = await readOutput();
    expect(written.points.cells.coordinates).toEqual([[1, 1]]);
    expect(written.points.cells.transformations).toEqual({
      aligned: {
        type: 'sequence',
        transformations: [{ type: 'scale', scale: [0.5, 0.5], axes: ['x', 'y'] }, { type: 'identity' }],
      },
    });
    expect(written.points.unaligned.coordinates).toEqual([[3, 4]]);
    expect(written.images.raw.data).toEqual([1, 2, 3, 4]);
  });

  it('rejects an explicit transformation for the whole dataset without maintained positioning', async () => {
    await expect(
      runPipeline({
        input: { documentPath: input },
        transform: { transformation: { type: 'identity' }, maintainPositioning: false },
        output: { documentPath: output },
      })
    ).rejects.toThrow(AmbiguousTransformError);
  });

  it('validates its configuration', async () => {
    await expect(
      runPipeline({
        input: { documentPath: '' },
        transform: {
          toCoordinateSystem: 'aligned',
          transformation: { type: 'identity' },
          maintainPositioning: true,
        },
        output: { documentPath: output },
      })
    ).rejects.toThrow(InvalidArgumentError);
  });
});

describe('createDefaultConfig', () => {
  it('targets a coordinate system without maintained positioning', () => {
    expect(createDefaultConfig('in.json', 'out.json', 'world')).toEqual({
      input: { documentPath: 'in.json' },
      transform: { toCoordinateSystem: 'world', maintainPositioning: false },
      output: { documentPath: 'out.json' },
    });
  });
});
