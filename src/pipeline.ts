/**
 * Alignment Pipeline
 *
 * Pipeline stages:
 * 1. Read: load and validate the dataset document
 * 2. Transform: apply the transformation to one element or the whole dataset
 * 3. Write: save the transformed dataset document
 */

import { loadDocument, saveDocument } from './io/document.js';
import { applyTransform, transformDataset } from './transform/dispatch.js';
import { transformationFromJSON } from './transform/serialize.js';
import type { EngineConfig } from './config.js';
import type { PipelineConfig, ProcessingResult } from './types.js';
import { InvalidArgumentError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('pipeline');

/**
 * Run the read / transform / write pipeline
 */
export async function runPipeline(
  config: PipelineConfig,
  engine?: EngineConfig
): Promise<ProcessingResult> {
  const startTime = Date.now();

  validateConfig(config);

  logger.info({ input: config.input.documentPath }, 'Stage 1: Reading dataset document');
  const { dataset, catalog } = await loadDocument(config.input.documentPath);
  logger.info(
    { elements: dataset.size, coordinateSystems: dataset.coordinateSystems() },
    'Read dataset'
  );

  logger.info('Stage 2: Applying transformation');
  const options = {
    transformation:
      config.transform.transformation === undefined
        ? undefined
        : transformationFromJSON(config.transform.transformation),
    toCoordinateSystem: config.transform.toCoordinateSystem,
    maintainPositioning: config.transform.maintainPositioning,
    config: engine,
  };

  const elementName = config.transform.element;
  const transformed =
    elementName === undefined
      ? transformDataset(dataset, options)
      : dataset.withElement(elementName, applyTransform(dataset.element(elementName), options));

  logger.info({ output: config.output.documentPath }, 'Stage 3: Writing dataset document');
  await saveDocument(config.output.documentPath, transformed, catalog);

  const result: ProcessingResult = {
    outputPath: config.output.documentPath,
    elementCount: transformed.size,
    coordinateSystems: transformed.coordinateSystems(),
    processingTimeMs: Date.now() - startTime,
  };

  logger.info(
    {
      outputPath: result.outputPath,
      elementCount: result.elementCount,
      coordinateSystems: result.coordinateSystems,
      processingTimeSec: (result.processingTimeMs / 1000).toFixed(2),
    },
    'Pipeline complete'
  );

  return result;
}

/**
 * Validate pipeline configuration
 */
function validateConfig(config: PipelineConfig): void {
  const errors: string[] = [];

  if (!config.input.documentPath) {
    errors.push('Input document path is required');
  }

  if (!config.output.documentPath) {
    errors.push('Output document path is required');
  }

  const { toCoordinateSystem, transformation } = config.transform;
  if (toCoordinateSystem === undefined && transformation === undefined) {
    errors.push('Either a target coordinate system or a transformation is required');
  }
  if (toCoordinateSystem !== undefined && transformation !== undefined) {
    errors.push('A target coordinate system and a transformation cannot both be given');
  }

  if (errors.length > 0) {
    throw new InvalidArgumentError('Invalid pipeline configuration', { errors });
  }
}

/**
 * Create a pipeline configuration that moves a dataset into `toCoordinateSystem`
 */
export function createDefaultConfig(
  inputPath: string,
  outputPath: string,
  toCoordinateSystem: string
): PipelineConfig {
  return {
    input: { documentPath: inputPath },
    transform: { toCoordinateSystem, maintainPositioning: false },
    output: { documentPath: outputPath },
  };
}
