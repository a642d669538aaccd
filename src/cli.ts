#!/usr/bin/env node
/**
 * spatial-align CLI
 *
 * Moves the elements of a dataset document into another coordinate system,
 * or applies an explicit transformation while keeping them in place.
 */

import * as fs from 'fs/promises';
import { runPipeline } from './pipeline.js';
import { SpatialAlignError } from './utils/errors.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import type { PipelineConfig } from './types.js';

const logger = createLogger('cli');

interface CLIOptions {
  input: string;
  output: string;
  to?: string;
  transform?: string;
  maintainPositioning?: boolean;
  element?: string;
  verbose?: boolean;
  help?: boolean;
}

const HELP_TEXT = `
spatial-align - Apply affine transformations to spatial datasets

Usage:
  spatial-align -i <input> -o <output> (--to <cs> | --transform <json>) [options]

Required:
  -i, --input <path>          Input dataset document (JSON)
  -o, --output <path>         Output dataset document (JSON)

Transformation (exactly one):
  --to <cs>                   Move the data into this coordinate system
  --transform <json>          Apply this transformation (NGFF JSON)

Options:
  --maintain-positioning      Keep every element where it is in all of its
                              coordinate systems
  --element <name>            Transform only this element
  -v, --verbose               Enable verbose logging
  -h, --help                  Show this help message

Examples:
  # Resample everything anchored in "aligned" into that system
  spatial-align -i dataset.json -o aligned.json --to aligned

  # Rotate one image in place without moving it in any coordinate system
  spatial-align -i dataset.json -o rotated.json --element raw --maintain-positioning \\
    --transform '{"type":"affine","affine":[[0,1,0],[-1,0,0],[0,0,1]],"input":["y","x"],"output":["y","x"]}'
`;

/**
 * Parse command line arguments
 */
function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    input: '',
    output: '',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '-i':
      case '--input':
        options.input = next;
        i++;
        break;
      case '-o':
      case '--output':
        options.output = next;
        i++;
        break;
      case '--to':
        options.to = next;
        i++;
        break;
      case '--transform':
        options.transform = next;
        i++;
        break;
      case '--maintain-positioning':
        options.maintainPositioning = true;
        break;
      case '--element':
        options.element = next;
        i++;
        break;
      case '-v':
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        console.error(`Error: Unknown option: ${arg}`);
        console.error('Use --help for usage information');
        process.exit(1);
    }
  }

  return options;
}

/**
 * Parse the --transform argument
 */
function parseTransformation(text: string | undefined): unknown {
  if (text === undefined) return undefined;

  try {
    return JSON.parse(text);
  } catch (error) {
    console.error(`Error: --transform is not valid JSON: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  }
}

/**
 * Build pipeline config from CLI options
 */
function buildConfig(options: CLIOptions): PipelineConfig {
  if (options.to === undefined && options.transform === undefined) {
    console.error('Error: One of --to or --transform is required');
    process.exit(1);
  }

  if (options.to !== undefined && options.transform !== undefined) {
    console.error('Error: --to and --transform cannot be combined');
    process.exit(1);
  }

  return {
    input: { documentPath: options.input },
    transform: {
      ...(options.to !== undefined && { toCoordinateSystem: options.to }),
      ...(options.transform !== undefined && { transformation: parseTransformation(options.transform) }),
      maintainPositioning: options.maintainPositioning ?? false,
      ...(options.element !== undefined && { element: options.element }),
    },
    output: { documentPath: options.output },
  };
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const options = parseArgs(args);

  if (options.help || args.length === 0) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (!options.input) {
    console.error('Error: Input document is required');
    console.error('Use --help for usage information');
    process.exit(1);
  }

  if (!options.output) {
    console.error('Error: Output document is required');
    console.error('Use --help for usage information');
    process.exit(1);
  }

  try {
    await fs.access(options.input);
  } catch {
    console.error(`Error: Input document not found: ${options.input}`);
    process.exit(1);
  }

  if (options.verbose) {
    setLogLevel('debug');
  }

  const config = buildConfig(options);
  logger.debug({ config }, 'Parsed command line');

  try {
    console.log(`Input: ${options.input}`);
    console.log(`Output: ${options.output}`);

    const result = await runPipeline(config);

    console.log('\n=== Transformation Complete ===');
    console.log(`Document: ${result.outputPath}`);
    console.log(`Elements: ${result.elementCount}`);
    console.log(`Coordinate systems: ${result.coordinateSystems.join(', ') || '(none)'}`);
    console.log(`Time: ${(result.processingTimeMs / 1000).toFixed(2)} seconds`);

    process.exit(0);
  } catch (error) {
    if (error instanceof SpatialAlignError) {
      console.error(`Error [${error.code}]: ${error.message}`);
    } else {
      console.error('Error:', error instanceof Error ? error.message : error);
    }
    if (options.verbose) {
      console.error(error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal:', error);
  process.exit(1);
});
