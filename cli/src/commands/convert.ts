import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import {
  ConversionError,
  ConversionErrorKind,
  ConversionResult,
  HeaderConverter,
  lookupFormat,
  stripExtension
} from '@pixarray/core';

export const HEADER_EXTENSION = '.h';

export interface ConvertOptions {
  format: string;
  output?: string;
}

export interface ConvertedFile {
  input: string;
  output: string;
  result: ConversionResult;
}

export async function convertCommand(inputs: string[], options: ConvertOptions) {
  // Fail on a bad format before touching any input
  try {
    lookupFormat(options.format);
  } catch (error) {
    console.error(chalk.red('✗ Error:'), describeError(error));
    process.exit(1);
  }

  if (options.output && inputs.length > 1) {
    console.error(chalk.red('✗ Error:'), '--output can only be used with a single input');
    process.exit(1);
  }

  const collisions = findOutputCollisions(inputs, options.output);
  if (collisions.length > 0) {
    console.error(chalk.red('✗ Error:'), 'Several inputs would write the same header:');
    for (const [output, sources] of collisions) {
      console.error(chalk.red('  •'), `${output} <- ${sources.join(', ')}`);
    }
    process.exit(1);
  }

  const converter = new HeaderConverter();
  let failures = 0;

  for (const input of inputs) {
    const spinner = ora(`Converting ${input}...`).start();

    try {
      const converted = await convertFile(input, options, converter);
      spinner.stop();
      printSummary(converted);
    } catch (error) {
      failures++;
      spinner.fail(`Error processing '${input}': ${describeError(error)}`);
    }
  }

  if (failures > 0) {
    process.exit(1);
  }
}

/**
 * Convert one image and write its header. Nothing is written unless the
 * header was rendered completely.
 */
export async function convertFile(
  input: string,
  options: ConvertOptions,
  converter: HeaderConverter = new HeaderConverter()
): Promise<ConvertedFile> {
  if (!await fs.pathExists(input)) {
    throw new ConversionError(ConversionErrorKind.INPUT_NOT_FOUND, `Input file '${input}' not found`);
  }

  let content: Buffer;
  try {
    content = await fs.readFile(input);
  } catch (error) {
    throw new ConversionError(
      ConversionErrorKind.INPUT_NOT_FOUND,
      `Input file '${input}' is not readable: ${describeError(error)}`,
      { cause: error }
    );
  }

  const result = converter.convert(content, path.basename(input), options.format);
  const output = resolveOutputPath(input, options.output);

  await writeHeader(output, result.text);

  return { input, output, result };
}

/**
 * Write through a temporary file beside `output`, so a failed write leaves
 * either the previous file or nothing at the final path.
 */
async function writeHeader(output: string, text: string): Promise<void> {
  const staging = `${output}.${process.pid}.tmp`;

  if (await fs.pathExists(output) && (await fs.stat(output)).isDirectory()) {
    throw new ConversionError(ConversionErrorKind.WRITE_FAILURE, `Cannot write '${output}': it is a directory`);
  }

  try {
    await fs.outputFile(staging, text);
    await fs.move(staging, output, { overwrite: true });
  } catch (error) {
    if (await fs.pathExists(staging)) {
      await fs.remove(staging);
    }
    throw new ConversionError(
      ConversionErrorKind.WRITE_FAILURE,
      `Cannot write '${output}': ${describeError(error)}`,
      { cause: error }
    );
  }
}

/** Output paths claimed by more than one input, with the inputs claiming them. */
export function findOutputCollisions(inputs: string[], output?: string): Array<[string, string[]]> {
  const claims = new Map<string, string[]>();
  for (const input of inputs) {
    const target = path.resolve(resolveOutputPath(input, output));
    claims.set(target, [...(claims.get(target) ?? []), input]);
  }
  return [...claims].filter(([, sources]) => sources.length > 1);
}

/**
 * Explicit output path, or the input path with its extension replaced by `.h`.
 */
export function resolveOutputPath(input: string, output?: string): string {
  if (output) {
    return output;
  }
  return stripExtension(input) + HEADER_EXTENSION;
}

export function summaryFields({ result }: ConvertedFile): Array<[string, string]> {
  return [
    ['Format:', result.format.description],
    ['Dimensions:', `${result.width}x${result.height}`],
    ['Bytes per pixel:', String(result.format.bytesPerPixel)],
    ['Total data size:', `${result.bytes.length} bytes`]
  ];
}

function printSummary(converted: ConvertedFile) {
  console.log(chalk.green(`✓ Successfully converted '${converted.input}' to '${converted.output}'`));
  for (const [label, value] of summaryFields(converted)) {
    console.log(' ', chalk.gray(label), value);
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
