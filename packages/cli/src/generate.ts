/**
 * Single-file and batch schema generation for the CLI.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join, relative } from 'node:path';
import {
  ErrorCode,
  InputError,
  IoError,
  SchemaDocumentValidator,
  inferSchema,
  serializeSchema,
  type JsonValue,
  type Tier,
} from '@schemasmith/core';
import { errorMessage, isNotFound } from './config.js';
import { compileGlob, expandGlob } from './glob.js';
import type { Logger } from './logger.js';

export interface GenerateSettings {
  tier: Tier;
  pretty: boolean;
  validate: boolean;
  maxDepth?: number;
  /** Explicit output file (single mode) or directory (batch mode). */
  output?: string;
  outputDirectory?: string;
}

export interface BatchFailure {
  file: string;
  message: string;
}

export interface BatchSummary {
  processed: string[];
  failures: BatchFailure[];
}

function print(line: string): void {
  process.stdout.write(`${line}\n`);
}

/**
 * `<stem>.schema.json`, beside the input unless a directory is given.
 */
export function resolveOutputPath(
  input: string,
  output?: string,
  outputDirectory?: string
): string {
  if (output !== undefined) return output;
  const stem = basename(input, extname(input));
  return join(outputDirectory ?? dirname(input), `${stem}.schema.json`);
}

export async function readJsonInput(file: string): Promise<JsonValue> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new InputError({
        message: `File not found: ${file}`,
        errorCode: ErrorCode.INPUT_NOT_FOUND,
        context: { file, suggestion: 'Check the input path' },
      });
    }
    throw new IoError({
      message: `Cannot read ${file}: ${errorMessage(error)}`,
      context: { file },
      cause: error instanceof Error ? error : undefined,
    });
  }

  try {
    // JSON.parse only ever produces JSON values
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (error) {
    throw new InputError({
      message: `Invalid JSON: ${errorMessage(error)}`,
      errorCode: ErrorCode.INVALID_JSON,
      context: { file, valueExcerpt: excerpt(text) },
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Infer, optionally validate, and write the schema for one input file.
 * Returns the path written.
 */
export async function processSingleFile(
  input: string,
  settings: GenerateSettings,
  logger: Logger
): Promise<string> {
  logger.info(`Processing input file: ${input}`);
  const value = await readJsonInput(input);

  const options =
    settings.maxDepth === undefined ? {} : { maxDepth: settings.maxDepth };
  const inferred = inferSchema(value, settings.tier, options);
  if (inferred.isErr()) throw inferred.error;
  const doc = inferred.value;
  logger.debug(`Inferred ${settings.tier} schema for ${input}`);

  if (settings.validate) {
    const report = new SchemaDocumentValidator().validate(doc);
    if (report.isErr()) throw report.error;
    print('Schema validation passed');
  }

  const outputPath = resolveOutputPath(
    input,
    settings.output,
    settings.outputDirectory
  );
  const text = `${serializeSchema(doc, { pretty: settings.pretty })}\n`;
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, text, 'utf8');
  } catch (error) {
    throw new IoError({
      message: `Cannot write ${outputPath}: ${errorMessage(error)}`,
      context: { file: outputPath },
      cause: error instanceof Error ? error : undefined,
    });
  }
  logger.debug(`Wrote ${Buffer.byteLength(text, 'utf8')} bytes to ${outputPath}`);

  print(`Schema generated successfully: ${outputPath}`);
  return outputPath;
}

/**
 * Process every file matching `pattern` whose extension is listed.
 * Per-file failures of any kind are collected and reported, not thrown.
 *
 * With an output directory, each schema lands at the input's path relative
 * to the pattern's base, so same-named inputs in different directories do
 * not overwrite each other.
 */
export async function processBatch(
  pattern: string,
  settings: GenerateSettings,
  fileExtensions: readonly string[],
  logger: Logger
): Promise<BatchSummary> {
  const matches = await expandGlob(pattern);
  const files = matches.filter((file) =>
    fileExtensions.includes(extname(file).slice(1).toLowerCase())
  );
  logger.info(`Found ${files.length} matching files for ${pattern}`);

  const { base } = compileGlob(pattern);
  const outputRoot = settings.output ?? settings.outputDirectory;
  const summary: BatchSummary = { processed: [], failures: [] };

  for (const file of files) {
    const outputDirectory =
      outputRoot === undefined
        ? undefined
        : join(outputRoot, relative(base, dirname(file)));
    try {
      await processSingleFile(
        file,
        { ...settings, output: undefined, outputDirectory },
        logger
      );
      summary.processed.push(file);
    } catch (error) {
      const message = errorMessage(error);
      logger.warn(`Failed to process ${file}: ${message}`);
      summary.failures.push({ file, message });
    }
  }

  print(`Processed ${summary.processed.length} files successfully`);
  if (summary.failures.length > 0) {
    print('Errors encountered:');
    for (const failure of summary.failures) {
      print(`  ${failure.file}: ${failure.message}`);
    }
  }

  return summary;
}

function excerpt(text: string, max = 60): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}
