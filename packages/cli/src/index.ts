#!/usr/bin/env node

// CLI entry point
// - `schemasmith [options] [input]` infers a JSON Schema for a JSON file, or for
//   every file matching a glob with --batch.
// - `completion <shell>` prints a bash/zsh/fish completion script.
// - `init [file]` writes the default configuration.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  ErrorCode,
  ErrorPresenter,
  SchemasmithError,
  isSchemasmithError,
} from '@schemasmith/core';
import { renderCLIView } from './render.js';
import {
  parseMaxDepth,
  resolveLogLevel,
  resolveTierFlag,
  type CliOptions,
} from './flags.js';
import {
  DEFAULT_CONFIG_FILE,
  defaultConfig,
  loadConfig,
  mergeWithArgs,
  saveConfig,
} from './config.js';
import { processBatch, processSingleFile } from './generate.js';
import { generateCompletion, parseShell } from './completion.js';
import { createLogger } from './logger.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('schemasmith')
    .description('Generate JSON Schema documents from JSON data')
    .version(VERSION)
    .argument('[input]', 'Input JSON file (a glob pattern with --batch)')
    .option('-o, --output <path>', 'Output file (output directory with --batch)')
    .option('-t, --tier <tier>', 'Schema tier: basic|standard|comprehensive|expert')
    .option('-p, --pretty', 'Pretty-print the schema')
    .option('-v, --validate', 'Check the schema against the draft 2020-12 meta-schema')
    .option('-b, --batch', 'Treat input as a glob pattern')
    .option('-c, --config <file>', 'Configuration file (JSON or YAML)')
    .option('--max-depth <n>', 'Maximum nesting depth of the input')
    .option('--log-level <level>', 'Log level: silent|error|warn|info|debug')
    .action(async (input: string | undefined, options: CliOptions) => {
      await runGenerate(input, options);
    });

  program
    .command('completion')
    .description('Print a shell completion script')
    .argument('<shell>', 'Target shell: bash|zsh|fish')
    .action((shell: string) => {
      process.stdout.write(generateCompletion(program, parseShell(shell)));
    });

  program
    .command('init')
    .description('Write the default configuration file')
    .argument('[file]', 'Configuration file to create', DEFAULT_CONFIG_FILE)
    .option('-f, --force', 'Overwrite an existing file')
    .action(async (file: string, options: { force?: boolean }) => {
      if (options.force !== true && fs.existsSync(file)) {
        throw new ConfigError({
          message: `Configuration file already exists: ${file}`,
          context: { file, suggestion: 'Pass --force to overwrite it' },
        });
      }
      await saveConfig(defaultConfig(), file);
      process.stdout.write(`Configuration written: ${file}\n`);
    });

  return program;
}

async function runGenerate(
  input: string | undefined,
  options: CliOptions
): Promise<void> {
  const logger = createLogger(resolveLogLevel(options.logLevel));

  if (input === undefined) {
    throw new ConfigError({
      message: 'Input file is required for schema generation',
      context: { suggestion: 'Run `schemasmith --help` for usage' },
    });
  }

  let config = defaultConfig();
  if (options.config) {
    config = await loadConfig(options.config);
    logger.debug(`Loaded configuration from ${options.config}`);
  }

  const effective = mergeWithArgs(config, {
    tier: resolveTierFlag(options.tier),
    pretty: options.pretty,
    validate: options.validate,
  });
  const settings = {
    tier: effective.defaultTier,
    pretty: effective.prettyOutput,
    validate: effective.validateSchema,
    maxDepth: parseMaxDepth(options.maxDepth),
    output: options.output,
    outputDirectory: effective.outputDirectory,
  };
  logger.debug(`Effective settings: ${JSON.stringify(settings)}`);

  if (options.batch === true) {
    await processBatch(input, settings, effective.fileExtensions, logger);
  } else {
    await processSingleFile(input, settings, logger);
  }
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, {
    colors: process.stderr.isTTY === true,
  });

  let error: SchemasmithError;
  if (isSchemasmithError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new (class extends SchemasmithError {})({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
