/**
 * Configuration file support for the schemasmith CLI.
 *
 * Files are JSON or YAML, keyed in camelCase. A missing file yields the
 * defaults; a present file is validated before it is merged over them.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { dump, load } from 'js-yaml';
import type { ErrorObject } from 'ajv';
import {
  ConfigError,
  createValidatorAjv,
  DEFAULT_TIER,
  TIERS,
  type Tier,
} from '@schemasmith/core';

export interface SchemasmithConfig {
  defaultTier: Tier;
  prettyOutput: boolean;
  validateSchema: boolean;
  outputDirectory?: string;
  /** Extensions (without the dot) picked up in batch mode. */
  fileExtensions: string[];
}

export const DEFAULT_CONFIG: Readonly<SchemasmithConfig> = Object.freeze({
  defaultTier: DEFAULT_TIER,
  prettyOutput: false,
  validateSchema: false,
  fileExtensions: ['json'],
});

export function defaultConfig(): SchemasmithConfig {
  return cloneConfig(DEFAULT_CONFIG);
}

export const DEFAULT_CONFIG_FILE = 'schemasmith.config.json';

export type ConfigFormat = 'json' | 'yaml';

type ConfigFile = Partial<SchemasmithConfig>;

const CONFIG_FILE_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    defaultTier: { type: 'string', enum: [...TIERS] },
    prettyOutput: { type: 'boolean' },
    validateSchema: { type: 'boolean' },
    outputDirectory: { type: 'string', minLength: 1 },
    fileExtensions: {
      type: 'array',
      minItems: 1,
      items: { type: 'string', minLength: 1 },
    },
  },
};

const validateConfigFile = createValidatorAjv().compile<ConfigFile>(
  CONFIG_FILE_SCHEMA
);

export function detectConfigFormat(file: string): ConfigFormat {
  const ext = extname(file).toLowerCase();
  switch (ext) {
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.json':
    case '':
      return 'json';
    case '.toml':
      throw new ConfigError({
        message: `TOML configuration files are not supported: ${file}`,
        context: {
          file,
          suggestion: 'Convert the file to JSON or YAML',
        },
      });
    default:
      throw new ConfigError({
        message: `Unrecognized configuration file extension "${ext}": ${file}`,
        context: {
          file,
          suggestion: 'Use a .json, .yaml or .yml configuration file',
        },
      });
  }
}

export async function loadConfig(file: string): Promise<SchemasmithConfig> {
  const format = detectConfigFormat(file);

  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    if (isNotFound(error)) return defaultConfig();
    throw new ConfigError({
      message: `Cannot read configuration file ${file}: ${errorMessage(error)}`,
      context: { file },
      cause: error instanceof Error ? error : undefined,
    });
  }

  return parseConfig(text, format, file);
}

/**
 * Parse and validate configuration text; `file` is only used in messages.
 */
export function parseConfig(
  text: string,
  format: ConfigFormat,
  file = DEFAULT_CONFIG_FILE
): SchemasmithConfig {
  let raw: unknown;
  try {
    raw = format === 'yaml' ? load(text) : JSON.parse(text);
  } catch (error) {
    throw new ConfigError({
      message: `Invalid ${format === 'yaml' ? 'YAML' : 'JSON'} in configuration file ${file}: ${errorMessage(error)}`,
      context: { file },
      cause: error instanceof Error ? error : undefined,
    });
  }

  // An empty YAML document loads as undefined
  const candidate = raw === undefined || raw === null ? {} : raw;
  if (!validateConfigFile(candidate)) {
    const issues = (validateConfigFile.errors ?? []).map(describeIssue);
    throw new ConfigError({
      message: `Invalid configuration file ${file}: ${issues.join('; ')}`,
      context: { file, path: validateConfigFile.errors?.[0]?.instancePath },
    });
  }

  return {
    ...defaultConfig(),
    ...candidate,
    fileExtensions: normalizeExtensions(
      candidate.fileExtensions ?? DEFAULT_CONFIG.fileExtensions
    ),
  };
}

export interface ConfigOverrides {
  tier?: Tier;
  pretty?: boolean;
  validate?: boolean;
}

/**
 * Command-line values win; the boolean switches can only turn a setting on.
 */
export function mergeWithArgs(
  config: SchemasmithConfig,
  overrides: ConfigOverrides
): SchemasmithConfig {
  return {
    ...config,
    fileExtensions: [...config.fileExtensions],
    defaultTier: overrides.tier ?? config.defaultTier,
    prettyOutput: config.prettyOutput || overrides.pretty === true,
    validateSchema: config.validateSchema || overrides.validate === true,
  };
}

export async function saveConfig(
  config: SchemasmithConfig,
  file: string
): Promise<void> {
  const format = detectConfigFormat(file);
  const text =
    format === 'yaml'
      ? dump(config, { skipInvalid: true })
      : `${JSON.stringify(config, null, 2)}\n`;
  try {
    await writeFile(file, text, 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Cannot write configuration file ${file}: ${errorMessage(error)}`,
      context: { file },
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function cloneConfig(config: Readonly<SchemasmithConfig>): SchemasmithConfig {
  return { ...config, fileExtensions: [...config.fileExtensions] };
}

function normalizeExtensions(extensions: readonly string[]): string[] {
  return extensions.map((ext) => ext.replace(/^\.+/, '').toLowerCase());
}

function describeIssue(issue: ErrorObject): string {
  const where = issue.instancePath || '/';
  if (issue.keyword === 'additionalProperties') {
    const extra = issue.params.additionalProperty;
    return `${where}: unknown setting "${String(extra)}"`;
  }
  return `${where}: ${issue.message ?? issue.keyword}`;
}

export function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
