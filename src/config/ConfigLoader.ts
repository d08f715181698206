import fs from 'fs/promises';
import path from 'path';
import * as dotenv from 'dotenv';
import { getLoggerFor } from 'global-logger-factory';
import type { DocumentPipelineOptions } from '../pipeline/DocumentPipeline';
import { ConfigurationError, errorMessage } from '../util/errors';
import { SchemaAssert } from '../util/SchemaAssert';

export interface GuardConfig {
  maxChunkChars: number;
  concurrency: number;
  maxTransformAttempts: number;
  /** Above this many placeholders a chunk is re-protected without inline code. */
  inlineCodeLimit: number;
  glossaryMaxTerms: number;
  glossaryMaxChars: number;
  logLevel: string;
  logFile?: string;
  showLocation: boolean;
}

export interface LoadConfigOptions {
  /** JSON file with camelCase keys. */
  configPath?: string;
  /** Dotenv file; parsed only, never copied into `process.env`. */
  envPath?: string;
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
}

export const DEFAULT_CONFIG: GuardConfig = {
  maxChunkChars: 8000,
  concurrency: 3,
  maxTransformAttempts: 3,
  inlineCodeLimit: 30,
  glossaryMaxTerms: 30,
  glossaryMaxChars: 2000,
  logLevel: 'info',
  showLocation: false,
};

const LOG_LEVELS = new Set([ 'error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly' ]);

type IntegerKey =
  | 'maxChunkChars'
  | 'concurrency'
  | 'maxTransformAttempts'
  | 'inlineCodeLimit'
  | 'glossaryMaxTerms'
  | 'glossaryMaxChars';

// Config key and the environment variable that overrides it
const INTEGER_KEYS: readonly [IntegerKey, string][] = [
  [ 'maxChunkChars', 'MDGUARD_MAX_CHUNK_CHARS' ],
  [ 'concurrency', 'MDGUARD_CONCURRENCY' ],
  [ 'maxTransformAttempts', 'MDGUARD_MAX_TRANSFORM_ATTEMPTS' ],
  [ 'inlineCodeLimit', 'MDGUARD_INLINE_CODE_LIMIT' ],
  [ 'glossaryMaxTerms', 'MDGUARD_GLOSSARY_MAX_TERMS' ],
  [ 'glossaryMaxChars', 'MDGUARD_GLOSSARY_MAX_CHARS' ],
];

const assert = new SchemaAssert((message): Error => new ConfigurationError(message));
const logger = getLoggerFor('ConfigLoader');

/**
 * Merges, from lowest to highest precedence: defaults, the JSON config file, the
 * dotenv file and the environment.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<GuardConfig> {
  const config: GuardConfig = { ...DEFAULT_CONFIG };

  if (options.configPath) {
    const configPath = path.resolve(process.cwd(), options.configPath);
    applyFileConfig(config, parseJson(await readFile(configPath), configPath));
    logger.debug(`Loaded config from ${configPath}`);
  }

  if (options.envPath) {
    const envPath = path.resolve(process.cwd(), options.envPath);
    applyEnv(config, dotenv.parse(await readFile(envPath)));
    logger.debug(`Loaded env file ${envPath}`);
  }

  applyEnv(config, options.env ?? process.env);
  return validate(config);
}

/**
 * The pipeline settings of a loaded config. Logging settings go to `initLogging`.
 */
export function toPipelineOptions(config: GuardConfig): DocumentPipelineOptions {
  return {
    maxChunkChars: config.maxChunkChars,
    concurrency: config.concurrency,
    maxAttempts: config.maxTransformAttempts,
    inlineCodeLimit: config.inlineCodeLimit,
    glossaryMaxTerms: config.glossaryMaxTerms,
    glossaryMaxChars: config.glossaryMaxChars,
  };
}

async function readFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigurationError(`cannot read ${filePath}: ${errorMessage(error)}`);
  }
}

function parseJson(content: string, filePath: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigurationError(`invalid JSON in ${filePath}: ${errorMessage(error)}`);
  }
}

function applyFileConfig(config: GuardConfig, value: unknown): void {
  const source = assert.record(value, 'config');
  for (const [ key ] of INTEGER_KEYS) {
    if (source[key] !== undefined) {
      config[key] = assert.integer(source[key], `config.${key}`);
    }
  }
  if (source.logLevel !== undefined) {
    config.logLevel = assert.string(source.logLevel, 'config.logLevel');
  }
  if (source.logFile !== undefined) {
    config.logFile = assert.string(source.logFile, 'config.logFile');
  }
  if (source.showLocation !== undefined) {
    config.showLocation = assert.boolean(source.showLocation, 'config.showLocation');
  }
}

function applyEnv(config: GuardConfig, env: Record<string, string | undefined>): void {
  for (const [ key, name ] of INTEGER_KEYS) {
    const raw = env[name];
    if (raw?.trim()) {
      config[key] = assert.integerString(raw, name);
    }
  }
  const logLevel = env.MDGUARD_LOG_LEVEL?.trim();
  if (logLevel) {
    config.logLevel = logLevel;
  }
  const logFile = env.MDGUARD_LOG_FILE?.trim();
  if (logFile) {
    config.logFile = logFile;
  }
}

function validate(config: GuardConfig): GuardConfig {
  for (const [ key ] of INTEGER_KEYS) {
    if (config[key] <= 0) {
      throw ConfigurationError.nonPositive(key, config[key]);
    }
  }
  if (!LOG_LEVELS.has(config.logLevel)) {
    throw new ConfigurationError(`logLevel must be one of ${[ ...LOG_LEVELS ].join(', ')}, got "${config.logLevel}"`);
  }
  return config;
}
