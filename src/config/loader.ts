/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. Explicit overrides (CLI flags)
 * 2. Environment variables (RECOMMENDER_*)
 * 3. Project config file (./recommender.config.json)
 * 4. User config file (~/.assessment-recommender/config.json)
 * 5. Built-in defaults
 *
 * The result is a plain RecommenderConfig value that callers hand to each
 * component constructor.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  resolvePath,
  type EncryptionSettings,
  type EmbeddingSettings,
  type EvaluationSettings,
  type GenerationSettings,
  type RecommenderConfig,
  type RetrievalSettings,
  type ServerSettings,
  type StorageSettings,
} from './recommender-config.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

export const PROJECT_CONFIG_FILE = 'recommender.config.json';
export const USER_CONFIG_PATH = '~/.assessment-recommender/config.json';

/** External config file structure: every field optional. */
export interface ExternalConfig {
  embedding?: Partial<EmbeddingSettings>;
  storage?: Partial<Omit<StorageSettings, 'encryption'>> & {
    encryption?: Partial<EncryptionSettings>;
  };
  retrieval?: Partial<RetrievalSettings>;
  generation?: Partial<GenerationSettings>;
  evaluation?: Partial<EvaluationSettings>;
  server?: Partial<ServerSettings>;
}

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(section: Section, key: string): string | undefined {
  const value = section[key];
  return typeof value === 'string' ? value : undefined;
}

function pickNumber(section: Section, key: string): number | undefined {
  const value = section[key];
  return typeof value === 'number' ? value : undefined;
}

function pickBoolean(section: Section, key: string): boolean | undefined {
  const value = section[key];
  return typeof value === 'boolean' ? value : undefined;
}

function pickNumberArray(section: Section, key: string): number[] | undefined {
  const value = section[key];
  if (!Array.isArray(value)) return undefined;
  const numbers = value.filter((v): v is number => typeof v === 'number');
  return numbers.length === value.length ? numbers : undefined;
}

function pickCipher(section: Section): EncryptionSettings['cipher'] | undefined {
  const value = section.cipher;
  return value === 'chacha20' || value === 'sqlcipher' ? value : undefined;
}

/** Drop undefined entries so spreading a layer never erases a lower one. */
function compact<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value) as (keyof T)[]) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

/**
 * Read the known fields out of parsed JSON. Unknown keys and wrongly typed
 * values are ignored.
 */
export function parseExternalConfig(raw: unknown): ExternalConfig {
  if (!isSection(raw)) return {};
  const config: ExternalConfig = {};

  if (isSection(raw.embedding)) {
    config.embedding = compact({
      modelId: pickString(raw.embedding, 'modelId'),
      batchSize: pickNumber(raw.embedding, 'batchSize'),
      maxRetries: pickNumber(raw.embedding, 'maxRetries'),
    });
  }

  if (isSection(raw.storage)) {
    const encryption = raw.storage.encryption;
    config.storage = compact({
      dbPath: pickString(raw.storage, 'dbPath'),
      collection: pickString(raw.storage, 'collection'),
      encryption: isSection(encryption)
        ? compact({ enabled: pickBoolean(encryption, 'enabled'), cipher: pickCipher(encryption) })
        : undefined,
    });
  }

  if (isSection(raw.retrieval)) {
    config.retrieval = compact({ topK: pickNumber(raw.retrieval, 'topK') });
  }

  if (isSection(raw.generation)) {
    const g = raw.generation;
    config.generation = compact({
      enabled: pickBoolean(g, 'enabled'),
      model: pickString(g, 'model'),
      maxTokens: pickNumber(g, 'maxTokens'),
      temperature: pickNumber(g, 'temperature'),
      timeoutMs: pickNumber(g, 'timeoutMs'),
      rateLimitPerMin: pickNumber(g, 'rateLimitPerMin'),
      systemPrompt: pickString(g, 'systemPrompt'),
    });
  }

  if (isSection(raw.evaluation)) {
    const e = raw.evaluation;
    config.evaluation = compact({
      kValues: pickNumberArray(e, 'kValues'),
      concurrency: pickNumber(e, 'concurrency'),
      predictionDepth: pickNumber(e, 'predictionDepth'),
      outputDir: pickString(e, 'outputDir'),
    });
  }

  if (isSection(raw.server)) {
    config.server = compact({ port: pickNumber(raw.server, 'port') });
  }

  return config;
}

/**
 * Load config from a JSON file. Missing files yield null; malformed files are
 * logged and skipped.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
    return parseExternalConfig(parsed);
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error: errorMessage(error) });
    return null;
  }
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

function envFloat(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = parseFloat(raw);
  return Number.isNaN(value) ? undefined : value;
}

function envBool(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return raw === 'true' || raw === '1';
}

function envString(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Load config from environment variables.
 * Examples:
 *   RECOMMENDER_EMBEDDING_MODEL=openai-3-large
 *   RECOMMENDER_RETRIEVAL_TOP_K=5
 *   RECOMMENDER_EVALUATION_K_VALUES=1,5,10
 */
export function loadEnvConfig(): ExternalConfig {
  const cipher = envString('RECOMMENDER_ENCRYPTION_CIPHER');
  const kValues = envString('RECOMMENDER_EVALUATION_K_VALUES')
    ?.split(',')
    .map((k) => parseInt(k.trim(), 10));

  return {
    embedding: compact({
      modelId: envString('RECOMMENDER_EMBEDDING_MODEL'),
      batchSize: envInt('RECOMMENDER_EMBEDDING_BATCH_SIZE'),
      maxRetries: envInt('RECOMMENDER_EMBEDDING_MAX_RETRIES'),
    }),
    storage: compact({
      dbPath: envString('RECOMMENDER_STORAGE_DB_PATH'),
      collection: envString('RECOMMENDER_STORAGE_COLLECTION'),
      encryption: compact({
        enabled: envBool('RECOMMENDER_ENCRYPTION_ENABLED'),
        cipher: cipher === 'chacha20' || cipher === 'sqlcipher' ? cipher : undefined,
      }),
    }),
    retrieval: compact({ topK: envInt('RECOMMENDER_RETRIEVAL_TOP_K') }),
    generation: compact({
      enabled: envBool('RECOMMENDER_GENERATION_ENABLED'),
      model: envString('RECOMMENDER_GENERATION_MODEL'),
      maxTokens: envInt('RECOMMENDER_GENERATION_MAX_TOKENS'),
      temperature: envFloat('RECOMMENDER_GENERATION_TEMPERATURE'),
      timeoutMs: envInt('RECOMMENDER_GENERATION_TIMEOUT_MS'),
    }),
    evaluation: compact({
      kValues,
      concurrency: envInt('RECOMMENDER_EVALUATION_CONCURRENCY'),
      predictionDepth: envInt('RECOMMENDER_EVALUATION_PREDICTION_DEPTH'),
      outputDir: envString('RECOMMENDER_EVALUATION_OUTPUT_DIR'),
    }),
    server: compact({ port: envInt('RECOMMENDER_SERVER_PORT') }),
  };
}

/**
 * Merge one layer onto a complete config. Sections merge field by field;
 * arrays replace.
 */
export function mergeConfig(base: RecommenderConfig, layer: ExternalConfig): RecommenderConfig {
  return {
    embedding: { ...base.embedding, ...compact(layer.embedding ?? {}) },
    storage: {
      ...base.storage,
      ...compact({ dbPath: layer.storage?.dbPath, collection: layer.storage?.collection }),
      encryption: { ...base.storage.encryption, ...compact(layer.storage?.encryption ?? {}) },
    },
    retrieval: { ...base.retrieval, ...compact(layer.retrieval ?? {}) },
    generation: { ...base.generation, ...compact(layer.generation ?? {}) },
    evaluation: { ...base.evaluation, ...compact(layer.evaluation ?? {}) },
    server: { ...base.server, ...compact(layer.server ?? {}) },
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate a resolved config. Returns one message per problem.
 */
export function validateConfig(config: RecommenderConfig): string[] {
  const errors: string[] = [];

  if (!isPositiveInteger(config.embedding.batchSize)) {
    errors.push('embedding.batchSize must be a positive integer');
  }
  if (!Number.isInteger(config.embedding.maxRetries) || config.embedding.maxRetries < 0) {
    errors.push('embedding.maxRetries must be a non-negative integer');
  }
  if (config.storage.collection.trim() === '') {
    errors.push('storage.collection must not be empty');
  }
  if (!isPositiveInteger(config.retrieval.topK)) {
    errors.push('retrieval.topK must be a positive integer');
  }
  if (config.generation.temperature < 0 || config.generation.temperature > 1) {
    errors.push('generation.temperature must be between 0 and 1 (inclusive)');
  }
  if (!isPositiveInteger(config.generation.maxTokens)) {
    errors.push('generation.maxTokens must be a positive integer');
  }
  if (!isPositiveInteger(config.generation.timeoutMs)) {
    errors.push('generation.timeoutMs must be a positive integer');
  }
  if (!(config.generation.rateLimitPerMin > 0)) {
    errors.push('generation.rateLimitPerMin must be greater than 0');
  }
  if (config.evaluation.kValues.length === 0 || !config.evaluation.kValues.every(isPositiveInteger)) {
    errors.push('evaluation.kValues must be a non-empty list of positive integers');
  }
  if (!isPositiveInteger(config.evaluation.concurrency)) {
    errors.push('evaluation.concurrency must be a positive integer');
  }
  if (!isPositiveInteger(config.evaluation.predictionDepth)) {
    errors.push('evaluation.predictionDepth must be a positive integer');
  } else {
    const maxK = Math.max(...config.evaluation.kValues);
    if (config.evaluation.predictionDepth < maxK) {
      errors.push(
        `evaluation.predictionDepth (${config.evaluation.predictionDepth}) must be at least the largest K (${maxK})`,
      );
    }
  }
  if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
    errors.push('server.port must be an integer between 0 and 65535');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** Explicit overrides (highest priority) */
  overrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
  /** Return the merged config even if it fails validation */
  skipValidation?: boolean;
}

/**
 * Load configuration with priority-based resolution.
 *
 * @throws ConfigurationError `CONFIG_INVALID` when validation fails
 */
export function loadConfig(options: LoadConfigOptions = {}): RecommenderConfig {
  let config = mergeConfig(DEFAULT_CONFIG, {});

  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? USER_CONFIG_PATH);
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  if (!options.skipProjectConfig) {
    const projectConfig = loadConfigFile(
      options.projectConfigPath ?? join(process.cwd(), PROJECT_CONFIG_FILE),
    );
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig());
  }

  if (options.overrides) {
    config = mergeConfig(config, options.overrides);
  }

  if (!options.skipValidation) {
    const errors = validateConfig(config);
    if (errors.length > 0) {
      throw new ConfigurationError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
    }
  }

  return config;
}
