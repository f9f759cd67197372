/**
 * Quality Gate Configuration
 *
 * Loads `config/quality-gate.yaml`, merges it over the defaults, applies
 * environment overrides and validates ranges.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ErrorCode } from '../errors/error-codes';
import { ConfigurationError, InputValidationError } from '../errors/gate-error';
import { DEFAULT_RUBRIC, type Rubric, type RubricCategory } from '../capabilities/types';
import { isLLMProvider, type LLMProvider } from '../llm/llm-client';
import type { GateLogger } from '../logging/gate-logger';
import {
  DEFAULT_TRANSPORT_RETRY_POLICY,
  type BackoffStrategy,
  type TransportRetryPolicy,
} from '../retry/transport-retry';
import { isRecord } from '../utils/type-guards';

// ============================================================================
// Types
// ============================================================================

export interface QualityGateConfig {
  /** Hard ceiling on REVISE transitions (>= 1) */
  maxIterations: number;
  /** Minimum overallScore to pass, 0-10 */
  passThreshold: number;
  /** Word-count floor; below it the document cannot pass */
  minWordCount: number;
  /** Unverified claims with 1 - confidence above this become issues */
  claimShortfallThreshold: number;
  /** Weight per rubric category for the overall score */
  rubricWeights: Record<string, number>;
  rubric: Rubric;
  transport: TransportRetryPolicy;
}

export interface LLMSettings {
  provider: LLMProvider;
  model?: string;
  temperature: number;
  maxTokens: number;
}

export interface LoadedConfig {
  gate: QualityGateConfig;
  llm: LLMSettings;
  /** Path the configuration was read from; undefined when defaults were used */
  source?: string;
}

// ============================================================================
// Defaults and Ranges
// ============================================================================

export const DEFAULT_RUBRIC_WEIGHTS: Record<string, number> = {
  seo: 0.3,
  eeat: 0.3,
  structure: 0.2,
  readability: 0.2,
};

export const DEFAULT_QUALITY_GATE_CONFIG: QualityGateConfig = {
  maxIterations: 3,
  passThreshold: 9.0,
  minWordCount: 1500,
  claimShortfallThreshold: 0.5,
  rubricWeights: DEFAULT_RUBRIC_WEIGHTS,
  rubric: DEFAULT_RUBRIC,
  transport: DEFAULT_TRANSPORT_RETRY_POLICY,
};

export const DEFAULT_LLM_SETTINGS: LLMSettings = {
  provider: 'openai',
  temperature: 0.3,
  maxTokens: 4096,
};

const RANGES = {
  maxIterations: { min: 1, max: 10 },
  passThreshold: { min: 0, max: 10 },
  claimShortfallThreshold: { min: 0, max: 1 },
  maxAttempts: { min: 1, max: 10 },
};

export const CONFIG_FILE_NAMES = ['quality-gate.yaml', 'quality-gate.yml'];

// ============================================================================
// Validation
// ============================================================================

function invalid(message: string, field: string): InputValidationError {
  return new InputValidationError(message, field, ErrorCode.E104_INVALID_GATE_OPTIONS);
}

function checkRange(value: number, field: string, range: { min: number; max: number }): void {
  if (!Number.isFinite(value) || value < range.min || value > range.max) {
    throw invalid(`${field} must be between ${range.min} and ${range.max} (got ${value})`, field);
  }
}

/**
 * Merge options over the defaults and validate the result
 *
 * @throws InputValidationError (E104) for out-of-range values
 */
export function resolveGateConfig(
  overrides: Partial<QualityGateConfig> = {},
  base: QualityGateConfig = DEFAULT_QUALITY_GATE_CONFIG
): QualityGateConfig {
  const config: QualityGateConfig = {
    ...base,
    ...overrides,
    rubricWeights: { ...(overrides.rubricWeights ?? base.rubricWeights) },
    transport: {
      ...base.transport,
      ...overrides.transport,
      backoff: { ...base.transport.backoff, ...overrides.transport?.backoff },
    },
  };

  checkRange(config.maxIterations, 'maxIterations', RANGES.maxIterations);
  if (!Number.isInteger(config.maxIterations)) {
    throw invalid(`maxIterations must be an integer (got ${config.maxIterations})`, 'maxIterations');
  }
  checkRange(config.passThreshold, 'passThreshold', RANGES.passThreshold);
  if (!Number.isInteger(config.minWordCount) || config.minWordCount < 0) {
    throw invalid(`minWordCount must be a non-negative integer (got ${config.minWordCount})`, 'minWordCount');
  }
  checkRange(config.claimShortfallThreshold, 'claimShortfallThreshold', RANGES.claimShortfallThreshold);

  for (const [category, weight] of Object.entries(config.rubricWeights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw invalid(`rubric weight for "${category}" must be a non-negative number`, 'rubricWeights');
    }
  }
  if (config.rubric.categories.length === 0) {
    throw invalid('rubric must name at least one category', 'rubric');
  }

  checkRange(config.transport.max_attempts, 'transport.max_attempts', RANGES.maxAttempts);
  if (config.transport.timeout_ms < 0 || config.transport.backoff.initial_delay_ms < 0) {
    throw invalid('transport delays and timeouts must be non-negative', 'transport');
  }

  return config;
}

// ============================================================================
// YAML Loading
// ============================================================================

function schemaError(message: string, file: string): ConfigurationError {
  return new ConfigurationError(ErrorCode.E102_CONFIG_SCHEMA_VALIDATION_FAILURE, `${message} (${file})`, { file });
}

function readNumber(section: Record<string, unknown>, key: string, file: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number') {
    throw schemaError(`${key} must be a number`, file);
  }
  return value;
}

function readSection(root: Record<string, unknown>, key: string, file: string): Record<string, unknown> {
  const value = root[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw schemaError(`${key} must be a mapping`, file);
  }
  return value;
}

function readWeights(section: Record<string, unknown>, file: string): Record<string, number> | undefined {
  const value = section.rubric_weights;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw schemaError('rubric_weights must be a mapping of category to weight', file);
  }
  const weights: Record<string, number> = {};
  for (const [category, weight] of Object.entries(value)) {
    if (typeof weight !== 'number') {
      throw schemaError(`rubric_weights.${category} must be a number`, file);
    }
    weights[category] = weight;
  }
  return weights;
}

function readRubric(section: Record<string, unknown>, file: string): Rubric | undefined {
  const value = section.rubric;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw schemaError('rubric must be a list of { name, description }', file);
  }
  const categories: RubricCategory[] = value.map((item: unknown, index: number) => {
    const name = isRecord(item) ? item.name : undefined;
    const description = isRecord(item) ? item.description : undefined;
    if (typeof name !== 'string') {
      throw schemaError(`rubric[${index}] must have a name`, file);
    }
    return {
      name,
      description: typeof description === 'string' ? description : name,
    };
  });
  return { categories };
}

function isBackoffType(value: unknown): value is BackoffStrategy['type'] {
  return value === 'exponential' || value === 'linear' || value === 'fixed';
}

function readTransport(section: Record<string, unknown>, file: string): TransportRetryPolicy | undefined {
  const value = section.transport;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw schemaError('transport must be a mapping', file);
  }

  const backoffSection = readSection(value, 'backoff', file);
  const backoffType = backoffSection.type;
  if (backoffType !== undefined && !isBackoffType(backoffType)) {
    throw schemaError('transport.backoff.type must be exponential, linear or fixed', file);
  }

  const defaults = DEFAULT_TRANSPORT_RETRY_POLICY;
  const backoff: BackoffStrategy = {
    type: isBackoffType(backoffType) ? backoffType : defaults.backoff.type,
    initial_delay_ms: readNumber(backoffSection, 'initial_delay_ms', file) ?? defaults.backoff.initial_delay_ms,
    max_delay_ms: readNumber(backoffSection, 'max_delay_ms', file) ?? defaults.backoff.max_delay_ms,
    multiplier: readNumber(backoffSection, 'multiplier', file) ?? defaults.backoff.multiplier,
    jitter: readNumber(backoffSection, 'jitter', file) ?? defaults.backoff.jitter,
  };

  return {
    max_attempts: readNumber(value, 'max_attempts', file) ?? defaults.max_attempts,
    timeout_ms: readNumber(value, 'timeout_ms', file) ?? defaults.timeout_ms,
    backoff,
  };
}

function readLLMSettings(root: Record<string, unknown>, file: string): LLMSettings {
  const section = readSection(root, 'llm', file);
  const provider = section.provider ?? DEFAULT_LLM_SETTINGS.provider;
  if (!isLLMProvider(provider)) {
    throw schemaError(`llm.provider must be openai or anthropic (got ${String(provider)})`, file);
  }
  const model = section.model;
  if (model !== undefined && typeof model !== 'string') {
    throw schemaError('llm.model must be a string', file);
  }
  return {
    provider,
    model: typeof model === 'string' ? model : undefined,
    temperature: readNumber(section, 'temperature', file) ?? DEFAULT_LLM_SETTINGS.temperature,
    maxTokens: readNumber(section, 'max_tokens', file) ?? DEFAULT_LLM_SETTINGS.maxTokens,
  };
}

/**
 * Parse YAML text into a LoadedConfig (without environment overrides)
 *
 * @throws ConfigurationError for invalid YAML or schema violations
 */
export function parseGateConfig(content: string, file: string = '<inline>'): LoadedConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(
      ErrorCode.E102_CONFIG_SCHEMA_VALIDATION_FAILURE,
      `invalid YAML in ${file}: ${error instanceof Error ? error.message : String(error)}`,
      { file }
    );
  }

  const root = parsed === undefined || parsed === null ? {} : parsed;
  if (!isRecord(root)) {
    throw schemaError('configuration root must be a mapping', file);
  }

  const section = readSection(root, 'quality_gate', file);
  const overrides: Partial<QualityGateConfig> = {};

  const maxIterations = readNumber(section, 'max_iterations', file);
  if (maxIterations !== undefined) overrides.maxIterations = maxIterations;
  const passThreshold = readNumber(section, 'pass_threshold', file);
  if (passThreshold !== undefined) overrides.passThreshold = passThreshold;
  const minWordCount = readNumber(section, 'min_word_count', file);
  if (minWordCount !== undefined) overrides.minWordCount = minWordCount;
  const shortfall = readNumber(section, 'claim_shortfall_threshold', file);
  if (shortfall !== undefined) overrides.claimShortfallThreshold = shortfall;
  const weights = readWeights(section, file);
  if (weights !== undefined) overrides.rubricWeights = weights;
  const rubric = readRubric(section, file);
  if (rubric !== undefined) overrides.rubric = rubric;
  const transport = readTransport(section, file);
  if (transport !== undefined) overrides.transport = transport;

  let gate: QualityGateConfig;
  try {
    gate = resolveGateConfig(overrides);
  } catch (error) {
    if (error instanceof InputValidationError) {
      throw schemaError(error.context ?? error.message, file);
    }
    throw error;
  }

  return { gate, llm: readLLMSettings(root, file) };
}

/**
 * Apply QUALITY_GATE_* environment overrides
 */
export function applyEnvOverrides(config: QualityGateConfig, env: NodeJS.ProcessEnv = process.env): QualityGateConfig {
  const overrides: Partial<QualityGateConfig> = {};
  const numeric = (name: string): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
      return undefined;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(
        ErrorCode.E102_CONFIG_SCHEMA_VALIDATION_FAILURE,
        `${name} must be numeric (got "${raw}")`
      );
    }
    return value;
  };

  const maxIterations = numeric('QUALITY_GATE_MAX_ITERATIONS');
  if (maxIterations !== undefined) overrides.maxIterations = maxIterations;
  const passThreshold = numeric('QUALITY_GATE_PASS_THRESHOLD');
  if (passThreshold !== undefined) overrides.passThreshold = passThreshold;
  const minWordCount = numeric('QUALITY_GATE_MIN_WORD_COUNT');
  if (minWordCount !== undefined) overrides.minWordCount = minWordCount;

  return resolveGateConfig(overrides, config);
}

/**
 * Load configuration from an explicit path, or search `config/` in cwd.
 * A missing file yields the defaults; an explicit path that does not exist
 * is an error.
 *
 * @throws ConfigurationError
 */
export function loadGateConfig(
  configPath?: string,
  options: { cwd?: string; env?: NodeJS.ProcessEnv; logger?: GateLogger } = {}
): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let file: string | undefined;
  if (configPath) {
    file = path.resolve(cwd, configPath);
    if (!fs.existsSync(file)) {
      throw new ConfigurationError(ErrorCode.E101_CONFIG_FILE_UNREADABLE, `not found: ${file}`, { file });
    }
  } else {
    file = CONFIG_FILE_NAMES
      .map(name => path.join(cwd, 'config', name))
      .find(candidate => fs.existsSync(candidate));
  }

  if (!file) {
    options.logger?.warn('CONFIG', 'Config file not found, using defaults');
    return {
      gate: applyEnvOverrides(DEFAULT_QUALITY_GATE_CONFIG, env),
      llm: DEFAULT_LLM_SETTINGS,
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      ErrorCode.E101_CONFIG_FILE_UNREADABLE,
      `${file}: ${error instanceof Error ? error.message : String(error)}`,
      { file }
    );
  }

  options.logger?.info('CONFIG', `Loading config from: ${file}`);
  const loaded = parseGateConfig(content, file);
  return {
    gate: applyEnvOverrides(loaded.gate, env),
    llm: loaded.llm,
    source: file,
  };
}
