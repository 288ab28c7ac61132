/**
 * @fileoverview Pipeline configuration
 *
 * Resolution order, later wins:
 * 1. Built-in defaults ({@link DEFAULT_CONFIG})
 * 2. Optional YAML file (`DOCQA_CONFIG` or an explicit path)
 * 3. `DOCQA_*` environment variables
 *
 * The merged object is validated with zod; the first invalid key is reported
 * as a {@link ConfigurationError}.
 */

import * as fs from 'node:fs';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// SCHEMA
// ============================================================================

const retrievalSchema = z.object({
  /** Weight of the semantic score; lexical gets 1 - alpha */
  alpha: z.number().min(0).max(1),
  topK: z.number().int().positive(),
  /** Per-document cap for the diversity pass; defaults to ceil(topK/2)+1 */
  maxPerDocument: z.number().int().positive().optional(),
  bm25: z.object({
    k1: z.number().nonnegative(),
    b: z.number().min(0).max(1),
  }),
});

const reasoningSchema = z.object({
  /** Conversation exchanges (user + assistant pairs) included for follow-ups */
  historyTurns: z.number().int().nonnegative(),
  snippetLength: z.number().int().positive(),
});

const utilitySchema = z.object({
  summarySentences: z.number().int().positive(),
});

const timeoutsSchema = z.object({
  embeddingMs: z.number().int().nonnegative(),
  completionMs: z.number().int().nonnegative(),
});

const providerSchema = z.object({
  baseUrl: z.string().url(),
  apiKey: z.string().min(1).optional(),
  chatModel: z.string().min(1),
  embeddingModel: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive(),
});

const loggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

export const pipelineConfigSchema = z.object({
  retrieval: retrievalSchema,
  reasoning: reasoningSchema,
  utility: utilitySchema,
  timeouts: timeoutsSchema,
  provider: providerSchema,
  logging: loggingSchema,
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type RetrievalConfig = PipelineConfig['retrieval'];
export type ReasoningConfig = PipelineConfig['reasoning'];
export type UtilityConfig = PipelineConfig['utility'];
export type TimeoutConfig = PipelineConfig['timeouts'];
export type ProviderSettings = PipelineConfig['provider'];

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_CONFIG: PipelineConfig = {
  retrieval: {
    alpha: 0.7,
    topK: 5,
    bm25: { k1: 1.5, b: 0.75 },
  },
  reasoning: {
    historyTurns: 2,
    snippetLength: 200,
  },
  utility: {
    summarySentences: 5,
  },
  timeouts: {
    embeddingMs: 15_000,
    completionMs: 60_000,
  },
  provider: {
    baseUrl: 'https://api.openai.com/v1',
    chatModel: 'gpt-4o-mini',
    embeddingModel: 'text-embedding-3-small',
    temperature: 0.3,
    maxTokens: 1024,
  },
  logging: {
    level: 'info',
  },
};

// ============================================================================
// ENVIRONMENT
// ============================================================================

type Env = Record<string, string | undefined>;

type EnvBinding = {
  variable: string;
  path: readonly [keyof PipelineConfig, string];
  kind: 'number' | 'string';
};

const ENV_BINDINGS: readonly EnvBinding[] = [
  { variable: 'DOCQA_ALPHA', path: ['retrieval', 'alpha'], kind: 'number' },
  { variable: 'DOCQA_TOP_K', path: ['retrieval', 'topK'], kind: 'number' },
  { variable: 'DOCQA_MAX_PER_DOCUMENT', path: ['retrieval', 'maxPerDocument'], kind: 'number' },
  { variable: 'DOCQA_HISTORY_TURNS', path: ['reasoning', 'historyTurns'], kind: 'number' },
  { variable: 'DOCQA_SNIPPET_LENGTH', path: ['reasoning', 'snippetLength'], kind: 'number' },
  { variable: 'DOCQA_SUMMARY_SENTENCES', path: ['utility', 'summarySentences'], kind: 'number' },
  { variable: 'DOCQA_EMBEDDING_TIMEOUT_MS', path: ['timeouts', 'embeddingMs'], kind: 'number' },
  { variable: 'DOCQA_COMPLETION_TIMEOUT_MS', path: ['timeouts', 'completionMs'], kind: 'number' },
  { variable: 'DOCQA_BASE_URL', path: ['provider', 'baseUrl'], kind: 'string' },
  { variable: 'DOCQA_API_KEY', path: ['provider', 'apiKey'], kind: 'string' },
  { variable: 'DOCQA_CHAT_MODEL', path: ['provider', 'chatModel'], kind: 'string' },
  { variable: 'DOCQA_EMBEDDING_MODEL', path: ['provider', 'embeddingModel'], kind: 'string' },
  { variable: 'DOCQA_TEMPERATURE', path: ['provider', 'temperature'], kind: 'number' },
  { variable: 'DOCQA_MAX_TOKENS', path: ['provider', 'maxTokens'], kind: 'number' },
  { variable: 'DOCQA_LOG_LEVEL', path: ['logging', 'level'], kind: 'string' },
];

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readEnvOverrides(env: Env): PlainObject {
  const overrides: PlainObject = {};
  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.variable]?.trim();
    if (!raw) continue;
    let value: unknown = raw;
    if (binding.kind === 'number') {
      value = Number(raw);
      if (Number.isNaN(value)) {
        throw new ConfigurationError(binding.variable, `expected a number, got "${raw}"`);
      }
    }
    const [section, key] = binding.path;
    const existing = overrides[section];
    const target: PlainObject = isPlainObject(existing) ? existing : {};
    target[key] = value;
    overrides[section] = target;
  }
  return overrides;
}

// ============================================================================
// FILE
// ============================================================================

function readConfigFile(configPath: string): PlainObject {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(configPath, `cannot read config file: ${getErrorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigurationError(configPath, `invalid YAML: ${getErrorMessage(error)}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(configPath, 'top level must be a mapping');
  }
  return parsed;
}

// ============================================================================
// MERGE & VALIDATE
// ============================================================================

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

/**
 * Validate a (possibly partial) config object layered over the defaults.
 */
export function resolveConfig(overrides: unknown = {}): PipelineConfig {
  if (!isPlainObject(overrides)) {
    throw new ConfigurationError('config', 'expected an object');
  }
  const merged = deepMerge({ ...DEFAULT_CONFIG }, overrides);
  const parsed = pipelineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigurationError(key, issue?.message ?? 'invalid value');
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  /** YAML file; falls back to env.DOCQA_CONFIG */
  configPath?: string;
  env?: Env;
}

export function loadConfig(options: LoadConfigOptions = {}): PipelineConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.DOCQA_CONFIG?.trim();
  const fromFile = configPath ? readConfigFile(configPath) : {};
  const fromEnv = readEnvOverrides(env);
  return resolveConfig(deepMerge(fromFile, fromEnv));
}
