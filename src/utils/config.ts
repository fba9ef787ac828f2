/**
 * Configuration loader using cosmiconfig and zod
 */

import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_COMPLETION_LIMITS } from '../llm/types.js';
import { DEFAULT_ANTHROPIC_MODEL, DEFAULT_OPENAI_MODEL } from '../llm/client.js';
import { DEFAULT_ORCHESTRATOR_CONFIG } from '../agent/types.js';
import { DEFAULT_MAX_HISTORY } from '../agent/session-store.js';
import { ConfigError } from '../errors/types.js';
import { isRecord } from './json.js';

/**
 * LLM config schema
 */
const LLMConfigSchema = z.object({
  provider: z.enum(['anthropic', 'openai']).default('anthropic'),
  model: z.string().default(DEFAULT_ANTHROPIC_MODEL),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  temperature: z.number().min(0).max(2).default(DEFAULT_COMPLETION_LIMITS.temperature),
  maxTokens: z.number().int().positive().default(DEFAULT_COMPLETION_LIMITS.maxTokens),
  timeout: z.number().int().positive().default(DEFAULT_COMPLETION_LIMITS.timeout),
});

/**
 * Tool round budget
 */
const OrchestratorConfigSchema = z.object({
  maxRounds: z.number().int().min(1).max(5).default(DEFAULT_ORCHESTRATOR_CONFIG.maxRounds),
});

const RetrievalConfigSchema = z.object({
  catalogPath: z.string().optional(),
  maxResults: z.number().int().positive().default(5),
});

/**
 * Full config schema
 */
const ConfigSchema = z.object({
  llm: LLMConfigSchema.default({}),
  orchestrator: OrchestratorConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
  session: z.object({
    maxHistory: z.number().int().min(0).default(DEFAULT_MAX_HISTORY),
  }).default({}),
  tools: z.object({
    enabledTools: z.array(z.string()).optional(),
    disabledTools: z.array(z.string()).optional(),
  }).default({}),
  log: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
    pretty: z.boolean().default(true),
    file: z.string().optional(),
  }).default({}),
});

export type LecternConfig = z.infer<typeof ConfigSchema>;

/**
 * Load configuration from file and environment
 */
export async function loadConfig(configPath?: string): Promise<LecternConfig> {
  const explorer = cosmiconfig('lectern', {
    searchPlaces: [
      'lectern.config.json',
      'lectern.config.yaml',
      'lectern.config.yml',
      'lectern.config.js',
      'lectern.config.mjs',
      '.lecternrc',
      '.lecternrc.json',
      '.lecternrc.yaml',
      '.lecternrc.yml',
    ],
  });

  const result = configPath ? await explorer.load(configPath) : await explorer.search();
  const fileConfig: unknown = result?.config ?? {};
  if (!isRecord(fileConfig)) {
    throw new ConfigError('Invalid configuration: expected an object at the top level');
  }

  return parseConfig(mergeConfigs(fileConfig, getEnvConfig()));
}

/**
 * Validate a raw config object
 */
export function parseConfig(raw: Record<string, unknown>): LecternConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const messages = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid configuration:\n${messages.join('\n')}`);
  }
  return parsed.data;
}

/**
 * Get configuration from environment variables
 */
function getEnvConfig(): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (process.env.ANTHROPIC_API_KEY) {
    config.llm = {
      provider: 'anthropic',
      apiKey: process.env.ANTHROPIC_API_KEY,
      model: process.env.ANTHROPIC_MODEL ?? DEFAULT_ANTHROPIC_MODEL,
      baseUrl: process.env.ANTHROPIC_BASE_URL,
    };
  } else if (process.env.OPENAI_API_KEY) {
    config.llm = {
      provider: 'openai',
      apiKey: process.env.OPENAI_API_KEY,
      model: process.env.OPENAI_MODEL ?? DEFAULT_OPENAI_MODEL,
      baseUrl: process.env.OPENAI_BASE_URL,
    };
  }

  if (process.env.LECTERN_CATALOG) {
    config.retrieval = { catalogPath: process.env.LECTERN_CATALOG };
  }

  if (process.env.LECTERN_LOG_LEVEL) {
    config.log = { level: process.env.LECTERN_LOG_LEVEL };
  }

  return config;
}

/**
 * Deep merge two config objects; undefined values in the override are skipped
 */
export function mergeConfigs(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const current = result[key];
    result[key] = isRecord(value) && isRecord(current) ? mergeConfigs(current, value) : value;
  }

  return result;
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): LecternConfig {
  return ConfigSchema.parse({});
}
