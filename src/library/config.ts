import { z } from 'zod';
import { LLMProviders } from '../types.js';
import {
  DEFAULT_BACKOFF_MULTIPLIER,
  DEFAULT_CONTEXT_SIZE_TOKENS,
  DEFAULT_INITIAL_DELAY_MS,
  DEFAULT_LOG_DIR,
  DEFAULT_MAX_COST,
  DEFAULT_MAX_OPTIMIZATION_LOOPS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_OPTIMIZATION_THRESHOLD,
  PROVIDER_SPECS,
} from './constants.js';
import { ConfigurationError } from './errors.js';

const retrySchema = z.object({
  maxRetries: z.number().int().min(0).default(DEFAULT_MAX_RETRIES),
  initialDelayMs: z.number().min(0).default(DEFAULT_INITIAL_DELAY_MS),
  backoffMultiplier: z.number().min(1).default(DEFAULT_BACKOFF_MULTIPLIER),
});

const configSchema = z.object({
  provider: z.nativeEnum(LLMProviders).default(LLMProviders.openai_gpt4o),
  apiKey: z.string().optional(),
  thinking: z.boolean().default(false),
  contextSizeTokens: z.number().int().positive().default(DEFAULT_CONTEXT_SIZE_TOKENS),
  maxCost: z.number().positive().default(DEFAULT_MAX_COST),
  outputDir: z.string().min(1).default(DEFAULT_LOG_DIR),
  optimizationThreshold: z.number().min(0).max(1).default(DEFAULT_OPTIMIZATION_THRESHOLD),
  maxOptimizationLoops: z.number().int().positive().default(DEFAULT_MAX_OPTIMIZATION_LOOPS),
  logLevel: z.enum(['silent', 'info']).default('info'),
  retry: retrySchema.default({}),
});

/**
 * Settings for one process. Built once at start-up and handed to the
 * components that need it.
 */
export type RefineryConfig = z.infer<typeof configSchema>;
export type RefineryConfigInput = z.input<typeof configSchema>;

export type Env = Record<string, string | undefined>;

function numberFromEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function providerFromEnv(env: Env): LLMProviders | undefined {
  const raw = env.PROMPT_LEARNING_PROVIDER;
  if (raw === undefined || raw === '') return undefined;
  const provider = Object.values(LLMProviders).find((p) => p === raw);
  if (!provider) {
    throw new ConfigurationError(
      `PROMPT_LEARNING_PROVIDER must be one of ${Object.values(LLMProviders).join(', ')}, got "${raw}"`
    );
  }
  return provider;
}

/**
 * Build a config from environment variables, with explicit overrides taking
 * precedence. The API key is read from the provider's own variable.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: RefineryConfigInput = {}
): RefineryConfig {
  const fromEnv: RefineryConfigInput = {
    provider: providerFromEnv(env),
    contextSizeTokens: numberFromEnv(env, 'PROMPT_LEARNING_CONTEXT_SIZE'),
    maxCost: numberFromEnv(env, 'PROMPT_LEARNING_BUDGET_LIMIT'),
    optimizationThreshold: numberFromEnv(env, 'PROMPT_LEARNING_OPTIMIZATION_THRESHOLD'),
    outputDir: env.PROMPT_LEARNING_OUTPUT_DIR || undefined,
  };

  // zod defaults apply to undefined, so unset variables fall through
  const parsed = configSchema.safeParse({ ...fromEnv, ...overrides });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`, {
      cause: parsed.error,
    });
  }

  const config = parsed.data;
  if (config.apiKey === undefined) {
    const envVar = PROVIDER_SPECS[config.provider].apiKeyEnvVar;
    const key = env[envVar];
    if (key) config.apiKey = key;
  }
  return config;
}

/**
 * The API key, or a ConfigurationError naming the variable to set.
 */
export function requireApiKey(config: RefineryConfig): string {
  if (config.apiKey) return config.apiKey;
  const envVar = PROVIDER_SPECS[config.provider].apiKeyEnvVar;
  throw new ConfigurationError(`Environment variable ${envVar} is not set`);
}
