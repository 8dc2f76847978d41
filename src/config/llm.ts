/**
 * LLM Configuration
 *
 * Provider credentials, per-role model assignments, sampling parameters
 * and retry settings, loaded from the environment into an explicit value.
 */

import { config as loadDotenv } from 'dotenv';
import { Role } from '../types/debate.js';
import { ConfigurationError } from '../types/errors.js';
import type {
  LLMProviderName,
  LLMProviderSettings,
  ProviderProtocol,
  RetryConfig,
} from '../types/llm.js';

/**
 * Model assignment for one role
 */
export interface RoleModelAssignment {
  provider: LLMProviderName;
  model: string;
}

/**
 * LLM configuration interface
 */
export interface LLMConfig {
  /** Connection settings per provider */
  providers: Record<LLMProviderName, LLMProviderSettings>;
  /** Provider used when a role has no override */
  defaultProvider: LLMProviderName;
  /** Which provider/model each role talks to */
  roleModels: Record<Role, RoleModelAssignment>;
  /** Sampling temperature */
  temperature: number;
  /** Maximum tokens per completion */
  maxTokens: number;
  /** Nucleus sampling */
  topP: number;
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  /** Retry configuration */
  retry: RetryConfig;
}

const PROVIDER_NAMES: readonly LLMProviderName[] = ['deepseek', 'dashscope', 'openai', 'anthropic'];

const PROVIDER_PROTOCOLS: Record<LLMProviderName, ProviderProtocol> = {
  deepseek: 'openai-compatible',
  dashscope: 'openai-compatible',
  openai: 'openai-compatible',
  anthropic: 'anthropic',
};

const DEFAULT_BASE_URLS: Record<LLMProviderName, string | undefined> = {
  deepseek: 'https://api.deepseek.com/v1',
  dashscope: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
  openai: undefined,
  anthropic: undefined,
};

const DEFAULT_MODELS: Record<LLMProviderName, string> = {
  deepseek: 'deepseek-reasoner',
  dashscope: 'qwen3-max',
  openai: 'gpt-4o',
  anthropic: 'claude-3-5-sonnet-20241022',
};

/**
 * Environment variable prefix for each role's model override
 */
const ROLE_ENV_PREFIX: Record<Role, string> = {
  [Role.AFFIRMATIVE]: 'AFFIRMATIVE',
  [Role.NEGATIVE]: 'NEGATIVE',
  [Role.JUDGE]: 'JUDGE',
  [Role.MODERATOR]: 'MODERATOR',
};

/**
 * Type guard for provider names
 */
export function isProviderName(value: string): value is LLMProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * Get environment variable or fall back to a default
 */
function getEnvVar(env: NodeJS.ProcessEnv, key: string, defaultValue: string = ''): string {
  return env[key] || defaultValue;
}

/**
 * Parse a number from an environment variable
 * Invalid values are reported instead of silently replaced
 */
function getEnvNumber(env: NodeJS.ProcessEnv, key: string, defaultValue: number, problems: string[]): number {
  const value = env[key];
  if (!value) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    problems.push(`${key}: expected a number, got "${value}"`);
    return defaultValue;
  }

  return parsed;
}

/**
 * Parse a provider name from an environment variable
 */
function getEnvProvider(
  env: NodeJS.ProcessEnv,
  key: string,
  defaultValue: LLMProviderName,
  problems: string[]
): LLMProviderName {
  const value = env[key];
  if (!value) {
    return defaultValue;
  }
  if (!isProviderName(value)) {
    problems.push(`${key}: unknown provider "${value}" (expected one of ${PROVIDER_NAMES.join(', ')})`);
    return defaultValue;
  }
  return value;
}

/**
 * Load LLM configuration from environment variables
 *
 * When no environment is passed, `.env` is loaded into process.env first.
 *
 * Environment variables:
 * - LLM_PROVIDER: default provider (deepseek | dashscope | openai | anthropic, default: deepseek)
 * - DEEPSEEK_API_KEY / DEEPSEEK_BASE_URL
 * - DASHSCOPE_API_KEY / DASHSCOPE_BASE_URL
 * - OPENAI_API_KEY / OPENAI_BASE_URL
 * - ANTHROPIC_API_KEY / ANTHROPIC_BASE_URL
 * - AFFIRMATIVE_MODEL, NEGATIVE_MODEL, JUDGE_MODEL, MODERATOR_MODEL: per-role models
 * - AFFIRMATIVE_PROVIDER, NEGATIVE_PROVIDER, JUDGE_PROVIDER, MODERATOR_PROVIDER: per-role providers
 * - LLM_TEMPERATURE (default: 0.7), LLM_MAX_TOKENS (default: 4000), LLM_TOP_P (default: 0.9)
 * - LLM_TIMEOUT_MS: per-attempt timeout (default: 120000)
 * - LLM_MAX_ATTEMPTS: attempts per call (default: 3)
 * - LLM_RETRY_BASE_DELAY: base retry delay in milliseconds (default: 1000)
 * - LLM_RETRY_MAX_DELAY: maximum retry delay in milliseconds (default: 10000)
 */
export function loadLLMConfig(env?: NodeJS.ProcessEnv): LLMConfig {
  if (!env) {
    loadDotenv();
  }
  const source = env ?? process.env;
  const problems: string[] = [];

  const defaultProvider = getEnvProvider(source, 'LLM_PROVIDER', 'deepseek', problems);

  const provider = (name: LLMProviderName): LLMProviderSettings => {
    const prefix = name.toUpperCase();
    return {
      name,
      protocol: PROVIDER_PROTOCOLS[name],
      apiKey: getEnvVar(source, `${prefix}_API_KEY`),
      baseURL: getEnvVar(source, `${prefix}_BASE_URL`) || DEFAULT_BASE_URLS[name],
    };
  };

  const roleModel = (role: Role): RoleModelAssignment => {
    const prefix = ROLE_ENV_PREFIX[role];
    const roleProvider = getEnvProvider(source, `${prefix}_PROVIDER`, defaultProvider, problems);
    return {
      provider: roleProvider,
      model: getEnvVar(source, `${prefix}_MODEL`, DEFAULT_MODELS[roleProvider]),
    };
  };

  const providers: Record<LLMProviderName, LLMProviderSettings> = {
    deepseek: provider('deepseek'),
    dashscope: provider('dashscope'),
    openai: provider('openai'),
    anthropic: provider('anthropic'),
  };

  // Moderator keeps the cheaper chat model unless overridden
  const roleModels: Record<Role, RoleModelAssignment> = {
    [Role.MODERATOR]: roleModel(Role.MODERATOR),
    [Role.AFFIRMATIVE]: roleModel(Role.AFFIRMATIVE),
    [Role.NEGATIVE]: roleModel(Role.NEGATIVE),
    [Role.JUDGE]: roleModel(Role.JUDGE),
  };
  if (!source.MODERATOR_MODEL && roleModels[Role.MODERATOR].provider === 'deepseek') {
    roleModels[Role.MODERATOR] = { provider: 'deepseek', model: 'deepseek-chat' };
  }

  const llmConfig: LLMConfig = {
    providers,
    defaultProvider,
    roleModels,
    temperature: getEnvNumber(source, 'LLM_TEMPERATURE', 0.7, problems),
    maxTokens: getEnvNumber(source, 'LLM_MAX_TOKENS', 4000, problems),
    topP: getEnvNumber(source, 'LLM_TOP_P', 0.9, problems),
    timeoutMs: getEnvNumber(source, 'LLM_TIMEOUT_MS', 120000, problems),
    retry: {
      maxAttempts: getEnvNumber(source, 'LLM_MAX_ATTEMPTS', 3, problems),
      baseDelay: getEnvNumber(source, 'LLM_RETRY_BASE_DELAY', 1000, problems),
      maxDelay: getEnvNumber(source, 'LLM_RETRY_MAX_DELAY', 10000, problems),
      jitterRatio: 0.3,
    },
  };

  if (problems.length > 0) {
    throw new ConfigurationError('LLM configuration could not be read', problems);
  }

  return llmConfig;
}

/**
 * Validate configuration before any call is made
 * Only the providers used by the given roles need credentials
 */
export function validateLLMConfig(
  llmConfig: LLMConfig,
  roles: readonly Role[] = Object.values(Role)
): void {
  const errors: string[] = [];

  for (const role of roles) {
    const assignment = llmConfig.roleModels[role];
    const provider = llmConfig.providers[assignment.provider];
    if (!provider.apiKey) {
      errors.push(
        `${assignment.provider.toUpperCase()}_API_KEY is required for the ${role} role (provider "${assignment.provider}")`
      );
    }
    if (!assignment.model) {
      errors.push(`No model configured for the ${role} role`);
    }
  }

  if (!Number.isInteger(llmConfig.retry.maxAttempts) || llmConfig.retry.maxAttempts < 1) {
    errors.push('LLM_MAX_ATTEMPTS must be an integer >= 1');
  }

  if (llmConfig.retry.baseDelay < 0) {
    errors.push('LLM_RETRY_BASE_DELAY must be >= 0');
  }

  if (llmConfig.retry.maxDelay < llmConfig.retry.baseDelay) {
    errors.push('LLM_RETRY_MAX_DELAY must be >= LLM_RETRY_BASE_DELAY');
  }

  if (llmConfig.timeoutMs < 1000) {
    errors.push('LLM_TIMEOUT_MS must be >= 1000 (1 second)');
  }

  if (llmConfig.temperature < 0 || llmConfig.temperature > 2) {
    errors.push('LLM_TEMPERATURE must be between 0 and 2');
  }

  if (errors.length > 0) {
    throw new ConfigurationError('LLM configuration validation failed', errors);
  }
}
