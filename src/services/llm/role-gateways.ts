/**
 * Role Gateway Factory
 *
 * Builds one gateway per role from the LLM configuration. Roles that use
 * the same provider share its transport.
 */

import { Role } from '../../types/debate.js';
import type { LLMProviderName, LLMTransport, RoleGateways } from '../../types/llm.js';
import { validateLLMConfig, type LLMConfig } from '../../config/llm.js';
import { createLogger } from '../logging/index.js';
import { AnthropicTransport } from './anthropic-transport.js';
import { LLMGateway, type LLMGatewayOptions } from './gateway.js';
import { OpenAITransport } from './openai-transport.js';

const logger = createLogger({ module: 'role-gateways' });

/**
 * Create the transport for a configured provider
 */
export function createTransport(llmConfig: LLMConfig, provider: LLMProviderName): LLMTransport {
  const settings = llmConfig.providers[provider];
  if (settings.protocol === 'anthropic') {
    return new AnthropicTransport({ apiKey: settings.apiKey, baseURL: settings.baseURL });
  }
  return new OpenAITransport({ apiKey: settings.apiKey, baseURL: settings.baseURL });
}

/**
 * Build a gateway for every role
 * Throws ConfigurationError if a role's provider has no credentials
 */
export function createRoleGateways(
  llmConfig: LLMConfig,
  overrides: Pick<LLMGatewayOptions, 'sleep' | 'random'> = {}
): RoleGateways {
  validateLLMConfig(llmConfig);

  const transports = new Map<LLMProviderName, LLMTransport>();
  const gatewayFor = (role: Role): LLMGateway => {
    const assignment = llmConfig.roleModels[role];
    let transport = transports.get(assignment.provider);
    if (!transport) {
      transport = createTransport(llmConfig, assignment.provider);
      transports.set(assignment.provider, transport);
    }

    logger.info({ role, provider: assignment.provider, model: assignment.model }, 'Gateway configured');

    return new LLMGateway({
      transport,
      model: assignment.model,
      temperature: llmConfig.temperature,
      maxTokens: llmConfig.maxTokens,
      topP: llmConfig.topP,
      timeoutMs: llmConfig.timeoutMs,
      retry: llmConfig.retry,
      ...overrides,
    });
  };

  return {
    [Role.MODERATOR]: gatewayFor(Role.MODERATOR),
    [Role.AFFIRMATIVE]: gatewayFor(Role.AFFIRMATIVE),
    [Role.NEGATIVE]: gatewayFor(Role.NEGATIVE),
    [Role.JUDGE]: gatewayFor(Role.JUDGE),
  };
}
