/**
 * LLM Service Barrel Export
 */

export {
  LLMGateway,
  extractJsonObject,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_TIMEOUT_MS,
} from './gateway.js';
export type { LLMGatewayOptions } from './gateway.js';
export { OpenAITransport, handleOpenAIError, mapOpenAIFinishReason } from './openai-transport.js';
export { AnthropicTransport, handleAnthropicError, mapAnthropicStopReason } from './anthropic-transport.js';
export { createRoleGateways, createTransport } from './role-gateways.js';
export type {
  LLMRequest,
  LLMResponse,
  LLMTransport,
  LLMProviderName,
  ChatMessage,
  MessageRole,
  TokenUsage,
  FinishReason,
  RetryConfig,
  ReasoningCallRequest,
  ReasoningCallResult,
  ReasoningGateway,
  RoleGateways,
} from '../../types/llm.js';
export { loadLLMConfig, validateLLMConfig } from '../../config/llm.js';
export type { LLMConfig } from '../../config/llm.js';
