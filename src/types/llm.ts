/**
 * LLM Integration Types
 *
 * Type definitions for the reasoning call gateway and the transports
 * behind it (OpenAI-compatible endpoints and Anthropic).
 */

import type { Role } from './debate.js';

/**
 * Known providers
 * deepseek, dashscope and openai speak the OpenAI chat completions protocol
 */
export type LLMProviderName = 'deepseek' | 'dashscope' | 'openai' | 'anthropic';

/**
 * Wire protocol spoken by a provider
 */
export type ProviderProtocol = 'openai-compatible' | 'anthropic';

/**
 * Provider connection settings
 */
export interface LLMProviderSettings {
  /** Provider name */
  name: LLMProviderName;
  /** Wire protocol */
  protocol: ProviderProtocol;
  /** API key for authentication */
  apiKey: string;
  /** Optional custom base URL for API endpoint */
  baseURL?: string;
}

/**
 * Message role in conversation
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Chat message structure
 */
export interface ChatMessage {
  /** Role of the message sender */
  role: MessageRole;
  /** Content of the message */
  content: string;
}

/**
 * Request handed to a transport
 */
export interface LLMRequest {
  /** Model identifier */
  model: string;
  /** Conversation messages */
  messages: ChatMessage[];
  /** Temperature for response randomness (0.0 - 2.0) */
  temperature?: number;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Nucleus sampling */
  topP?: number;
  /** Ask the provider for a JSON object when it supports it */
  responseFormat?: 'text' | 'json';
}

/**
 * Token usage statistics
 */
export interface TokenUsage {
  /** Tokens used in the prompt */
  promptTokens: number;
  /** Tokens generated in the completion */
  completionTokens: number;
  /** Total tokens used (prompt + completion) */
  totalTokens: number;
}

/**
 * Reason why the completion finished
 */
export type FinishReason = 'stop' | 'length' | 'content_filter' | 'tool_calls' | 'error';

/**
 * Transport response
 */
export interface LLMResponse {
  /** Generated content */
  content: string;
  /** Model that generated the response */
  model: string;
  /** Token usage statistics */
  usage: TokenUsage;
  /** Reason the completion finished */
  finishReason: FinishReason;
  /** Protocol that served the response */
  protocol: ProviderProtocol;
}

/**
 * Raw network call to a language model
 * Implementations translate SDK failures into the call error taxonomy
 */
export interface LLMTransport {
  complete(request: LLMRequest, signal?: AbortSignal): Promise<LLMResponse>;
}

/**
 * Whether the caller expects free text or a JSON object
 */
export type ResponseMode = 'text' | 'structured';

/**
 * Input to the reasoning call gateway
 */
export interface ReasoningCallRequest {
  /** Role on whose behalf the call is made (log correlation) */
  role: Role;
  /** Rendered user prompt */
  prompt: string;
  /** Optional system prompt */
  systemPrompt?: string;
  responseMode: ResponseMode;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Output of the reasoning call gateway
 */
export type ReasoningCallResult =
  | { mode: 'text'; text: string; usage?: TokenUsage }
  | { mode: 'structured'; data: Record<string, unknown>; raw: string; usage?: TokenUsage };

/**
 * Uniform interface for invoking a reasoning capability
 */
export interface ReasoningGateway {
  invoke(request: ReasoningCallRequest): Promise<ReasoningCallResult>;
}

/**
 * One gateway per role
 */
export type RoleGateways = Record<Role, ReasoningGateway>;

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Base delay in milliseconds */
  baseDelay: number;
  /** Maximum delay in milliseconds */
  maxDelay: number;
  /** Random extra delay as a fraction of the exponential delay (0-1) */
  jitterRatio: number;
}
