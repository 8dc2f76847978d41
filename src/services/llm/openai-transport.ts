/**
 * OpenAI-compatible Transport
 *
 * Serves DeepSeek, DashScope and OpenAI through the openai SDK with a
 * baseURL override, mapping SDK failures into the call error taxonomy.
 */

import OpenAI from 'openai';
import {
  PermanentCallError,
  TransientCallError,
  callErrorFromStatus,
  classifyCallError,
  type CallError,
} from '../../types/errors.js';
import type {
  ChatMessage,
  FinishReason,
  LLMRequest,
  LLMResponse,
  LLMTransport,
  TokenUsage,
} from '../../types/llm.js';

export interface OpenAITransportOptions {
  apiKey: string;
  baseURL?: string;
}

/**
 * Map OpenAI finish reason to our standard format
 */
export function mapOpenAIFinishReason(reason: string | null): FinishReason {
  switch (reason) {
    case 'stop':
      return 'stop';
    case 'length':
      return 'length';
    case 'content_filter':
      return 'content_filter';
    case 'tool_calls':
    case 'function_call':
      return 'tool_calls';
    default:
      return 'stop';
  }
}

function toOpenAIMessage(message: ChatMessage) {
  switch (message.role) {
    case 'system':
      return { role: 'system' as const, content: message.content };
    case 'assistant':
      return { role: 'assistant' as const, content: message.content };
    case 'user':
      return { role: 'user' as const, content: message.content };
  }
}

/**
 * Handle OpenAI SDK errors
 */
export function handleOpenAIError(error: unknown): CallError {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new TransientCallError(error.message, 'timeout', undefined, error);
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new TransientCallError('Request aborted', 'timeout', undefined, error);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new TransientCallError(error.message, 'network', undefined, error);
  }
  if (error instanceof OpenAI.APIError && typeof error.status === 'number') {
    return callErrorFromStatus(error.status, error.message, error);
  }
  return classifyCallError(error);
}

export class OpenAITransport implements LLMTransport {
  private readonly client: OpenAI;

  constructor(options: OpenAITransportOptions) {
    // Retries are owned by the gateway
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: 0,
    });
  }

  async complete(request: LLMRequest, signal?: AbortSignal): Promise<LLMResponse> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: request.messages.map(toOpenAIMessage),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          top_p: request.topP,
          stream: false,
          ...(request.responseFormat === 'json'
            ? { response_format: { type: 'json_object' as const } }
            : {}),
        },
        { signal }
      );
    } catch (error: unknown) {
      throw handleOpenAIError(error);
    }

    const choice = completion.choices[0];
    if (!choice) {
      throw new TransientCallError('No completion choices returned', 'server_error');
    }

    const content = choice.message.content ?? '';
    if (choice.finish_reason === 'content_filter' && !content) {
      throw new PermanentCallError('Completion blocked by content filter', 'invalid_request');
    }

    const usage: TokenUsage = {
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
      totalTokens: completion.usage?.total_tokens ?? 0,
    };

    return {
      content,
      model: completion.model,
      usage,
      finishReason: mapOpenAIFinishReason(choice.finish_reason),
      protocol: 'openai-compatible',
    };
  }
}
