/**
 * Anthropic Transport
 *
 * Messages API via @anthropic-ai/sdk. System prompts are sent separately
 * and text blocks of the reply are joined.
 */

import Anthropic from '@anthropic-ai/sdk';
import {
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
} from '../../types/llm.js';

/** The Messages API requires an explicit limit */
const DEFAULT_MAX_TOKENS = 4096;

export interface AnthropicTransportOptions {
  apiKey: string;
  baseURL?: string;
}

/**
 * Map Anthropic stop reason to our standard format
 */
export function mapAnthropicStopReason(reason: string | null): FinishReason {
  switch (reason) {
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'max_tokens':
      return 'length';
    case 'tool_use':
      return 'tool_calls';
    default:
      return 'stop';
  }
}

/**
 * Handle Anthropic SDK errors
 */
export function handleAnthropicError(error: unknown): CallError {
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new TransientCallError(error.message, 'timeout', undefined, error);
  }
  if (error instanceof Anthropic.APIUserAbortError) {
    return new TransientCallError('Request aborted', 'timeout', undefined, error);
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new TransientCallError(error.message, 'network', undefined, error);
  }
  if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
    return callErrorFromStatus(error.status, error.message, error);
  }
  return classifyCallError(error);
}

function toConversationMessage(message: ChatMessage) {
  return {
    role: message.role === 'assistant' ? ('assistant' as const) : ('user' as const),
    content: message.content,
  };
}

export class AnthropicTransport implements LLMTransport {
  private readonly client: Anthropic;

  constructor(options: AnthropicTransportOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: 0,
    });
  }

  async complete(request: LLMRequest, signal?: AbortSignal): Promise<LLMResponse> {
    // Anthropic requires system messages to be separate
    const system = request.messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n\n');
    const conversation = request.messages
      .filter((message) => message.role !== 'system')
      .map(toConversationMessage);

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: request.model,
          system: system || undefined,
          messages: conversation,
          temperature: request.temperature,
          // Anthropic takes one of temperature and top_p
          top_p: request.temperature === undefined ? request.topP : undefined,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        },
        { signal }
      );
    } catch (error: unknown) {
      throw handleAnthropicError(error);
    }

    const textParts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') {
        textParts.push(block.text);
      }
    }

    return {
      content: textParts.join('\n'),
      model: response.model,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      finishReason: mapAnthropicStopReason(response.stop_reason),
      protocol: 'anthropic',
    };
  }
}
