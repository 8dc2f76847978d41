/**
 * Reasoning Capability
 *
 * Call-and-parse scaffolding shared by every role agent. Each agent holds
 * one instance; prompts are resolved through the dispatch table, rendered,
 * sent through the gateway and the output validated.
 */

import type { Logger } from 'pino';
import type { z } from 'zod';
import type { Role, RoundType } from '../../types/debate.js';
import { ConfigurationError, ParseError } from '../../types/errors.js';
import type { ReasoningGateway, ResponseMode } from '../../types/llm.js';
import { createAgentLogger, loggers } from '../logging/index.js';
import { renderTemplate } from './prompts/template-renderer.js';
import { hasPromptStrategy, resolvePromptStrategy } from './prompts/strategies.js';
import type { PromptContext, PromptSlot, PromptTemplates } from './prompts/types.js';
import type { AgentContext } from './types.js';

export interface ReasoningCapabilityOptions {
  role: Role;
  gateway: ReasoningGateway;
  templates: PromptTemplates;
  /** Reported in agent metadata */
  model?: string;
}

/**
 * A single prompt request
 */
export interface PromptCall {
  slot: PromptSlot;
  /** Round type used for dispatch (null for round-independent prompts) */
  roundType: RoundType | null;
  context: AgentContext;
  extras?: Pick<PromptContext, 'question' | 'target' | 'summary'>;
  /** Per-call overrides of the gateway's sampling settings */
  temperature?: number;
  maxTokens?: number;
}

/**
 * Rendered prompt pair
 */
export interface RenderedPrompt {
  systemPrompt?: string;
  prompt: string;
}

export class ReasoningCapability {
  readonly role: Role;
  readonly model?: string;
  private readonly gateway: ReasoningGateway;
  private readonly templates: PromptTemplates;
  readonly logger: Logger;

  constructor(options: ReasoningCapabilityOptions) {
    this.role = options.role;
    this.model = options.model;
    this.gateway = options.gateway;
    this.templates = options.templates;
    this.logger = createAgentLogger(options.role);
  }

  /**
   * Resolve and render the system and user prompts for a call
   */
  render(call: PromptCall): RenderedPrompt {
    const ctx: PromptContext = { agent: call.context, role: this.role, ...call.extras };

    const strategy = resolvePromptStrategy({ role: this.role, roundType: call.roundType, slot: call.slot }, ctx);
    const prompt = renderTemplate(this.template(strategy.templateKey), strategy.variables(ctx));

    const systemKey = { role: this.role, roundType: null, slot: 'system' as const };
    if (!hasPromptStrategy(systemKey)) {
      return { prompt };
    }
    const systemStrategy = resolvePromptStrategy(systemKey, ctx);
    return {
      systemPrompt: renderTemplate(this.template(systemStrategy.templateKey), systemStrategy.variables(ctx)),
      prompt,
    };
  }

  /**
   * Free-text call; empty output is a ParseError
   */
  async generateText(call: PromptCall): Promise<string> {
    const result = await this.invoke(call, 'text');
    if (result.mode !== 'text') {
      throw new ParseError(`${this.role} expected a text response`, result.raw);
    }

    const text = result.text.trim();
    if (!text) {
      throw new ParseError(`${this.role} returned an empty response`, result.text, ['text: empty']);
    }
    return text;
  }

  /**
   * Structured call validated against a zod schema
   */
  async generateStructured<T>(call: PromptCall, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const result = await this.invoke(call, 'structured');
    if (result.mode !== 'structured') {
      throw new ParseError(`${this.role} expected a structured response`, result.text);
    }

    const parsed = schema.safeParse(result.data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`
      );
      loggers.error(`${this.role} output failed validation`, parsed.error, {
        debateId: call.context.debateId,
        phase: call.context.phase,
        issues,
      });
      throw new ParseError(`${this.role} returned an invalid structured response`, result.raw, issues);
    }
    return parsed.data;
  }

  private template(key: string): string {
    const template = this.templates[key];
    if (template === undefined) {
      throw new ConfigurationError('Invalid prompt templates', [`${key}: template is missing`]);
    }
    return template;
  }

  private async invoke(call: PromptCall, responseMode: ResponseMode) {
    const rendered = this.render(call);
    const startTime = Date.now();

    try {
      const result = await this.gateway.invoke({
        role: this.role,
        prompt: rendered.prompt,
        systemPrompt: rendered.systemPrompt,
        responseMode,
        temperature: call.temperature,
        maxTokens: call.maxTokens,
      });

      loggers.agentCall({
        debateId: call.context.debateId,
        agent: this.role,
        phase: call.context.phase,
        latency_ms: Date.now() - startTime,
        tokens: result.usage?.totalTokens,
        success: true,
      });
      return result;
    } catch (error) {
      loggers.agentCall({
        debateId: call.context.debateId,
        agent: this.role,
        phase: call.context.phase,
        latency_ms: Date.now() - startTime,
        success: false,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
