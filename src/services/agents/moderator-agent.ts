/**
 * Moderator Agent
 *
 * Opens the debate. Never scored.
 */

import { Role, RoundType } from '../../types/debate.js';
import type { ReasoningCapability } from './capability.js';
import type { AgentContext, AgentMetadata, ModeratorAgent as ModeratorAgentContract } from './types.js';

/** The introduction is asked to stay under 150 words */
export const INTRODUCTION_MAX_TOKENS = 300;

export class ModeratorAgent implements ModeratorAgentContract {
  readonly role = Role.MODERATOR;
  private readonly capability: ReasoningCapability;

  constructor(capability: ReasoningCapability) {
    this.capability = capability;
  }

  async introduce(context: AgentContext): Promise<string> {
    return this.capability.generateText({
      slot: 'introduction',
      roundType: RoundType.OPENING,
      context,
      maxTokens: INTRODUCTION_MAX_TOKENS,
    });
  }

  getMetadata(): AgentMetadata {
    return {
      name: 'Moderator',
      role: this.role,
      model: this.capability.model,
      capabilities: ['introduction'],
    };
  }
}
