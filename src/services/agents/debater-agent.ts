/**
 * Debater Agent
 *
 * Argues one side of the topic. The same implementation serves the
 * affirmative and the negative; the role picks the prompt variables.
 */

import { Role, RoundType, type DebaterRole } from '../../types/debate.js';
import { InvalidStateError } from '../../types/errors.js';
import type { ReasoningCapability } from './capability.js';
import type { AgentContext, AgentMetadata, DebaterAgent as DebaterAgentContract } from './types.js';

export class DebaterAgent implements DebaterAgentContract {
  readonly role: DebaterRole;
  private readonly capability: ReasoningCapability;

  constructor(role: DebaterRole, capability: ReasoningCapability) {
    this.role = role;
    this.capability = capability;
  }

  async makeStatement(context: AgentContext): Promise<string> {
    const roundType = context.roundType;
    if (roundType === null || roundType === RoundType.CROSS_EXAMINATION) {
      throw new InvalidStateError(
        `${this.role} cannot make a statement in ${roundType ?? 'a roundless'} turn`,
        context.phase
      );
    }

    this.capability.logger.debug({ debateId: context.debateId, roundType, roundIndex: context.roundIndex }, 'Generating statement');
    return this.capability.generateText({ slot: 'statement', roundType, context });
  }

  async askQuestion(context: AgentContext): Promise<string> {
    this.capability.logger.debug({ debateId: context.debateId, exchange: context.roundIndex }, 'Generating cross-examination question');
    return this.capability.generateText({
      slot: 'question',
      roundType: RoundType.CROSS_EXAMINATION,
      context,
    });
  }

  async answerQuestion(context: AgentContext, question: string): Promise<string> {
    this.capability.logger.debug({ debateId: context.debateId, exchange: context.roundIndex }, 'Answering cross-examination question');
    return this.capability.generateText({
      slot: 'answer',
      roundType: RoundType.CROSS_EXAMINATION,
      context,
      extras: { question },
    });
  }

  getMetadata(): AgentMetadata {
    return {
      name: `${this.role === Role.AFFIRMATIVE ? 'Affirmative' : 'Negative'} Debater`,
      role: this.role,
      model: this.capability.model,
      capabilities: ['opening', 'cross-examination', 'free debate', 'closing'],
    };
  }
}
