/**
 * Judge Agent
 *
 * Scores each debater message on four criteria and explains the verdict.
 */

import { z } from 'zod';
import { Role, type DebateMessage } from '../../types/debate.js';
import type { ScoreSummary } from '../scoring/scoring-engine.js';
import type { ReasoningCapability } from './capability.js';
import type {
  AgentContext,
  AgentMetadata,
  JudgeAgent as JudgeAgentContract,
  JudgeEvaluation,
} from './types.js';

/**
 * Numbers sometimes arrive as strings ("78")
 */
const subScoreSchema = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z.number().finite().min(0).max(100)
);

/**
 * Shape of the judge's structured output
 */
export const judgeEvaluationSchema = z.object({
  logic: subScoreSchema,
  evidence: subScoreSchema,
  rebuttal: subScoreSchema,
  expression: subScoreSchema,
  rationale: z.string().default(''),
});

export class JudgeAgent implements JudgeAgentContract {
  readonly role = Role.JUDGE;
  private readonly capability: ReasoningCapability;

  constructor(capability: ReasoningCapability) {
    this.capability = capability;
  }

  async evaluate(context: AgentContext, target: DebateMessage): Promise<JudgeEvaluation> {
    const evaluation = await this.capability.generateStructured(
      { slot: 'evaluation', roundType: target.roundType, context, extras: { target } },
      judgeEvaluationSchema
    );

    this.capability.logger.debug({
      debateId: context.debateId,
      role: target.role,
      roundType: target.roundType,
      roundIndex: target.roundIndex,
    }, 'Message evaluated');

    return { ...evaluation, rationale: evaluation.rationale.trim() };
  }

  async writeVerdictRationale(context: AgentContext, summary: ScoreSummary): Promise<string> {
    return this.capability.generateText({
      slot: 'verdict',
      roundType: null,
      context,
      extras: { summary },
    });
  }

  getMetadata(): AgentMetadata {
    return {
      name: 'Judge',
      role: this.role,
      model: this.capability.model,
      capabilities: ['scoring', 'verdict'],
    };
  }
}
