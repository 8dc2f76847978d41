/**
 * Debate Rules Configuration
 *
 * Competition rules passed explicitly into the phase controller:
 * free-debate length, scoring weights, the draw threshold and whether
 * cross-examination is scored.
 */

import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';

/**
 * Tolerance used when checking that scoring weights sum to 1
 */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

/**
 * Weight of each judged criterion in a turn's total
 */
export interface ScoringWeights {
  logic: number;
  evidence: number;
  rebuttal: number;
  expression: number;
}

/**
 * Rules object
 */
export interface DebateRules {
  /** Number of free-debate rounds (each round: one statement per side) */
  maxFreeDebateRounds: number;

  /** Criterion weights, must sum to 1 */
  scoringWeights: ScoringWeights;

  /** Relative difference below which the verdict is a draw */
  drawThreshold: number;

  /** Whether cross-examination questions and answers are scored */
  scoreCrossExamination: boolean;
}

/**
 * Partial rules accepted from callers; missing values fall back to defaults
 */
export interface DebateRulesInput {
  maxFreeDebateRounds?: number;
  scoringWeights?: Partial<ScoringWeights>;
  drawThreshold?: number;
  scoreCrossExamination?: boolean;
}

export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  logic: 0.3,
  evidence: 0.25,
  rebuttal: 0.25,
  expression: 0.2,
});

export const DEFAULT_DEBATE_RULES: Readonly<DebateRules> = Object.freeze({
  maxFreeDebateRounds: 3,
  scoringWeights: DEFAULT_SCORING_WEIGHTS,
  drawThreshold: 0.05,
  scoreCrossExamination: false,
});

const weightSchema = z.number().finite().min(0).max(1);

const debateRulesSchema = z.object({
  maxFreeDebateRounds: z.number().int().min(0),
  scoringWeights: z.object({
    logic: weightSchema,
    evidence: weightSchema,
    rebuttal: weightSchema,
    expression: weightSchema,
  }),
  drawThreshold: z.number().finite().min(0).lt(1),
  scoreCrossExamination: z.boolean(),
});

/**
 * Sum of all scoring weights
 */
export function sumWeights(weights: ScoringWeights): number {
  return weights.logic + weights.evidence + weights.rebuttal + weights.expression;
}

/**
 * Merge overrides onto the defaults and validate the result
 * Throws ConfigurationError listing every problem found
 */
export function resolveDebateRules(input: DebateRulesInput = {}): DebateRules {
  const merged = {
    maxFreeDebateRounds: input.maxFreeDebateRounds ?? DEFAULT_DEBATE_RULES.maxFreeDebateRounds,
    scoringWeights: { ...DEFAULT_SCORING_WEIGHTS, ...input.scoringWeights },
    drawThreshold: input.drawThreshold ?? DEFAULT_DEBATE_RULES.drawThreshold,
    scoreCrossExamination: input.scoreCrossExamination ?? DEFAULT_DEBATE_RULES.scoreCrossExamination,
  };

  const parsed = debateRulesSchema.safeParse(merged);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'rules'}: ${issue.message}`
    );
    throw new ConfigurationError('Invalid debate rules', problems);
  }

  const rules = parsed.data;
  const total = sumWeights(rules.scoringWeights);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigurationError('Invalid debate rules', [
      `scoringWeights: must sum to 1.0 (got ${total})`,
    ]);
  }

  return rules;
}

/**
 * Read rule overrides from the environment
 *
 * Environment variables:
 * - DEBATE_MAX_FREE_ROUNDS: number of free-debate rounds
 * - DEBATE_DRAW_THRESHOLD: relative difference treated as a draw
 * - DEBATE_SCORE_CROSS_EXAM: 'true' to score cross-examination
 */
export function loadDebateRulesFromEnv(env: NodeJS.ProcessEnv = process.env): DebateRulesInput {
  const input: DebateRulesInput = {};

  const maxRounds = env.DEBATE_MAX_FREE_ROUNDS;
  if (maxRounds !== undefined && maxRounds !== '') {
    input.maxFreeDebateRounds = Number(maxRounds);
  }

  const threshold = env.DEBATE_DRAW_THRESHOLD;
  if (threshold !== undefined && threshold !== '') {
    input.drawThreshold = Number(threshold);
  }

  const scoreCrossExam = env.DEBATE_SCORE_CROSS_EXAM;
  if (scoreCrossExam !== undefined && scoreCrossExam !== '') {
    input.scoreCrossExamination = scoreCrossExam.toLowerCase() === 'true';
  }

  return input;
}
