/**
 * Scoring Engine
 *
 * Pure functions that turn judge evaluations into weighted scores and
 * aggregate them into the final verdict.
 */

import {
  Role,
  VerdictOutcome,
  type DebateScore,
  type DebateVerdict,
  type DebaterRole,
  type RoundType,
  type SubScores,
} from '../../types/debate.js';
import type { DebateRules, ScoringWeights } from '../../config/debate-rules.js';

/**
 * Message a score is attached to
 */
export interface ScoreTarget {
  role: DebaterRole;
  roundType: RoundType;
  roundIndex: number;
}

/**
 * Per-side sums
 */
export interface ScoreTally {
  affirmativeTotal: number;
  negativeTotal: number;
  affirmativeTurns: number;
  negativeTurns: number;
}

/**
 * Tally plus the decided outcome
 */
export interface ScoreSummary extends ScoreTally {
  winner: VerdictOutcome;
  /** |a - n| / max(a, n), 0 when both totals are 0 */
  relativeDifference: number;
}

/**
 * Weighted sum of the four sub-scores
 */
export function computeWeightedTotal(subScores: SubScores, weights: ScoringWeights): number {
  return (
    weights.logic * subScores.logic +
    weights.evidence * subScores.evidence +
    weights.rebuttal * subScores.rebuttal +
    weights.expression * subScores.expression
  );
}

/**
 * Build the score for one message from the judge's evaluation
 */
export function scoreEvaluation(
  evaluation: SubScores & { rationale?: string },
  target: ScoreTarget,
  weights: ScoringWeights
): DebateScore {
  return Object.freeze({
    role: target.role,
    roundType: target.roundType,
    roundIndex: target.roundIndex,
    logic: evaluation.logic,
    evidence: evaluation.evidence,
    rebuttal: evaluation.rebuttal,
    expression: evaluation.expression,
    total: computeWeightedTotal(evaluation, weights),
    rationale: evaluation.rationale ?? '',
  });
}

/**
 * Sum each side's totals
 */
export function tallyScores(scores: readonly DebateScore[]): ScoreTally {
  const tally: ScoreTally = {
    affirmativeTotal: 0,
    negativeTotal: 0,
    affirmativeTurns: 0,
    negativeTurns: 0,
  };

  for (const score of scores) {
    if (score.role === Role.AFFIRMATIVE) {
      tally.affirmativeTotal += score.total;
      tally.affirmativeTurns += 1;
    } else {
      tally.negativeTotal += score.total;
      tally.negativeTurns += 1;
    }
  }

  return tally;
}

/**
 * Relative difference between two totals
 */
export function relativeDifference(affirmativeTotal: number, negativeTotal: number): number {
  const larger = Math.max(affirmativeTotal, negativeTotal);
  if (larger === 0) {
    return 0;
  }
  return Math.abs(affirmativeTotal - negativeTotal) / larger;
}

/**
 * Rounding slack for the draw comparison; accumulated weighted totals can
 * land a gap of exactly the threshold just below it
 */
export const DRAW_TOLERANCE = 1e-9;

/**
 * Higher total wins unless the relative difference is below the threshold
 */
export function decideWinner(
  affirmativeTotal: number,
  negativeTotal: number,
  drawThreshold: number
): VerdictOutcome {
  if (Math.max(affirmativeTotal, negativeTotal) === 0) {
    return VerdictOutcome.DRAW;
  }
  if (relativeDifference(affirmativeTotal, negativeTotal) < drawThreshold - DRAW_TOLERANCE) {
    return VerdictOutcome.DRAW;
  }
  return affirmativeTotal > negativeTotal ? VerdictOutcome.AFFIRMATIVE : VerdictOutcome.NEGATIVE;
}

/**
 * Totals and outcome for a complete score list
 */
export function summarizeScores(
  scores: readonly DebateScore[],
  rules: Pick<DebateRules, 'drawThreshold'>
): ScoreSummary {
  const tally = tallyScores(scores);
  return {
    ...tally,
    winner: decideWinner(tally.affirmativeTotal, tally.negativeTotal, rules.drawThreshold),
    relativeDifference: relativeDifference(tally.affirmativeTotal, tally.negativeTotal),
  };
}

/**
 * Final verdict record
 */
export function buildVerdict(summary: ScoreSummary, rationale: string): DebateVerdict {
  return Object.freeze({
    affirmativeTotal: summary.affirmativeTotal,
    negativeTotal: summary.negativeTotal,
    winner: summary.winner,
    rationale,
  });
}
