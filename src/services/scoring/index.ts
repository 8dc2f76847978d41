export {
  computeWeightedTotal,
  scoreEvaluation,
  tallyScores,
  relativeDifference,
  decideWinner,
  DRAW_TOLERANCE,
  summarizeScores,
  buildVerdict,
} from './scoring-engine.js';
export type { ScoreTarget, ScoreTally, ScoreSummary } from './scoring-engine.js';
