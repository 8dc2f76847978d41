/**
 * Orchestrator Type Definitions
 *
 * Types used by the phase controller to plan and execute turns.
 */

import type {
  CrossExamination,
  DebateMessage,
  DebatePhase,
  DebateScore,
  DebateState,
  DebateVerdict,
  Role,
  RoundType,
} from './debate.js';

/**
 * What a turn asks its speaker to produce
 */
export type TurnKind =
  | 'introduction'
  | 'statement'
  | 'cross_question'
  | 'cross_answer'
  | 'verdict';

/**
 * A single turn in a phase execution plan
 */
export interface Turn {
  /** 1-based position within the phase plan */
  turnNumber: number;

  /** Who speaks (or, for the verdict, who writes the rationale) */
  speaker: Role;

  kind: TurnKind;

  /** Round type of the produced message (null for the verdict) */
  roundType: RoundType | null;

  /** Round index stamped on the produced message and score */
  roundIndex: number;

  /** Whether the produced message is scored before the next turn */
  scored: boolean;
}

/**
 * Ordered turns for one phase iteration
 */
export interface PhaseExecutionPlan {
  phase: DebatePhase;
  name: string;
  turns: Turn[];
}

/**
 * Records produced by one turn, applied to the phase draft
 */
export interface TurnOutcome {
  messages: DebateMessage[];
  scores: DebateScore[];
  crossExams: CrossExamination[];
  verdict?: DebateVerdict;
}

/**
 * Result of stepping the controller by one turn
 */
export interface TurnStepResult {
  /** Phase the turn belonged to */
  phase: DebatePhase;

  /** The executed turn (null when the phase had nothing left to run) */
  turn: Turn | null;

  /** Records appended by this turn */
  outcome: TurnOutcome;

  /** Whether this step committed the phase */
  committed: boolean;

  /**
   * Frozen view after the step: the committed state when the phase
   * committed, otherwise the in-progress phase draft
   */
  snapshot: DebateState;
}
