/**
 * Debate Type Definitions
 *
 * Tagged variants and records that make up a debate run: who speaks,
 * which round a message belongs to, how turns are scored, and the
 * aggregate state threaded through every phase.
 */

/**
 * Speaker role
 * Identifies the author of a message and the target of a score
 */
export enum Role {
  /** Neutral host, opens the debate */
  MODERATOR = 'moderator',

  /** Argues for the topic */
  AFFIRMATIVE = 'affirmative',

  /** Argues against the topic */
  NEGATIVE = 'negative',

  /** Scores turns and explains the verdict */
  JUDGE = 'judge',
}

/**
 * The two sides that actually debate
 */
export type DebaterRole = Role.AFFIRMATIVE | Role.NEGATIVE;

/**
 * Round type
 * Tags each transcript entry and drives prompt selection
 */
export enum RoundType {
  OPENING = 'opening',
  CROSS_EXAMINATION = 'cross_examination',
  FREE_DEBATE = 'free_debate',
  CLOSING = 'closing',
}

/**
 * Debate phase enum
 * States of the phase controller; all transitions are forward-only
 * except FREE_DEBATE, which loops on itself
 */
export enum DebatePhase {
  /** Moderator introduction */
  INIT = 'INIT',

  /** Opening statements, scored */
  OPENING = 'OPENING',

  /** Two question/answer exchanges */
  CROSS_EXAMINATION = 'CROSS_EXAMINATION',

  /** Alternating statements, one round per iteration */
  FREE_DEBATE = 'FREE_DEBATE',

  /** Closing statements, scored */
  CLOSING = 'CLOSING',

  /** Verdict computation */
  JUDGMENT = 'JUDGMENT',

  /** Absorbing state: nothing runs after this */
  TERMINAL = 'TERMINAL',
}

/**
 * Final outcome of a debate
 */
export enum VerdictOutcome {
  AFFIRMATIVE = 'affirmative',
  NEGATIVE = 'negative',
  DRAW = 'draw',
}

/**
 * A single message in the transcript
 * Frozen once created; only the phase controller appends it
 */
export interface DebateMessage {
  readonly role: Role;
  readonly roundType: RoundType;
  /** 1-based round within its round type (0 for the moderator introduction) */
  readonly roundIndex: number;
  readonly text: string;
  readonly timestamp: Date;
}

/**
 * One question/answer exchange during cross-examination
 */
export interface CrossExamination {
  readonly roundIndex: number;
  readonly questioner: DebaterRole;
  readonly answerer: DebaterRole;
  readonly question: string;
  readonly answer: string;
  readonly timestamp: Date;
}

/**
 * The four judged criteria, each on a 0-100 scale
 */
export interface SubScores {
  readonly logic: number;
  readonly evidence: number;
  readonly rebuttal: number;
  readonly expression: number;
}

/**
 * Score for one debater message
 * Produced only by the scoring engine; `total` is the weighted sum of the sub-scores
 */
export interface DebateScore extends SubScores {
  readonly role: DebaterRole;
  readonly roundType: RoundType;
  readonly roundIndex: number;
  readonly total: number;
  /** Judge's short comment on the message */
  readonly rationale: string;
}

/**
 * Final verdict, created exactly once during judgment
 */
export interface DebateVerdict {
  readonly affirmativeTotal: number;
  readonly negativeTotal: number;
  readonly winner: VerdictOutcome;
  readonly rationale: string;
}

/**
 * Debate state
 * Aggregate record owned by the phase controller. Every update produces a
 * new object; readers only ever see frozen snapshots.
 */
export interface DebateState {
  /** Unique debate identifier (used for log correlation) */
  readonly debateId: string;

  readonly topic: string;

  /** Append-only, in phase execution order */
  readonly transcript: readonly DebateMessage[];

  readonly crossExams: readonly CrossExamination[];

  readonly scores: readonly DebateScore[];

  /** Number of completed free-debate rounds */
  readonly freeDebateRound: number;

  readonly currentPhase: DebatePhase;

  /** Set if and only if currentPhase is TERMINAL */
  readonly verdict: DebateVerdict | null;
}

/**
 * Phase transition event
 * Emitted after every committed transition
 */
export interface PhaseTransitionEvent {
  debateId: string;
  fromPhase: DebatePhase;
  toPhase: DebatePhase;
  timestamp: Date;
  /** Time spent in the phase that just committed (milliseconds) */
  phaseElapsedMs: number;
  /** Read-only view of the committed state */
  snapshot: DebateState;
}

/**
 * Phase metadata
 * Static description of each protocol phase
 */
export interface PhaseMetadata {
  /** Phase identifier */
  phase: DebatePhase;

  /** Human-readable phase name */
  name: string;

  /** Round type used to tag messages produced in this phase */
  roundType: RoundType | null;

  /** Roles that take part in this phase */
  participants: Role[];

  /** Whether debater messages in this phase are scored by default */
  scored: boolean;

  /** Description of the phase */
  description: string;
}
