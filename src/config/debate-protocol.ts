/**
 * Debate Protocol Configuration
 *
 * Defines the phases of the competition format, who takes part in each,
 * and which transitions the phase controller may take.
 */

import { DebatePhase, Role, RoundType, type DebaterRole, type PhaseMetadata } from '../types/debate.js';
import { InvalidStateError } from '../types/errors.js';

/**
 * Number of cross-examination exchanges
 * Exchange 1: affirmative asks, negative answers. Exchange 2: roles reversed.
 */
export const CROSS_EXAMINATION_ROUNDS = 2;

export function isDebaterRole(role: Role): role is DebaterRole {
  return role === Role.AFFIRMATIVE || role === Role.NEGATIVE;
}

/**
 * The other debating side
 */
export function opponentOf(role: DebaterRole): DebaterRole {
  return role === Role.AFFIRMATIVE ? Role.NEGATIVE : Role.AFFIRMATIVE;
}

/**
 * Who asks in a cross-examination exchange (1-based)
 */
export function crossExamQuestioner(exchange: number): DebaterRole {
  return exchange % 2 === 1 ? Role.AFFIRMATIVE : Role.NEGATIVE;
}

/**
 * Phase configuration map
 */
export const PHASE_CONFIG: Record<DebatePhase, PhaseMetadata> = {
  [DebatePhase.INIT]: {
    phase: DebatePhase.INIT,
    name: 'Introduction',
    roundType: RoundType.OPENING,
    participants: [Role.MODERATOR],
    scored: false,
    description: 'Moderator introduces the topic and the format.',
  },

  [DebatePhase.OPENING]: {
    phase: DebatePhase.OPENING,
    name: 'Opening Statements',
    roundType: RoundType.OPENING,
    participants: [Role.AFFIRMATIVE, Role.NEGATIVE, Role.JUDGE],
    scored: true,
    description: 'Affirmative then negative state their case; each statement is scored immediately.',
  },

  [DebatePhase.CROSS_EXAMINATION]: {
    phase: DebatePhase.CROSS_EXAMINATION,
    name: 'Cross-Examination',
    roundType: RoundType.CROSS_EXAMINATION,
    participants: [Role.AFFIRMATIVE, Role.NEGATIVE],
    scored: false,
    description:
      'Affirmative questions and negative answers, then the roles reverse. ' +
      'Scored only when the rules enable it.',
  },

  [DebatePhase.FREE_DEBATE]: {
    phase: DebatePhase.FREE_DEBATE,
    name: 'Free Debate',
    roundType: RoundType.FREE_DEBATE,
    participants: [Role.AFFIRMATIVE, Role.NEGATIVE, Role.JUDGE],
    scored: true,
    description: 'Alternating statements, one round per iteration, each statement scored.',
  },

  [DebatePhase.CLOSING]: {
    phase: DebatePhase.CLOSING,
    name: 'Closing Statements',
    roundType: RoundType.CLOSING,
    participants: [Role.AFFIRMATIVE, Role.NEGATIVE, Role.JUDGE],
    scored: true,
    description: 'Affirmative then negative summarize; no new arguments.',
  },

  [DebatePhase.JUDGMENT]: {
    phase: DebatePhase.JUDGMENT,
    name: 'Judgment',
    roundType: null,
    participants: [Role.JUDGE],
    scored: false,
    description: 'Totals are computed from every score and the judge explains the verdict.',
  },

  [DebatePhase.TERMINAL]: {
    phase: DebatePhase.TERMINAL,
    name: 'Finished',
    roundType: null,
    participants: [],
    scored: false,
    description: 'Absorbing state; no further agent calls are permitted.',
  },
};

/**
 * Transition map defining valid state transitions
 * Key: from phase, Value: array of allowed destination phases
 */
const TRANSITIONS: ReadonlyMap<DebatePhase, readonly DebatePhase[]> = new Map<DebatePhase, readonly DebatePhase[]>([
  [DebatePhase.INIT, [DebatePhase.OPENING]],
  [DebatePhase.OPENING, [DebatePhase.CROSS_EXAMINATION]],
  [DebatePhase.CROSS_EXAMINATION, [DebatePhase.FREE_DEBATE]],

  // Free debate loops on itself until the round limit is reached
  [DebatePhase.FREE_DEBATE, [DebatePhase.FREE_DEBATE, DebatePhase.CLOSING]],

  [DebatePhase.CLOSING, [DebatePhase.JUDGMENT]],
  [DebatePhase.JUDGMENT, [DebatePhase.TERMINAL]],

  // Terminal state cannot transition to anything
  [DebatePhase.TERMINAL, []],
]);

/**
 * Ordered phase sequence
 */
export const PHASE_SEQUENCE: readonly DebatePhase[] = [
  DebatePhase.INIT,
  DebatePhase.OPENING,
  DebatePhase.CROSS_EXAMINATION,
  DebatePhase.FREE_DEBATE,
  DebatePhase.CLOSING,
  DebatePhase.JUDGMENT,
  DebatePhase.TERMINAL,
];

/**
 * Get phase configuration
 */
export function getPhaseConfig(phase: DebatePhase): PhaseMetadata {
  return PHASE_CONFIG[phase];
}

/**
 * Get the next sequential phase, ignoring the free-debate loop
 * Returns null for TERMINAL
 */
export function getNextPhase(currentPhase: DebatePhase): DebatePhase | null {
  const currentIndex = PHASE_SEQUENCE.indexOf(currentPhase);
  if (currentIndex === -1 || currentIndex === PHASE_SEQUENCE.length - 1) {
    return null;
  }
  return PHASE_SEQUENCE[currentIndex + 1] ?? null;
}

/**
 * Decide where a committed phase leads
 * Only FREE_DEBATE depends on state: it loops while rounds remain
 */
export function resolveNextPhase(
  currentPhase: DebatePhase,
  freeDebateRound: number,
  maxFreeDebateRounds: number
): DebatePhase {
  if (currentPhase === DebatePhase.FREE_DEBATE) {
    return freeDebateRound < maxFreeDebateRounds ? DebatePhase.FREE_DEBATE : DebatePhase.CLOSING;
  }

  const next = getNextPhase(currentPhase);
  if (!next) {
    throw new InvalidStateError(`No transition out of ${currentPhase}`, currentPhase);
  }
  return next;
}

/**
 * Check if a transition is valid
 */
export function isValidPhaseTransition(fromPhase: DebatePhase, toPhase: DebatePhase): boolean {
  const allowedTransitions = TRANSITIONS.get(fromPhase);
  if (!allowedTransitions) {
    return false;
  }
  return allowedTransitions.includes(toPhase);
}

/**
 * Throw InvalidStateError unless the transition is allowed
 */
export function assertValidTransition(fromPhase: DebatePhase, toPhase: DebatePhase): void {
  if (!isValidPhaseTransition(fromPhase, toPhase)) {
    throw new InvalidStateError(`Invalid transition from ${fromPhase} to ${toPhase}`, fromPhase);
  }
}
