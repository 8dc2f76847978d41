/**
 * Debate State
 *
 * Construction and snapshot-then-replace updates of the aggregate state.
 * Every function returns a new frozen object; nothing here mutates.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  DebatePhase,
  RoundType,
  type CrossExamination,
  type DebateMessage,
  type DebateScore,
  type DebateState,
  type DebateVerdict,
} from '../../types/debate.js';
import { InvalidStateError } from '../../types/errors.js';
import type { TurnOutcome } from '../../types/orchestrator.js';
import type { DebateRules } from '../../config/debate-rules.js';
import { isDebaterRole } from '../../config/debate-protocol.js';

/**
 * Freeze a state and everything it holds
 */
export function freezeState(state: DebateState): DebateState {
  for (const message of state.transcript) Object.freeze(message);
  for (const exam of state.crossExams) Object.freeze(exam);
  for (const score of state.scores) Object.freeze(score);
  if (state.verdict) Object.freeze(state.verdict);

  return Object.freeze({
    ...state,
    transcript: Object.freeze([...state.transcript]),
    crossExams: Object.freeze([...state.crossExams]),
    scores: Object.freeze([...state.scores]),
  });
}

/**
 * Fresh state at INIT
 */
export function createInitialState(topic: string, debateId: string = uuidv4()): DebateState {
  return freezeState({
    debateId,
    topic,
    transcript: [],
    crossExams: [],
    scores: [],
    freeDebateRound: 0,
    currentPhase: DebatePhase.INIT,
    verdict: null,
  });
}

/**
 * New state with a turn's records appended
 */
export function appendTurnRecords(state: DebateState, outcome: TurnOutcome): DebateState {
  if (outcome.verdict && state.verdict) {
    throw new InvalidStateError('Verdict has already been recorded', state.currentPhase);
  }

  return freezeState({
    ...state,
    transcript: [...state.transcript, ...outcome.messages],
    crossExams: [...state.crossExams, ...outcome.crossExams],
    scores: [...state.scores, ...outcome.scores],
    verdict: outcome.verdict ?? state.verdict,
  });
}

/**
 * Whether debater messages in a round type must be scored
 */
export function isScoredRound(roundType: RoundType, rules: Pick<DebateRules, 'scoreCrossExamination'>): boolean {
  if (roundType === RoundType.CROSS_EXAMINATION) {
    return rules.scoreCrossExamination;
  }
  return true;
}

function sameTarget(score: DebateScore, message: DebateMessage): boolean {
  return (
    score.role === message.role &&
    score.roundType === message.roundType &&
    score.roundIndex === message.roundIndex
  );
}

/**
 * Debater messages in scored rounds without exactly one matching score
 */
export function findUnscoredMessages(
  state: DebateState,
  rules: Pick<DebateRules, 'scoreCrossExamination'>
): DebateMessage[] {
  return state.transcript.filter((message) => {
    if (!isDebaterRole(message.role) || !isScoredRound(message.roundType, rules)) {
      return false;
    }
    const matches = state.scores.filter((score) => sameTarget(score, message)).length;
    return matches !== 1;
  });
}

/**
 * Throw InvalidStateError if any scored message lacks its score
 */
export function assertScoringComplete(
  state: DebateState,
  rules: Pick<DebateRules, 'scoreCrossExamination'>,
  phase: DebatePhase = state.currentPhase
): void {
  const unscored = findUnscoredMessages(state, rules);
  if (unscored.length > 0) {
    const targets = unscored.map((message) => `${message.role}/${message.roundType}#${message.roundIndex}`);
    throw new InvalidStateError(`Messages without exactly one score: ${targets.join(', ')}`, phase);
  }
}

/**
 * JSON-friendly view of a state
 */
export interface SerializableDebateState {
  debateId: string;
  topic: string;
  currentPhase: DebatePhase;
  freeDebateRound: number;
  transcript: Array<Omit<DebateMessage, 'timestamp'> & { timestamp: string }>;
  crossExams: Array<Omit<CrossExamination, 'timestamp'> & { timestamp: string }>;
  scores: DebateScore[];
  verdict: DebateVerdict | null;
}

export function toSerializable(state: DebateState): SerializableDebateState {
  return {
    debateId: state.debateId,
    topic: state.topic,
    currentPhase: state.currentPhase,
    freeDebateRound: state.freeDebateRound,
    transcript: state.transcript.map((message) => ({ ...message, timestamp: message.timestamp.toISOString() })),
    crossExams: state.crossExams.map((exam) => ({ ...exam, timestamp: exam.timestamp.toISOString() })),
    scores: state.scores.map((score) => ({ ...score })),
    verdict: state.verdict ? { ...state.verdict } : null,
  };
}
