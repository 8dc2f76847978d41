/**
 * Debate Services Barrel Export
 *
 * Central export point for all debate-related services
 */

export { DebatePhaseController } from './phase-controller.js';
export type {
  DebatePhaseControllerOptions,
  DebatePhaseControllerEvents,
  RunOptions,
  TurnCompletedEvent,
  PhaseFailedEvent,
  DebateCancelledEvent,
} from './phase-controller.js';

export { TurnManager } from './turn-manager.js';
export type { TurnProgress } from './turn-manager.js';

export {
  createInitialState,
  appendTurnRecords,
  freezeState,
  findUnscoredMessages,
  assertScoringComplete,
  isScoredRound,
  toSerializable,
} from './debate-state.js';
export type { SerializableDebateState } from './debate-state.js';

export { runDebate, toDebateResult } from './run-debate.js';
export type { RunDebateOptions, DebateResult } from './run-debate.js';
