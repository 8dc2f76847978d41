/**
 * Debate Phase Controller
 *
 * Drives a debate through the competition protocol. Turns run one at a
 * time against a phase draft; the draft replaces the committed state only
 * when the whole phase (or one free-debate round) has succeeded. A failed
 * turn discards the draft, so the committed state is always the last
 * fully completed phase.
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import {
  DebatePhase,
  Role,
  type CrossExamination,
  type DebateMessage,
  type DebateState,
  type DebaterRole,
  type PhaseTransitionEvent,
  RoundType,
} from '../../types/debate.js';
import { ConfigurationError, InvalidStateError } from '../../types/errors.js';
import type { ReasoningGateway, RoleGateways } from '../../types/llm.js';
import type {
  PhaseExecutionPlan,
  Turn,
  TurnOutcome,
  TurnStepResult,
} from '../../types/orchestrator.js';
import { resolveDebateRules, type DebateRules, type DebateRulesInput } from '../../config/debate-rules.js';
import {
  assertValidTransition,
  isDebaterRole,
  opponentOf,
  resolveNextPhase,
} from '../../config/debate-protocol.js';
import { createAgents, isReasoningGateway, shareGateway } from '../agents/agent-factory.js';
import { DEFAULT_PROMPT_TEMPLATES } from '../agents/prompts/default-templates.js';
import { validateTemplates } from '../agents/prompts/template-renderer.js';
import type { PromptTemplates } from '../agents/prompts/types.js';
import type { AgentContext, DebateAgents, DebaterAgent } from '../agents/types.js';
import { buildVerdict, scoreEvaluation, summarizeScores } from '../scoring/scoring-engine.js';
import { createDebateLogger, loggers } from '../logging/index.js';
import {
  appendTurnRecords,
  assertScoringComplete,
  createInitialState,
  freezeState,
} from './debate-state.js';
import { TurnManager } from './turn-manager.js';

/**
 * Controller construction options
 */
export interface DebatePhaseControllerOptions {
  topic: string;
  /** One gateway for every role, or one per role */
  gateway: ReasoningGateway | RoleGateways;
  /** Defaults to DEFAULT_PROMPT_TEMPLATES */
  templates?: PromptTemplates;
  rules?: DebateRulesInput;
  debateId?: string;
}

export interface RunOptions {
  /** Aborting cancels the run between turns */
  signal?: AbortSignal;
}

export interface TurnCompletedEvent {
  debateId: string;
  phase: DebatePhase;
  turn: Turn;
  outcome: TurnOutcome;
  /**
   * Phase draft after the turn, or the committed state when the turn
   * completed its phase
   */
  snapshot: DebateState;
}

export interface PhaseFailedEvent {
  debateId: string;
  phase: DebatePhase;
  turn: Turn | null;
  error: unknown;
}

export interface DebateCancelledEvent {
  debateId: string;
  phase: DebatePhase;
  /** Last committed state */
  snapshot: DebateState;
}

/**
 * Events emitted by the controller
 */
export interface DebatePhaseControllerEvents {
  turn_completed: (event: TurnCompletedEvent) => void;
  phase_transition: (event: PhaseTransitionEvent) => void;
  completed: (state: DebateState) => void;
  phase_failed: (event: PhaseFailedEvent) => void;
  cancelled: (event: DebateCancelledEvent) => void;
}

/**
 * In-progress phase
 */
interface PhaseDraft {
  /** Committed state the draft started from */
  base: DebateState;
  state: DebateState;
  plan: PhaseExecutionPlan;
  startedAt: number;
}

const EMPTY_OUTCOME: TurnOutcome = Object.freeze({ messages: [], scores: [], crossExams: [] });

export class DebatePhaseController extends EventEmitter {
  private state: DebateState;
  private draft: PhaseDraft | null = null;
  private busy = false;
  private cancelled = false;
  private readonly rules: DebateRules;
  private readonly agents: DebateAgents;
  private readonly turnManager: TurnManager;
  private readonly logger: Logger;

  /**
   * Validate rules and templates and prepare the agents
   * Throws ConfigurationError before any phase runs
   */
  constructor(options: DebatePhaseControllerOptions) {
    super();

    const topic = options.topic.trim();
    if (!topic) {
      throw new ConfigurationError('Invalid debate topic', ['topic: must not be empty']);
    }

    this.rules = resolveDebateRules(options.rules);
    const templates = options.templates ?? DEFAULT_PROMPT_TEMPLATES;
    validateTemplates(templates, { scoreCrossExamination: this.rules.scoreCrossExamination });

    const gateways = isReasoningGateway(options.gateway) ? shareGateway(options.gateway) : options.gateway;
    this.agents = createAgents({ gateways, templates });
    this.turnManager = new TurnManager(this.rules);
    this.state = createInitialState(topic, options.debateId);
    this.logger = createDebateLogger(this.state.debateId);

    this.logger.info({
      topic,
      maxFreeDebateRounds: this.rules.maxFreeDebateRounds,
      scoreCrossExamination: this.rules.scoreCrossExamination,
    }, 'Phase controller created');
  }

  /**
   * Frozen committed state
   */
  getState(): DebateState {
    return this.state;
  }

  getCurrentPhase(): DebatePhase {
    return this.state.currentPhase;
  }

  getRules(): Readonly<DebateRules> {
    return this.rules;
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Plan for the phase the committed state is in
   */
  getPhaseExecutionPlan(): PhaseExecutionPlan {
    return this.turnManager.getPhaseExecutionPlan(this.state.currentPhase, this.state.freeDebateRound);
  }

  /**
   * Run exactly one turn
   * Commits the phase when the turn was its last one
   */
  async step(): Promise<TurnStepResult> {
    this.assertCanStep();
    this.cancelled = false;
    return this.guardedStep();
  }

  /**
   * Step until the current phase commits
   */
  async runPhase(): Promise<DebateState> {
    this.assertCanStep();
    this.cancelled = false;

    let result: TurnStepResult;
    do {
      result = await this.guardedStep();
    } while (!result.committed && !this.cancelled);

    return this.state;
  }

  /**
   * Step until TERMINAL or cancellation
   * Resumes from the last committed phase when called again
   */
  async run(options: RunOptions = {}): Promise<DebateState> {
    this.assertCanStep();
    const { signal } = options;
    this.cancelled = false;

    const onAbort = () => this.cancel();
    if (signal?.aborted) {
      this.cancel();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    loggers.debateLifecycle(this.state.debateId, 'started', { phase: this.state.currentPhase });

    try {
      while (!this.cancelled && this.state.currentPhase !== DebatePhase.TERMINAL) {
        await this.guardedStep();
      }
    } catch (error) {
      loggers.debateLifecycle(this.state.debateId, 'failed', {
        phase: this.state.currentPhase,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (!this.cancelled) {
      loggers.debateLifecycle(this.state.debateId, 'completed', {
        winner: this.state.verdict?.winner,
        affirmativeTotal: this.state.verdict?.affirmativeTotal,
        negativeTotal: this.state.verdict?.negativeTotal,
      });
    }

    return this.state;
  }

  /**
   * Stop between turns; the uncommitted draft is dropped
   */
  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;

    // A turn in flight finishes first; its draft is dropped afterwards
    if (!this.busy) {
      this.discardDraft();
    }

    loggers.debateLifecycle(this.state.debateId, 'cancelled', { phase: this.state.currentPhase });
    this.emit('cancelled', {
      debateId: this.state.debateId,
      phase: this.state.currentPhase,
      snapshot: this.state,
    });
  }

  private assertCanStep(): void {
    if (this.busy) {
      throw new InvalidStateError('A step is already in progress', this.state.currentPhase);
    }
    if (this.state.currentPhase === DebatePhase.TERMINAL) {
      throw new InvalidStateError('Debate has already finished', DebatePhase.TERMINAL);
    }
  }

  private async guardedStep(): Promise<TurnStepResult> {
    this.assertCanStep();
    this.busy = true;

    const draft = this.draft ?? this.openDraft();
    const turn = this.turnManager.getCurrentTurn();

    try {
      return await this.executeStep(draft, turn);
    } catch (error) {
      this.discardDraft();
      loggers.error(
        `Phase ${draft.plan.phase} failed`,
        error instanceof Error ? error : new Error(String(error)),
        { debateId: this.state.debateId, phase: draft.plan.phase, turn: turn?.turnNumber }
      );
      this.emit('phase_failed', {
        debateId: this.state.debateId,
        phase: draft.plan.phase,
        turn,
        error,
      });
      throw error;
    } finally {
      this.busy = false;
    }
  }

  private async executeStep(draft: PhaseDraft, turn: Turn | null): Promise<TurnStepResult> {
    const phase = draft.plan.phase;

    // Nothing left to run (free debate at its limit)
    if (!turn) {
      return { phase, turn: null, outcome: EMPTY_OUTCOME, committed: true, snapshot: this.commit(draft) };
    }

    const outcome = await this.executeTurn(turn, draft.state);
    draft.state = appendTurnRecords(draft.state, outcome);
    this.turnManager.advanceTurn();

    this.logger.debug({
      phase,
      turn: turn.turnNumber,
      speaker: turn.speaker,
      kind: turn.kind,
    }, 'Turn completed');

    // The last turn of a phase reports the committed state, never the draft
    if (this.turnManager.isPhaseComplete()) {
      const committed = this.commit(draft);
      this.emitTurnCompleted(phase, turn, outcome, committed);
      return { phase, turn, outcome, committed: true, snapshot: committed };
    }

    this.emitTurnCompleted(phase, turn, outcome, draft.state);

    if (this.cancelled) {
      this.discardDraft();
      return { phase, turn, outcome, committed: false, snapshot: this.state };
    }

    return { phase, turn, outcome, committed: false, snapshot: draft.state };
  }

  private emitTurnCompleted(phase: DebatePhase, turn: Turn, outcome: TurnOutcome, snapshot: DebateState): void {
    const event: TurnCompletedEvent = { debateId: snapshot.debateId, phase, turn, outcome, snapshot };
    this.emit('turn_completed', event);
  }

  private openDraft(): PhaseDraft {
    const plan = this.getPhaseExecutionPlan();
    this.turnManager.beginPhase(plan);

    const draft: PhaseDraft = { base: this.state, state: this.state, plan, startedAt: Date.now() };
    this.draft = draft;

    this.logger.debug({ phase: plan.phase, turns: plan.turns.length }, 'Phase started');
    return draft;
  }

  private discardDraft(): void {
    if (this.draft) {
      this.logger.debug({ phase: this.draft.plan.phase }, 'Phase draft discarded');
    }
    this.draft = null;
    this.turnManager.reset();
  }

  /**
   * Replace the committed state with a completed draft
   */
  private commit(draft: PhaseDraft): DebateState {
    const fromPhase = draft.plan.phase;

    // Compare-and-swap: the draft must start from the current committed state
    if (draft.base !== this.state || this.state.currentPhase !== fromPhase) {
      throw new InvalidStateError('Committed state changed while the phase was running', fromPhase);
    }

    assertScoringComplete(draft.state, this.rules, fromPhase);

    const freeDebateRound = fromPhase === DebatePhase.FREE_DEBATE && draft.plan.turns.length > 0
      ? draft.state.freeDebateRound + 1
      : draft.state.freeDebateRound;
    const toPhase = resolveNextPhase(fromPhase, freeDebateRound, this.rules.maxFreeDebateRounds);
    assertValidTransition(fromPhase, toPhase);

    if ((toPhase === DebatePhase.TERMINAL) !== (draft.state.verdict !== null)) {
      throw new InvalidStateError('Verdict must be recorded exactly when the debate terminates', fromPhase);
    }

    const committed = freezeState({ ...draft.state, freeDebateRound, currentPhase: toPhase });
    this.state = committed;
    this.draft = null;
    this.turnManager.reset();

    const phaseElapsedMs = Date.now() - draft.startedAt;
    loggers.stateTransition(committed.debateId, fromPhase, toPhase, phaseElapsedMs);

    const event: PhaseTransitionEvent = {
      debateId: committed.debateId,
      fromPhase,
      toPhase,
      timestamp: new Date(),
      phaseElapsedMs,
      snapshot: committed,
    };
    this.emit('phase_transition', event);

    if (toPhase === DebatePhase.TERMINAL) {
      this.emit('completed', committed);
    }

    return committed;
  }

  private buildContext(state: DebateState, turn: Turn): AgentContext {
    return {
      debateId: state.debateId,
      topic: state.topic,
      phase: state.currentPhase,
      roundType: turn.roundType,
      roundIndex: turn.roundIndex,
      transcript: state.transcript,
      crossExams: state.crossExams,
      rules: this.rules,
    };
  }

  private async executeTurn(turn: Turn, state: DebateState): Promise<TurnOutcome> {
    const context = this.buildContext(state, turn);

    switch (turn.kind) {
      case 'introduction': {
        const text = await this.agents.moderator.introduce(context);
        return { messages: [this.createMessage(Role.MODERATOR, turn, text)], scores: [], crossExams: [] };
      }

      case 'statement': {
        const debater = this.debaterFor(turn.speaker);
        const text = await debater.makeStatement(context);
        return this.withScore(context, turn, this.createMessage(debater.role, turn, text), []);
      }

      case 'cross_question': {
        const debater = this.debaterFor(turn.speaker);
        const text = await debater.askQuestion(context);
        return this.withScore(context, turn, this.createMessage(debater.role, turn, text), []);
      }

      case 'cross_answer': {
        const debater = this.debaterFor(turn.speaker);
        const questioner = opponentOf(debater.role);
        const question = this.findQuestion(state, questioner, turn.roundIndex);
        const text = await debater.answerQuestion(context, question.text);
        const message = this.createMessage(debater.role, turn, text);

        const exam: CrossExamination = Object.freeze({
          roundIndex: turn.roundIndex,
          questioner,
          answerer: debater.role,
          question: question.text,
          answer: text,
          timestamp: message.timestamp,
        });
        return this.withScore(context, turn, message, [exam]);
      }

      case 'verdict': {
        const summary = summarizeScores(state.scores, this.rules);
        const rationale = await this.agents.judge.writeVerdictRationale(context, summary);
        return { messages: [], scores: [], crossExams: [], verdict: buildVerdict(summary, rationale) };
      }
    }
  }

  /**
   * Score the message before the next turn when the turn requires it
   */
  private async withScore(
    context: AgentContext,
    turn: Turn,
    message: DebateMessage,
    crossExams: CrossExamination[]
  ): Promise<TurnOutcome> {
    if (!turn.scored) {
      return { messages: [message], scores: [], crossExams };
    }

    if (!isDebaterRole(message.role)) {
      throw new InvalidStateError(`${message.role} messages are never scored`, context.phase);
    }

    const evaluation = await this.agents.judge.evaluate(context, message);
    const score = scoreEvaluation(
      evaluation,
      { role: message.role, roundType: message.roundType, roundIndex: message.roundIndex },
      this.rules.scoringWeights
    );

    loggers.scoreRecorded({
      debateId: context.debateId,
      role: score.role,
      roundType: score.roundType,
      roundIndex: score.roundIndex,
      total: score.total,
    });

    return { messages: [message], scores: [score], crossExams };
  }

  private createMessage(role: Role, turn: Turn, text: string): DebateMessage {
    return Object.freeze({
      role,
      roundType: this.requireRoundType(turn),
      roundIndex: turn.roundIndex,
      text,
      timestamp: new Date(),
    });
  }

  private requireRoundType(turn: Turn): RoundType {
    if (turn.roundType === null) {
      throw new InvalidStateError(`Turn ${turn.turnNumber} produces no message`, this.state.currentPhase);
    }
    return turn.roundType;
  }

  private debaterFor(role: Role): DebaterAgent {
    if (role === Role.AFFIRMATIVE) return this.agents.affirmative;
    if (role === Role.NEGATIVE) return this.agents.negative;
    throw new InvalidStateError(`${role} is not a debater`, this.state.currentPhase);
  }

  private findQuestion(state: DebateState, questioner: DebaterRole, exchange: number): DebateMessage {
    for (let index = state.transcript.length - 1; index >= 0; index--) {
      const message = state.transcript[index];
      if (
        message &&
        message.role === questioner &&
        message.roundType === RoundType.CROSS_EXAMINATION &&
        message.roundIndex === exchange
      ) {
        return message;
      }
    }
    throw new InvalidStateError(`No question found for cross-examination exchange ${exchange}`, state.currentPhase);
  }
}
