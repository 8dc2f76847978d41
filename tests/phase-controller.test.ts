/**
 * Debate Phase Controller Tests
 *
 * Covers:
 * - Phase order and the free-debate loop
 * - Scoring before the next turn
 * - Phase atomicity on failure and resuming afterwards
 * - Terminal state, concurrent steps and cancellation
 * - Configuration errors raised before any phase runs
 */

import { describe, it, expect, afterEach } from 'vitest';
import { DebatePhaseController } from '../src/services/debate/phase-controller.js';
import { DEFAULT_PROMPT_TEMPLATES } from '../src/services/agents/prompts/default-templates.js';
import {
  DebatePhase,
  Role,
  RoundType,
  VerdictOutcome,
  type DebateState,
  type PhaseTransitionEvent,
} from '../src/types/debate.js';
import {
  ConfigurationError,
  InvalidStateError,
  ParseError,
  PermanentCallError,
} from '../src/types/errors.js';
import type { ReasoningCallRequest } from '../src/types/llm.js';
import { FakeGateway, TEST_TOPIC, type FakeGatewayOptions } from './helpers/fake-gateway.js';

const authFailure = () => new PermanentCallError('Invalid API key', 'authentication', { statusCode: 401 });

const isNegativeEvaluation = (request: ReasoningCallRequest) =>
  request.role === Role.JUDGE && request.prompt.includes('by the Negative side');

describe('DebatePhaseController', () => {
  const controllers: DebatePhaseController[] = [];

  function createController(
    options: FakeGatewayOptions = {},
    rules: { maxFreeDebateRounds?: number; scoreCrossExamination?: boolean } = {}
  ) {
    const gateway = new FakeGateway(options);
    const controller = new DebatePhaseController({
      topic: TEST_TOPIC,
      gateway,
      rules: { maxFreeDebateRounds: 1, ...rules },
      debateId: 'test-debate',
    });
    controllers.push(controller);
    return { gateway, controller };
  }

  afterEach(() => {
    // Remove all listeners to prevent memory leaks
    for (const controller of controllers.splice(0)) {
      controller.removeAllListeners();
    }
  });

  describe('constructor', () => {
    it('should start at INIT with an empty state', () => {
      const { controller, gateway } = createController();

      expect(controller.getCurrentPhase()).toBe(DebatePhase.INIT);
      expect(controller.getState().transcript).toEqual([]);
      expect(controller.getState().debateId).toBe('test-debate');
      expect(controller.isCancelled()).toBe(false);
      expect(gateway.calls).toHaveLength(0);
    });

    it('should reject an empty topic', () => {
      expect(() => new DebatePhaseController({ topic: '   ', gateway: new FakeGateway() }))
        .toThrow(ConfigurationError);
    });

    it('should reject invalid rules before any call', () => {
      const gateway = new FakeGateway();

      expect(() => new DebatePhaseController({
        topic: TEST_TOPIC,
        gateway,
        rules: { scoringWeights: { logic: 0.9 } },
      })).toThrow(ConfigurationError);
      expect(gateway.calls).toHaveLength(0);
    });

    it('should reject incomplete templates before any call', () => {
      const templates: Record<string, string> = { ...DEFAULT_PROMPT_TEMPLATES };
      delete templates['debater.closing'];

      expect(() => new DebatePhaseController({ topic: TEST_TOPIC, gateway: new FakeGateway(), templates }))
        .toThrow('debater.closing: template is missing');
    });

    it('should require the cross-examination judge template when it is scored', () => {
      const templates: Record<string, string> = { ...DEFAULT_PROMPT_TEMPLATES };
      delete templates['judge.cross_examination'];

      expect(() => new DebatePhaseController({ topic: TEST_TOPIC, gateway: new FakeGateway(), templates }))
        .not.toThrow();
      expect(() => new DebatePhaseController({
        topic: TEST_TOPIC,
        gateway: new FakeGateway(),
        templates,
        rules: { scoreCrossExamination: true },
      })).toThrow(ConfigurationError);
    });
  });

  describe('run', () => {
    it('should run every phase in order and finish at TERMINAL', async () => {
      const { controller, gateway } = createController();
      const transitions: Array<[DebatePhase, DebatePhase]> = [];
      controller.on('phase_transition', (event: PhaseTransitionEvent) => {
        transitions.push([event.fromPhase, event.toPhase]);
      });

      const state = await controller.run();

      expect(transitions).toEqual([
        [DebatePhase.INIT, DebatePhase.OPENING],
        [DebatePhase.OPENING, DebatePhase.CROSS_EXAMINATION],
        [DebatePhase.CROSS_EXAMINATION, DebatePhase.FREE_DEBATE],
        [DebatePhase.FREE_DEBATE, DebatePhase.CLOSING],
        [DebatePhase.CLOSING, DebatePhase.JUDGMENT],
        [DebatePhase.JUDGMENT, DebatePhase.TERMINAL],
      ]);
      expect(state.currentPhase).toBe(DebatePhase.TERMINAL);
      expect(state.freeDebateRound).toBe(1);
      expect(gateway.calls).toHaveLength(18);
    });

    it('should produce the protocol transcript', async () => {
      const { controller } = createController();

      const state = await controller.run();

      expect(state.transcript.map((message) => [message.role, message.roundType, message.roundIndex])).toEqual([
        [Role.MODERATOR, RoundType.OPENING, 0],
        [Role.AFFIRMATIVE, RoundType.OPENING, 1],
        [Role.NEGATIVE, RoundType.OPENING, 1],
        [Role.AFFIRMATIVE, RoundType.CROSS_EXAMINATION, 1],
        [Role.NEGATIVE, RoundType.CROSS_EXAMINATION, 1],
        [Role.NEGATIVE, RoundType.CROSS_EXAMINATION, 2],
        [Role.AFFIRMATIVE, RoundType.CROSS_EXAMINATION, 2],
        [Role.AFFIRMATIVE, RoundType.FREE_DEBATE, 1],
        [Role.NEGATIVE, RoundType.FREE_DEBATE, 1],
        [Role.AFFIRMATIVE, RoundType.CLOSING, 1],
        [Role.NEGATIVE, RoundType.CLOSING, 1],
      ]);
    });

    it.each([0, 1, 3])('should run exactly %i free-debate rounds', async (maxFreeDebateRounds) => {
      const { controller } = createController({}, { maxFreeDebateRounds });

      const state = await controller.run();

      const freeDebateMessages = state.transcript.filter((message) => message.roundType === RoundType.FREE_DEBATE);
      expect(state.freeDebateRound).toBe(maxFreeDebateRounds);
      expect(freeDebateMessages).toHaveLength(2 * maxFreeDebateRounds);
      expect(state.transcript).toHaveLength(1 + 2 + 4 + 2 * maxFreeDebateRounds + 2);
      expect(state.verdict).not.toBeNull();
    });

    it('should score each statement before the next turn', async () => {
      const { controller, gateway } = createController();

      await controller.run();

      expect(gateway.calls.slice(0, 9).map((call) => call.role)).toEqual([
        Role.MODERATOR,
        Role.AFFIRMATIVE,
        Role.JUDGE,
        Role.NEGATIVE,
        Role.JUDGE,
        Role.AFFIRMATIVE,
        Role.NEGATIVE,
        Role.NEGATIVE,
        Role.AFFIRMATIVE,
      ]);
      const negativeOpeningEvaluation = gateway.calls[4];
      expect(negativeOpeningEvaluation?.responseMode).toBe('structured');
      expect(negativeOpeningEvaluation?.prompt).toContain('Earlier debate:\n[Affirmative | Opening 1] affirmative says #2\n');
      expect(negativeOpeningEvaluation?.prompt).toContain('"""\nnegative says #4\n"""');
    });

    it('should record one score per scored message and a verdict', async () => {
      const { controller } = createController();

      const state = await controller.run();

      expect(state.scores.map((score) => [score.role, score.roundType, score.roundIndex])).toEqual([
        [Role.AFFIRMATIVE, RoundType.OPENING, 1],
        [Role.NEGATIVE, RoundType.OPENING, 1],
        [Role.AFFIRMATIVE, RoundType.FREE_DEBATE, 1],
        [Role.NEGATIVE, RoundType.FREE_DEBATE, 1],
        [Role.AFFIRMATIVE, RoundType.CLOSING, 1],
        [Role.NEGATIVE, RoundType.CLOSING, 1],
      ]);
      expect(state.scores[0]?.total).toBeCloseTo(74.5, 6);
      expect(state.verdict).toEqual({
        affirmativeTotal: expect.closeTo(223.5, 6),
        negativeTotal: expect.closeTo(223.5, 6),
        winner: VerdictOutcome.DRAW,
        rationale: 'judge says #18',
      });
    });

    it('should pair cross-examination questions with their answers', async () => {
      const { controller } = createController();

      const state = await controller.run();

      expect(state.crossExams).toHaveLength(2);
      expect(state.crossExams[0]).toMatchObject({
        roundIndex: 1,
        questioner: Role.AFFIRMATIVE,
        answerer: Role.NEGATIVE,
        question: 'affirmative says #6',
        answer: 'negative says #7',
      });
      expect(state.crossExams[1]).toMatchObject({
        roundIndex: 2,
        questioner: Role.NEGATIVE,
        answerer: Role.AFFIRMATIVE,
        question: 'negative says #8',
        answer: 'affirmative says #9',
      });
    });

    it('should score cross-examination when enabled', async () => {
      const { controller, gateway } = createController({}, { scoreCrossExamination: true });

      const state = await controller.run();

      expect(state.scores).toHaveLength(10);
      expect(state.scores.filter((score) => score.roundType === RoundType.CROSS_EXAMINATION)).toHaveLength(4);
      const judgePrompts = gateway.callsFor(Role.JUDGE).map((call) => call.prompt);
      expect(judgePrompts.some((prompt) =>
        prompt.includes('Score the following cross-examination question (exchange 1) by the Affirmative side.')
      )).toBe(true);
      expect(judgePrompts.some((prompt) =>
        prompt.includes('Score the following cross-examination answer (exchange 2) by the Affirmative side.')
      )).toBe(true);
    });

    it('should emit completed once with the final state', async () => {
      const { controller } = createController();
      const completed: DebateState[] = [];
      controller.on('completed', (state: DebateState) => completed.push(state));

      const state = await controller.run();

      expect(completed).toEqual([state]);
    });

    it('should freeze every committed snapshot', async () => {
      const { controller } = createController();
      const snapshots: DebateState[] = [];
      controller.on('phase_transition', (event: PhaseTransitionEvent) => snapshots.push(event.snapshot));

      await controller.run();

      expect(snapshots).toHaveLength(6);
      for (const snapshot of snapshots) {
        expect(Object.isFrozen(snapshot)).toBe(true);
        expect(Object.isFrozen(snapshot.transcript)).toBe(true);
        expect(Object.isFrozen(snapshot.scores)).toBe(true);
      }
      expect(snapshots[1]?.transcript).toHaveLength(3);
      expect(snapshots[1]?.currentPhase).toBe(DebatePhase.CROSS_EXAMINATION);
    });
  });

  describe('step', () => {
    it('should commit INIT in one step', async () => {
      const { controller } = createController();

      const result = await controller.step();

      expect(result.committed).toBe(true);
      expect(result.phase).toBe(DebatePhase.INIT);
      expect(result.turn?.kind).toBe('introduction');
      expect(result.outcome.messages[0]?.role).toBe(Role.MODERATOR);
      expect(result.snapshot.currentPhase).toBe(DebatePhase.OPENING);
      expect(controller.getState()).toBe(result.snapshot);
    });

    it('should expose the draft without committing mid-phase', async () => {
      const { controller } = createController();
      await controller.step();
      const committed = controller.getState();

      const result = await controller.step();

      expect(result.committed).toBe(false);
      expect(result.outcome.messages).toHaveLength(1);
      expect(result.outcome.scores).toHaveLength(1);
      expect(result.snapshot.transcript).toHaveLength(2);
      expect(result.snapshot.currentPhase).toBe(DebatePhase.OPENING);
      expect(controller.getState()).toBe(committed);
      expect(controller.getState().transcript).toHaveLength(1);
    });

    it('should commit an empty free-debate phase without calling agents', async () => {
      const { controller, gateway } = createController({}, { maxFreeDebateRounds: 0 });
      while (controller.getCurrentPhase() !== DebatePhase.FREE_DEBATE) {
        await controller.step();
      }
      const callsBefore = gateway.calls.length;

      const result = await controller.step();

      expect(result.turn).toBeNull();
      expect(result.committed).toBe(true);
      expect(result.snapshot.currentPhase).toBe(DebatePhase.CLOSING);
      expect(result.snapshot.freeDebateRound).toBe(0);
      expect(gateway.calls).toHaveLength(callsBefore);
    });

    it('should reject a second step while one is in flight', async () => {
      const { controller } = createController();

      const first = controller.step();
      await expect(controller.step()).rejects.toThrow('A step is already in progress');
      const result = await first;

      expect(result.committed).toBe(true);
      expect(controller.getState().transcript).toHaveLength(1);
    });

    it('should emit turn_completed for every turn', async () => {
      const { controller } = createController();
      const kinds: string[] = [];
      controller.on('turn_completed', (event: { turn: { kind: string } }) => kinds.push(event.turn.kind));

      await controller.run();

      expect(kinds).toHaveLength(12);
      expect(kinds[0]).toBe('introduction');
      expect(kinds[11]).toBe('verdict');
    });

    it('should only publish a verdict in TERMINAL snapshots', async () => {
      const { controller } = createController();
      const snapshots: Array<{ kind: string; snapshot: DebateState }> = [];
      controller.on('turn_completed', (event: { turn: { kind: string }; snapshot: DebateState }) => {
        snapshots.push({ kind: event.turn.kind, snapshot: event.snapshot });
      });

      await controller.run();

      for (const { snapshot } of snapshots) {
        expect(snapshot.verdict !== null).toBe(snapshot.currentPhase === DebatePhase.TERMINAL);
      }
      const verdictTurn = snapshots[snapshots.length - 1];
      expect(verdictTurn?.kind).toBe('verdict');
      expect(verdictTurn?.snapshot.currentPhase).toBe(DebatePhase.TERMINAL);
      expect(verdictTurn?.snapshot).toBe(controller.getState());
    });

    it('should report the committed state for the last turn of a phase', async () => {
      const { controller } = createController();
      const phases: DebatePhase[] = [];
      controller.on('turn_completed', (event: { snapshot: DebateState }) => phases.push(event.snapshot.currentPhase));

      await controller.runPhase();
      await controller.runPhase();

      expect(phases).toEqual([DebatePhase.OPENING, DebatePhase.OPENING, DebatePhase.CROSS_EXAMINATION]);
    });

    it('should step a single phase with runPhase', async () => {
      const { controller } = createController();
      await controller.runPhase();

      const state = await controller.runPhase();

      expect(state.currentPhase).toBe(DebatePhase.CROSS_EXAMINATION);
      expect(state.scores).toHaveLength(2);
    });

    it('should plan the current phase', async () => {
      const { controller } = createController();
      await controller.runPhase();

      const plan = controller.getPhaseExecutionPlan();

      expect(plan.phase).toBe(DebatePhase.OPENING);
      expect(plan.turns).toHaveLength(2);
    });
  });

  describe('failure handling', () => {
    it('should leave the state untouched when a scored phase fails', async () => {
      let armed = true;
      const { controller } = createController({
        fail: (request) => (armed && isNegativeEvaluation(request) ? authFailure() : undefined),
      });
      await controller.step();
      const before = controller.getState();

      const error = await controller.run().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(PermanentCallError);
      expect(controller.getState()).toBe(before);
      expect(controller.getState().transcript).toHaveLength(1);
      expect(controller.getState().scores).toHaveLength(0);
      expect(controller.getCurrentPhase()).toBe(DebatePhase.OPENING);

      armed = false;
      const state = await controller.run();

      expect(state.currentPhase).toBe(DebatePhase.TERMINAL);
      expect(state.transcript).toHaveLength(11);
      expect(state.scores).toHaveLength(6);
    });

    it('should surface the original error and emit phase_failed', async () => {
      const failure = authFailure();
      const { controller } = createController({
        fail: (request) => (request.role === Role.NEGATIVE ? failure : undefined),
      });
      const failures: Array<{ phase: DebatePhase; error: unknown }> = [];
      controller.on('phase_failed', (event: { phase: DebatePhase; error: unknown }) => failures.push(event));

      await expect(controller.run()).rejects.toBe(failure);

      expect(failures).toHaveLength(1);
      expect(failures[0]?.phase).toBe(DebatePhase.OPENING);
      expect(failures[0]?.error).toBe(failure);
    });

    it('should roll back a failed cross-examination', async () => {
      let armed = true;
      const { controller } = createController({
        fail: (request) =>
          armed && request.role === Role.AFFIRMATIVE && request.prompt.includes('asks:') ? authFailure() : undefined,
      });

      await expect(controller.run()).rejects.toBeInstanceOf(PermanentCallError);

      expect(controller.getCurrentPhase()).toBe(DebatePhase.CROSS_EXAMINATION);
      expect(controller.getState().transcript).toHaveLength(3);
      expect(controller.getState().crossExams).toHaveLength(0);

      armed = false;
      await controller.runPhase();
      expect(controller.getState().crossExams).toHaveLength(2);
    });

    it('should keep earlier free-debate rounds when a later round fails', async () => {
      let armed = true;
      const { controller } = createController(
        {
          fail: (request) =>
            armed && isNegativeEvaluation(request) && request.prompt.includes('Free debate speech (round 2)')
              ? authFailure()
              : undefined,
        },
        { maxFreeDebateRounds: 2 }
      );

      await expect(controller.run()).rejects.toBeInstanceOf(PermanentCallError);

      const state = controller.getState();
      expect(state.currentPhase).toBe(DebatePhase.FREE_DEBATE);
      expect(state.freeDebateRound).toBe(1);
      expect(state.transcript).toHaveLength(9);
      expect(state.transcript.filter((message) => message.roundIndex === 2 && message.roundType === RoundType.FREE_DEBATE))
        .toHaveLength(0);
      expect(state.scores).toHaveLength(4);
      expect(state.scores.filter((entry) => entry.roundType === RoundType.FREE_DEBATE)).toHaveLength(2);

      armed = false;
      const finalState = await controller.run();

      expect(finalState.freeDebateRound).toBe(2);
      expect(finalState.transcript).toHaveLength(13);
      expect(finalState.scores).toHaveLength(8);
    });

    it('should leave JUDGMENT without a verdict when the verdict call fails', async () => {
      let armed = true;
      const { controller } = createController({
        fail: (request) =>
          armed && request.role === Role.JUDGE && request.responseMode === 'text' ? authFailure() : undefined,
      });

      await expect(controller.run()).rejects.toBeInstanceOf(PermanentCallError);

      expect(controller.getCurrentPhase()).toBe(DebatePhase.JUDGMENT);
      expect(controller.getState().verdict).toBeNull();
      expect(controller.getState().transcript).toHaveLength(11);
      expect(controller.getState().scores).toHaveLength(6);

      armed = false;
      const state = await controller.run();

      expect(state.currentPhase).toBe(DebatePhase.TERMINAL);
      expect(state.verdict?.winner).toBe(VerdictOutcome.DRAW);
    });

    it('should treat invalid judge output as a failed phase', async () => {
      const { controller } = createController({ structured: () => ({ logic: 'excellent' }) });
      await controller.step();

      await expect(controller.runPhase()).rejects.toBeInstanceOf(ParseError);

      expect(controller.getState().transcript).toHaveLength(1);
      expect(controller.getCurrentPhase()).toBe(DebatePhase.OPENING);
    });
  });

  describe('terminal state', () => {
    it('should refuse further steps and keep the state', async () => {
      const { controller, gateway } = createController();
      const finalState = await controller.run();
      const calls = gateway.calls.length;

      const error = await controller.step().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(InvalidStateError);
      if (error instanceof InvalidStateError) {
        expect(error.message).toBe('Debate has already finished');
        expect(error.phase).toBe(DebatePhase.TERMINAL);
      }
      await expect(controller.run()).rejects.toBeInstanceOf(InvalidStateError);
      await expect(controller.runPhase()).rejects.toBeInstanceOf(InvalidStateError);
      expect(controller.getState()).toBe(finalState);
      expect(gateway.calls).toHaveLength(calls);
    });
  });

  describe('cancellation', () => {
    it('should stop between turns and drop the unfinished phase', async () => {
      const { controller } = createController();
      let cancelledOnce = false;
      controller.on('turn_completed', (event: { phase: DebatePhase }) => {
        if (!cancelledOnce && event.phase === DebatePhase.OPENING) {
          cancelledOnce = true;
          controller.cancel();
        }
      });
      const cancelledEvents: unknown[] = [];
      controller.on('cancelled', (event: unknown) => cancelledEvents.push(event));

      const state = await controller.run();

      expect(controller.isCancelled()).toBe(true);
      expect(cancelledEvents).toHaveLength(1);
      expect(state.currentPhase).toBe(DebatePhase.OPENING);
      expect(state.transcript).toHaveLength(1);
      expect(state.scores).toHaveLength(0);
    });

    it('should resume from the last committed phase', async () => {
      const { controller } = createController();
      let cancelledOnce = false;
      controller.on('turn_completed', () => {
        if (!cancelledOnce && controller.getCurrentPhase() === DebatePhase.CROSS_EXAMINATION) {
          cancelledOnce = true;
          controller.cancel();
        }
      });
      await controller.run();
      expect(controller.getCurrentPhase()).toBe(DebatePhase.CROSS_EXAMINATION);

      const state = await controller.run();

      expect(controller.isCancelled()).toBe(false);
      expect(state.currentPhase).toBe(DebatePhase.TERMINAL);
      expect(state.transcript).toHaveLength(11);
      expect(state.crossExams).toHaveLength(2);
    });

    it('should cancel through an abort signal and keep the committed phase', async () => {
      const { controller } = createController();
      const abortController = new AbortController();
      controller.on('phase_transition', (event: PhaseTransitionEvent) => {
        if (event.toPhase === DebatePhase.CROSS_EXAMINATION) {
          abortController.abort();
        }
      });

      const state = await controller.run({ signal: abortController.signal });

      expect(state.currentPhase).toBe(DebatePhase.CROSS_EXAMINATION);
      expect(state.transcript).toHaveLength(3);
      expect(state.scores).toHaveLength(2);
    });

    it('should not start when the signal is already aborted', async () => {
      const { controller, gateway } = createController();
      const abortController = new AbortController();
      abortController.abort();

      const state = await controller.run({ signal: abortController.signal });

      expect(state.currentPhase).toBe(DebatePhase.INIT);
      expect(gateway.calls).toHaveLength(0);
    });
  });
});
