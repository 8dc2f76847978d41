/**
 * Role Agent Tests
 *
 * Prompt assembly through the capability and parsing of agent output
 */

import { describe, it, expect } from 'vitest';
import { createAgents, shareGateway } from '../src/services/agents/agent-factory.js';
import { judgeEvaluationSchema } from '../src/services/agents/judge-agent.js';
import { DEFAULT_PROMPT_TEMPLATES } from '../src/services/agents/prompts/default-templates.js';
import type { AgentContext } from '../src/services/agents/types.js';
import { resolveDebateRules } from '../src/config/debate-rules.js';
import { LLMGateway } from '../src/services/llm/gateway.js';
import {
  DebatePhase,
  Role,
  RoundType,
  VerdictOutcome,
  type DebateMessage,
} from '../src/types/debate.js';
import { InvalidStateError, ParseError, PermanentCallError } from '../src/types/errors.js';
import type { LLMResponse } from '../src/types/llm.js';
import { FakeGateway, TEST_TOPIC, type FakeGatewayOptions } from './helpers/fake-gateway.js';

function context(overrides: Partial<AgentContext> = {}): AgentContext {
  return {
    debateId: 'test-debate',
    topic: TEST_TOPIC,
    phase: DebatePhase.OPENING,
    roundType: RoundType.OPENING,
    roundIndex: 1,
    transcript: [],
    crossExams: [],
    rules: resolveDebateRules({ maxFreeDebateRounds: 1 }),
    ...overrides,
  };
}

function setup(options: FakeGatewayOptions = {}) {
  const gateway = new FakeGateway(options);
  const agents = createAgents({ gateways: shareGateway(gateway), templates: DEFAULT_PROMPT_TEMPLATES });
  return { gateway, agents };
}

const affirmativeOpening: DebateMessage = {
  role: Role.AFFIRMATIVE,
  roundType: RoundType.OPENING,
  roundIndex: 1,
  text: 'X causes measurable harm.',
  timestamp: new Date('2024-01-01T00:00:00Z'),
};

describe('DebaterAgent', () => {
  it('should build the statement prompt for its side and trim the reply', async () => {
    const { gateway, agents } = setup({ text: () => '  Ban it now.  ' });

    const statement = await agents.affirmative.makeStatement(context());

    expect(statement).toBe('Ban it now.');
    expect(gateway.calls).toHaveLength(1);
    const call = gateway.calls[0];
    expect(call?.role).toBe(Role.AFFIRMATIVE);
    expect(call?.responseMode).toBe('text');
    expect(call?.systemPrompt).toContain('You are the Affirmative side in a formal competitive debate.');
    expect(call?.prompt).toContain('**PHASE: Opening Statement**');
    expect(call?.prompt).toContain('You are the Affirmative side and argue for the topic.');
  });

  it('should argue against the topic on the negative side', async () => {
    const { gateway, agents } = setup();

    await agents.negative.makeStatement(context({ roundType: RoundType.CLOSING }));

    expect(gateway.calls[0]?.prompt).toContain('**PHASE: Closing Statement**');
    expect(gateway.calls[0]?.prompt).toContain('You are the Negative side and argue against the topic.');
  });

  it('should reject an empty reply', async () => {
    const { agents } = setup({ text: () => '   ' });

    await expect(agents.affirmative.makeStatement(context())).rejects.toBeInstanceOf(ParseError);
  });

  it('should refuse statements outside statement rounds', async () => {
    const { gateway, agents } = setup();

    await expect(
      agents.affirmative.makeStatement(context({ roundType: RoundType.CROSS_EXAMINATION }))
    ).rejects.toBeInstanceOf(InvalidStateError);
    expect(gateway.calls).toHaveLength(0);
  });

  it('should quote the question when answering', async () => {
    const { gateway, agents } = setup();

    await agents.negative.answerQuestion(
      context({ phase: DebatePhase.CROSS_EXAMINATION, roundType: RoundType.CROSS_EXAMINATION }),
      'What evidence shows harm?'
    );

    expect(gateway.calls[0]?.prompt).toContain('The Affirmative side asks:\n\n"What evidence shows harm?"');
  });

  it('should ask questions for the current exchange', async () => {
    const { gateway, agents } = setup();

    await agents.negative.askQuestion(
      context({ phase: DebatePhase.CROSS_EXAMINATION, roundType: RoundType.CROSS_EXAMINATION, roundIndex: 2 })
    );

    expect(gateway.calls[0]?.prompt).toContain('**PHASE: Cross-Examination (exchange 2)**');
    expect(gateway.calls[0]?.prompt).toContain('Ask the Affirmative side one pointed question.');
  });

  it('should propagate gateway failures unchanged', async () => {
    const failure = new PermanentCallError('Invalid API key', 'authentication', { statusCode: 401 });
    const { agents } = setup({ fail: () => failure });

    await expect(agents.affirmative.makeStatement(context())).rejects.toBe(failure);
  });
});

describe('JudgeAgent', () => {
  it('should request a structured evaluation of the target message', async () => {
    const { gateway, agents } = setup({
      structured: () => ({ logic: 80, evidence: 70, rebuttal: 75, expression: 85, rationale: '  Strong start.  ' }),
    });

    const evaluation = await agents.judge.evaluate(context({ transcript: [] }), affirmativeOpening);

    expect(evaluation).toEqual({ logic: 80, evidence: 70, rebuttal: 75, expression: 85, rationale: 'Strong start.' });
    const call = gateway.calls[0];
    expect(call?.role).toBe(Role.JUDGE);
    expect(call?.responseMode).toBe('structured');
    expect(call?.prompt).toContain('Score the following Opening speech (round 1) by the Affirmative side.');
    expect(call?.prompt).toContain('"""\nX causes measurable harm.\n"""');
  });

  it('should accept numeric strings and a missing rationale', async () => {
    const { agents } = setup({
      structured: () => ({ logic: '78', evidence: '70', rebuttal: 72, expression: 80 }),
    });

    const evaluation = await agents.judge.evaluate(context(), affirmativeOpening);

    expect(evaluation).toEqual({ logic: 78, evidence: 70, rebuttal: 72, expression: 80, rationale: '' });
  });

  it('should fail with ParseError when a sub-score is missing', async () => {
    const { agents } = setup({ structured: () => ({ logic: 80, rebuttal: 75, expression: 85 }) });

    const error = await agents.judge.evaluate(context(), affirmativeOpening).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/^evidence: /);
      expect(error.rawOutput).toBe('{"logic":80,"rebuttal":75,"expression":85}');
    }
  });

  it('should fail with ParseError when a sub-score is out of range', async () => {
    const { agents } = setup({ structured: () => ({ logic: 120, evidence: 70, rebuttal: 75, expression: 85 }) });

    await expect(agents.judge.evaluate(context(), affirmativeOpening)).rejects.toBeInstanceOf(ParseError);
  });

  it('should explain the verdict from the score summary', async () => {
    const { gateway, agents } = setup({ text: () => 'Both sides were close.' });

    const rationale = await agents.judge.writeVerdictRationale(context({ phase: DebatePhase.JUDGMENT, roundType: null }), {
      affirmativeTotal: 309,
      negativeTotal: 303,
      affirmativeTurns: 4,
      negativeTurns: 4,
      winner: VerdictOutcome.DRAW,
      relativeDifference: 6 / 309,
    });

    expect(rationale).toBe('Both sides were close.');
    expect(gateway.calls[0]?.prompt).toContain('- Affirmative: 309.00\n- Negative: 303.00\nOutcome: Draw');
  });

  it('should ask for plain text in the verdict call', async () => {
    const { gateway, agents } = setup({ text: () => 'The affirmative carried the closing.' });

    await agents.judge.writeVerdictRationale(context({ phase: DebatePhase.JUDGMENT, roundType: null }), {
      affirmativeTotal: 309,
      negativeTotal: 290,
      affirmativeTurns: 4,
      negativeTurns: 4,
      winner: VerdictOutcome.AFFIRMATIVE,
      relativeDifference: 19 / 309,
    });

    const call = gateway.calls[0];
    expect(call?.responseMode).toBe('text');
    expect(call?.systemPrompt).toBe(
      `You are the judge of a formal competitive debate on: "${TEST_TOPIC}".\n` +
        'You score each speech impartially on logic, evidence, rebuttal and expression.'
    );
    expect(call?.prompt).not.toContain('JSON');
  });

  it('should ask for JSON in the evaluation prompt itself', async () => {
    const { gateway, agents } = setup();

    await agents.judge.evaluate(context(), affirmativeOpening);

    expect(gateway.calls[0]?.systemPrompt).not.toContain('JSON');
    expect(gateway.calls[0]?.prompt).toContain('Respond with JSON only');
  });
});

describe('ModeratorAgent', () => {
  it('should introduce the topic and the format', async () => {
    const { gateway, agents } = setup({ text: () => 'Welcome to the debate.' });

    const introduction = await agents.moderator.introduce(context({ phase: DebatePhase.INIT, roundIndex: 0 }));

    expect(introduction).toBe('Welcome to the debate.');
    expect(gateway.calls[0]?.role).toBe(Role.MODERATOR);
    expect(gateway.calls[0]?.systemPrompt).toBe(
      `You are the moderator of a formal competitive debate on: "${TEST_TOPIC}".\nYou are neutral. You never argue for either side.`
    );
    expect(gateway.calls[0]?.prompt).toContain('1 free-debate round(s)');
  });

  it('should cap the introduction length', async () => {
    const { gateway, agents } = setup();

    await agents.moderator.introduce(context({ phase: DebatePhase.INIT, roundIndex: 0 }));

    expect(gateway.calls[0]?.maxTokens).toBe(300);
    expect(gateway.calls[0]?.temperature).toBeUndefined();
  });
});

describe('createAgents', () => {
  it('should report the model of LLM gateways in metadata', () => {
    const transport = {
      complete: async (): Promise<LLMResponse> => ({
        content: 'ok',
        model: 'judge-model',
        usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        finishReason: 'stop',
        protocol: 'openai-compatible',
      }),
    };
    const agents = createAgents({
      gateways: shareGateway(new LLMGateway({ transport, model: 'judge-model' })),
      templates: DEFAULT_PROMPT_TEMPLATES,
    });

    expect(agents.judge.getMetadata()).toEqual({
      name: 'Judge',
      role: Role.JUDGE,
      model: 'judge-model',
      capabilities: ['scoring', 'verdict'],
    });
    expect(agents.negative.getMetadata().name).toBe('Negative Debater');
  });

  it('should leave the model unset for other gateways', () => {
    const { agents } = setup();

    expect(agents.moderator.getMetadata().model).toBeUndefined();
  });
});

describe('judgeEvaluationSchema', () => {
  it('should reject blank strings instead of reading them as zero', () => {
    expect(judgeEvaluationSchema.safeParse({ logic: '', evidence: 1, rebuttal: 1, expression: 1 }).success).toBe(false);
  });
});
