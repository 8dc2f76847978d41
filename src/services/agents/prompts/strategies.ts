/**
 * Prompt Dispatch Table
 *
 * Maps (role, round type, slot) to the template and variables used for
 * that prompt. Every agent builds its prompts through this one table.
 */

import { Role, RoundType, VerdictOutcome, type DebaterRole } from '../../../types/debate.js';
import { InvalidStateError } from '../../../types/errors.js';
import { crossExamQuestioner, isDebaterRole, opponentOf } from '../../../config/debate-protocol.js';
import { ROLE_LABELS, ROUND_LABELS, formatTranscript } from './template-renderer.js';
import type {
  PromptContext,
  PromptKey,
  PromptSlot,
  PromptStrategy,
  StrategyKey,
  TemplateVariables,
} from './types.js';

const DEBATERS: readonly Role[] = [Role.AFFIRMATIVE, Role.NEGATIVE];
const STATEMENT_ROUNDS: readonly RoundType[] = [RoundType.OPENING, RoundType.FREE_DEBATE, RoundType.CLOSING];

const OUTCOME_LABELS: Readonly<Record<VerdictOutcome, string>> = {
  [VerdictOutcome.AFFIRMATIVE]: 'Affirmative wins',
  [VerdictOutcome.NEGATIVE]: 'Negative wins',
  [VerdictOutcome.DRAW]: 'Draw',
};

function requireDebater(ctx: PromptContext): DebaterRole {
  if (!isDebaterRole(ctx.role)) {
    throw new InvalidStateError(`${ctx.role} cannot use a debater prompt`, ctx.agent.phase);
  }
  return ctx.role;
}

function debaterVariables(ctx: PromptContext) {
  const role = requireDebater(ctx);
  return {
    topic: ctx.agent.topic,
    position: role === Role.AFFIRMATIVE ? 'for' : 'against',
    positionLabel: ROLE_LABELS[role],
    opponentLabel: ROLE_LABELS[opponentOf(role)],
    history: formatTranscript(ctx.agent.transcript),
  };
}

function targetVariables(ctx: PromptContext) {
  const target = ctx.target;
  if (!target) {
    throw new InvalidStateError('Evaluation prompt needs a target message', ctx.agent.phase);
  }
  return {
    topic: ctx.agent.topic,
    sideLabel: ROLE_LABELS[target.role],
    roundLabel: ROUND_LABELS[target.roundType],
    roundIndex: target.roundIndex,
    statement: target.text,
    history: formatTranscript(ctx.agent.transcript),
  };
}

function template(templateKey: PromptKey, variables: (ctx: PromptContext) => TemplateVariables): PromptStrategy {
  return { templateKey, variables };
}

const STATEMENT_TEMPLATES: ReadonlyArray<readonly [RoundType, PromptKey]> = [
  [RoundType.OPENING, 'debater.opening'],
  [RoundType.FREE_DEBATE, 'debater.free_debate'],
  [RoundType.CLOSING, 'debater.closing'],
];

function strategyId(role: Role, roundType: RoundType | null, slot: PromptSlot): string {
  return `${role}/${roundType ?? '-'}/${slot}`;
}

function buildStrategyTable(): ReadonlyMap<string, PromptStrategy> {
  const table = new Map<string, PromptStrategy>();
  const register = (roles: readonly Role[], roundTypes: readonly (RoundType | null)[], slot: PromptSlot, strategy: PromptStrategy) => {
    for (const role of roles) {
      for (const roundType of roundTypes) {
        table.set(strategyId(role, roundType, slot), strategy);
      }
    }
  };

  // Moderator
  register([Role.MODERATOR], [null], 'system', template('moderator.system', (ctx) => ({
    topic: ctx.agent.topic,
  })));
  register([Role.MODERATOR], [RoundType.OPENING], 'introduction', template('moderator.introduction', (ctx) => ({
    topic: ctx.agent.topic,
    maxFreeDebateRounds: ctx.agent.rules.maxFreeDebateRounds,
  })));

  // Debaters
  register(DEBATERS, [null], 'system', template('debater.system', debaterVariables));
  for (const [roundType, key] of STATEMENT_TEMPLATES) {
    register(DEBATERS, [roundType], 'statement', template(key, (ctx) => ({
      ...debaterVariables(ctx),
      round: ctx.agent.roundIndex,
      maxRounds: ctx.agent.rules.maxFreeDebateRounds,
    })));
  }
  register(DEBATERS, [RoundType.CROSS_EXAMINATION], 'question', template('debater.cross_question', (ctx) => ({
    ...debaterVariables(ctx),
    exchange: ctx.agent.roundIndex,
  })));
  register(DEBATERS, [RoundType.CROSS_EXAMINATION], 'answer', template('debater.cross_answer', (ctx) => ({
    ...debaterVariables(ctx),
    question: ctx.question ?? '',
  })));

  // Judge
  register([Role.JUDGE], [null], 'system', template('judge.system', (ctx) => ({
    topic: ctx.agent.topic,
  })));
  register([Role.JUDGE], STATEMENT_ROUNDS, 'evaluation', template('judge.evaluation', targetVariables));
  register([Role.JUDGE], [RoundType.CROSS_EXAMINATION], 'evaluation', template('judge.cross_examination', (ctx) => ({
    ...targetVariables(ctx),
    exchangePart: ctx.target?.role === crossExamQuestioner(ctx.target?.roundIndex ?? 1) ? 'question' : 'answer',
  })));
  register([Role.JUDGE], [null], 'verdict', template('judge.verdict', (ctx) => {
    const summary = ctx.summary;
    if (!summary) {
      throw new InvalidStateError('Verdict prompt needs a score summary', ctx.agent.phase);
    }
    return {
      topic: ctx.agent.topic,
      affirmativeTotal: summary.affirmativeTotal.toFixed(2),
      negativeTotal: summary.negativeTotal.toFixed(2),
      outcome: OUTCOME_LABELS[summary.winner],
      history: formatTranscript(ctx.agent.transcript),
    };
  }));

  return table;
}

const STRATEGY_TABLE = buildStrategyTable();

/**
 * Look up the strategy for a prompt
 * Throws InvalidStateError when the combination has no prompt
 */
export function resolvePromptStrategy(key: StrategyKey, ctx: PromptContext): PromptStrategy {
  const strategy = STRATEGY_TABLE.get(strategyId(key.role, key.roundType, key.slot));
  if (!strategy) {
    throw new InvalidStateError(
      `No prompt for ${key.role} ${key.slot} in ${key.roundType ?? 'any'} round`,
      ctx.agent.phase
    );
  }
  return strategy;
}

/**
 * Whether a (role, round type, slot) combination has a prompt
 */
export function hasPromptStrategy(key: StrategyKey): boolean {
  return STRATEGY_TABLE.has(strategyId(key.role, key.roundType, key.slot));
}
