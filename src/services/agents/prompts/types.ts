/**
 * Prompt Template Type Definitions
 *
 * Keys, placeholders and strategy shapes for the prompt dispatch table.
 */

import type { DebateMessage, Role, RoundType } from '../../../types/debate.js';
import type { AgentContext } from '../types.js';
import type { ScoreSummary } from '../../scoring/scoring-engine.js';

/**
 * Every template key the engine knows, as `<agent>.<slot>`
 */
export const PROMPT_KEYS = [
  'moderator.system',
  'moderator.introduction',
  'debater.system',
  'debater.opening',
  'debater.free_debate',
  'debater.closing',
  'debater.cross_question',
  'debater.cross_answer',
  'judge.system',
  'judge.evaluation',
  'judge.cross_examination',
  'judge.verdict',
] as const;

export type PromptKey = (typeof PROMPT_KEYS)[number];

/**
 * Externally supplied templates, keyed by PromptKey
 * Values use `{variable}` placeholders
 */
export type PromptTemplates = Readonly<Record<string, string>>;

/**
 * Values substituted into a template
 */
export type TemplateVariables = Readonly<Record<string, string | number>>;

/**
 * Placeholders each template may use
 */
export const PROMPT_VARIABLES: Readonly<Record<PromptKey, readonly string[]>> = {
  'moderator.system': ['topic'],
  'moderator.introduction': ['topic', 'maxFreeDebateRounds'],
  'debater.system': ['topic', 'position', 'positionLabel', 'opponentLabel'],
  'debater.opening': ['topic', 'position', 'positionLabel'],
  'debater.free_debate': ['topic', 'position', 'positionLabel', 'history', 'round', 'maxRounds'],
  'debater.closing': ['topic', 'position', 'positionLabel', 'history'],
  'debater.cross_question': ['topic', 'positionLabel', 'opponentLabel', 'history', 'exchange'],
  'debater.cross_answer': ['topic', 'positionLabel', 'opponentLabel', 'history', 'question'],
  'judge.system': ['topic'],
  'judge.evaluation': ['topic', 'sideLabel', 'roundLabel', 'roundIndex', 'statement', 'history'],
  'judge.cross_examination': ['topic', 'sideLabel', 'exchangePart', 'roundIndex', 'statement', 'history'],
  'judge.verdict': ['topic', 'affirmativeTotal', 'negativeTotal', 'outcome', 'history'],
};

/**
 * Which part of a role's work a prompt is for
 */
export type PromptSlot =
  | 'system'
  | 'introduction'
  | 'statement'
  | 'question'
  | 'answer'
  | 'evaluation'
  | 'verdict';

/**
 * Everything a strategy may read when building its variables
 */
export interface PromptContext {
  agent: AgentContext;
  /** Role the prompt is written for */
  role: Role;
  /** Question being answered (cross-examination answers) */
  question?: string;
  /** Message under evaluation (judge) */
  target?: DebateMessage;
  /** Score totals (verdict rationale) */
  summary?: ScoreSummary;
}

/**
 * Prompt-building strategy: which template to use and how to fill it
 */
export interface PromptStrategy {
  templateKey: PromptKey;
  variables(ctx: PromptContext): TemplateVariables;
}

/**
 * Dispatch key components
 */
export interface StrategyKey {
  role: Role;
  roundType: RoundType | null;
  slot: PromptSlot;
}
