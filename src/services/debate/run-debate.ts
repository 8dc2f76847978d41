/**
 * Run a complete debate with gateways built from the environment
 */

import {
  DebatePhase,
  Role,
  RoundType,
  type CrossExamination,
  type DebateMessage,
  type DebateScore,
  type DebateState,
  type DebateVerdict,
  type DebaterRole,
} from '../../types/debate.js';
import type { ReasoningGateway, RoleGateways } from '../../types/llm.js';
import { loadDebateRulesFromEnv, type DebateRulesInput } from '../../config/debate-rules.js';
import { loadLLMConfig, type LLMConfig } from '../../config/llm.js';
import { createRoleGateways } from '../llm/role-gateways.js';
import type { PromptTemplates } from '../agents/prompts/types.js';
import { startTimer } from '../logging/index.js';
import { DebatePhaseController } from './phase-controller.js';

export interface RunDebateOptions {
  /** Overrides applied on top of DEBATE_* environment rules */
  rules?: DebateRulesInput;
  templates?: PromptTemplates;
  /** Used to build per-role gateways when no gateway is given */
  llmConfig?: LLMConfig;
  /** Skips provider configuration entirely */
  gateway?: ReasoningGateway | RoleGateways;
  debateId?: string;
  signal?: AbortSignal;
}

export interface DebateResult {
  debateId: string;
  topic: string;
  /** False when the run was cancelled before the verdict */
  completed: boolean;
  finalPhase: DebatePhase;
  transcript: readonly DebateMessage[];
  crossExams: readonly CrossExamination[];
  scores: readonly DebateScore[];
  openingStatements: Record<DebaterRole, string | null>;
  closingStatements: Record<DebaterRole, string | null>;
  verdict: DebateVerdict | null;
}

function statementOf(state: DebateState, role: DebaterRole, roundType: RoundType): string | null {
  const message = state.transcript.find((entry) => entry.role === role && entry.roundType === roundType);
  return message?.text ?? null;
}

/**
 * Flatten a state into the result returned to callers
 */
export function toDebateResult(state: DebateState): DebateResult {
  return {
    debateId: state.debateId,
    topic: state.topic,
    completed: state.currentPhase === DebatePhase.TERMINAL,
    finalPhase: state.currentPhase,
    transcript: state.transcript,
    crossExams: state.crossExams,
    scores: state.scores,
    openingStatements: {
      [Role.AFFIRMATIVE]: statementOf(state, Role.AFFIRMATIVE, RoundType.OPENING),
      [Role.NEGATIVE]: statementOf(state, Role.NEGATIVE, RoundType.OPENING),
    },
    closingStatements: {
      [Role.AFFIRMATIVE]: statementOf(state, Role.AFFIRMATIVE, RoundType.CLOSING),
      [Role.NEGATIVE]: statementOf(state, Role.NEGATIVE, RoundType.CLOSING),
    },
    verdict: state.verdict,
  };
}

export async function runDebate(topic: string, options: RunDebateOptions = {}): Promise<DebateResult> {
  const gateway = options.gateway ?? createRoleGateways(options.llmConfig ?? loadLLMConfig());

  const controller = new DebatePhaseController({
    topic,
    gateway,
    templates: options.templates,
    rules: { ...loadDebateRulesFromEnv(), ...options.rules },
    debateId: options.debateId,
  });

  const endTimer = startTimer();
  const state = await controller.run({ signal: options.signal });
  endTimer('debate_run', { debateId: state.debateId, finalPhase: state.currentPhase });

  return toDebateResult(state);
}
