/**
 * Debate engine
 * Public entry point
 */

export * from './types/debate.js';
export * from './types/errors.js';
export type { Turn, TurnKind, PhaseExecutionPlan, TurnOutcome, TurnStepResult } from './types/orchestrator.js';
export type {
  LLMProviderName,
  ProviderProtocol,
  LLMProviderSettings,
  ReasoningCallRequest,
  ReasoningCallResult,
  ReasoningGateway,
  RoleGateways,
  RetryConfig,
} from './types/llm.js';

export {
  DEFAULT_DEBATE_RULES,
  DEFAULT_SCORING_WEIGHTS,
  resolveDebateRules,
  loadDebateRulesFromEnv,
} from './config/debate-rules.js';
export type { DebateRules, DebateRulesInput, ScoringWeights } from './config/debate-rules.js';
export {
  CROSS_EXAMINATION_ROUNDS,
  PHASE_CONFIG,
  PHASE_SEQUENCE,
  getPhaseConfig,
  isValidPhaseTransition,
} from './config/debate-protocol.js';

export * from './services/debate/index.js';
export * from './services/scoring/index.js';
export {
  LLMGateway,
  OpenAITransport,
  AnthropicTransport,
  createRoleGateways,
  loadLLMConfig,
  validateLLMConfig,
} from './services/llm/index.js';
export type { LLMConfig, LLMGatewayOptions, LLMTransport } from './services/llm/index.js';
export {
  DEFAULT_PROMPT_TEMPLATES,
  PROMPT_KEYS,
  withDefaultTemplates,
  validateTemplates,
} from './services/agents/index.js';
export type { PromptKey, PromptTemplates } from './services/agents/index.js';
export { logger } from './services/logging/index.js';
