/**
 * Agent Services Barrel Export
 */

// Agent type interfaces
export type {
  AgentContext,
  AgentMetadata,
  JudgeEvaluation,
  DebateAgents,
  DebaterAgent as IDebaterAgent,
  JudgeAgent as IJudgeAgent,
  ModeratorAgent as IModeratorAgent,
} from './types.js';

// Agent implementations
export { ReasoningCapability } from './capability.js';
export type { PromptCall, RenderedPrompt, ReasoningCapabilityOptions } from './capability.js';
export { DebaterAgent } from './debater-agent.js';
export { JudgeAgent, judgeEvaluationSchema } from './judge-agent.js';
export { ModeratorAgent } from './moderator-agent.js';
export { createAgents, isReasoningGateway, shareGateway } from './agent-factory.js';
export type { AgentFactoryOptions } from './agent-factory.js';

// Prompts
export * from './prompts/index.js';
