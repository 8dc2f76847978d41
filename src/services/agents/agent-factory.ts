/**
 * Agent Factory
 *
 * Composes one ReasoningCapability into each role agent.
 */

import { Role } from '../../types/debate.js';
import type { ReasoningGateway, RoleGateways } from '../../types/llm.js';
import { LLMGateway } from '../llm/gateway.js';
import { ReasoningCapability } from './capability.js';
import { DebaterAgent } from './debater-agent.js';
import { JudgeAgent } from './judge-agent.js';
import { ModeratorAgent } from './moderator-agent.js';
import type { PromptTemplates } from './prompts/types.js';
import type { DebateAgents } from './types.js';

export interface AgentFactoryOptions {
  gateways: RoleGateways;
  templates: PromptTemplates;
}

/**
 * Single gateway or one per role
 */
export function isReasoningGateway(gateway: ReasoningGateway | RoleGateways): gateway is ReasoningGateway {
  return 'invoke' in gateway && typeof gateway.invoke === 'function';
}

/**
 * Use the same gateway for every role
 */
export function shareGateway(gateway: ReasoningGateway): RoleGateways {
  return {
    [Role.MODERATOR]: gateway,
    [Role.AFFIRMATIVE]: gateway,
    [Role.NEGATIVE]: gateway,
    [Role.JUDGE]: gateway,
  };
}

export function createAgents(options: AgentFactoryOptions): DebateAgents {
  const capability = (role: Role) => {
    const gateway = options.gateways[role];
    return new ReasoningCapability({
      role,
      gateway,
      templates: options.templates,
      model: gateway instanceof LLMGateway ? gateway.getModel() : undefined,
    });
  };

  return {
    moderator: new ModeratorAgent(capability(Role.MODERATOR)),
    affirmative: new DebaterAgent(Role.AFFIRMATIVE, capability(Role.AFFIRMATIVE)),
    negative: new DebaterAgent(Role.NEGATIVE, capability(Role.NEGATIVE)),
    judge: new JudgeAgent(capability(Role.JUDGE)),
  };
}
