/**
 * Prompt Library
 */

export { PROMPT_KEYS, PROMPT_VARIABLES } from './types.js';
export type {
  PromptKey,
  PromptTemplates,
  TemplateVariables,
  PromptSlot,
  PromptContext,
  PromptStrategy,
  StrategyKey,
} from './types.js';
export { DEFAULT_PROMPT_TEMPLATES, withDefaultTemplates } from './default-templates.js';
export {
  ROLE_LABELS,
  ROUND_LABELS,
  isPromptKey,
  extractPlaceholders,
  renderTemplate,
  validateTemplates,
  formatTranscript,
} from './template-renderer.js';
export { resolvePromptStrategy, hasPromptStrategy } from './strategies.js';

