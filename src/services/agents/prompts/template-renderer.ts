/**
 * Template Rendering and Validation
 */

import { ConfigurationError } from '../../../types/errors.js';
import { Role, RoundType, type DebateMessage } from '../../../types/debate.js';
import { PROMPT_KEYS, PROMPT_VARIABLES, type PromptKey, type PromptTemplates, type TemplateVariables } from './types.js';

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Keys that are only needed when cross-examination is scored
 */
const CONDITIONAL_KEYS: ReadonlySet<PromptKey> = new Set<PromptKey>(['judge.cross_examination']);

export const ROLE_LABELS: Readonly<Record<Role, string>> = {
  [Role.MODERATOR]: 'Moderator',
  [Role.AFFIRMATIVE]: 'Affirmative',
  [Role.NEGATIVE]: 'Negative',
  [Role.JUDGE]: 'Judge',
};

export const ROUND_LABELS: Readonly<Record<RoundType, string>> = {
  [RoundType.OPENING]: 'Opening',
  [RoundType.CROSS_EXAMINATION]: 'Cross-examination',
  [RoundType.FREE_DEBATE]: 'Free debate',
  [RoundType.CLOSING]: 'Closing',
};

export function isPromptKey(key: string): key is PromptKey {
  return PROMPT_KEYS.some((known) => known === key);
}

/**
 * Placeholder names used by a template, in order of first appearance
 */
export function extractPlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Replace `{name}` placeholders with their values
 */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string) => {
    const value = variables[name];
    if (value === undefined) {
      throw new ConfigurationError('Template variable not provided', [`${placeholder}`]);
    }
    return String(value);
  });
}

/**
 * Check a template set before any phase runs
 * Throws ConfigurationError listing every problem
 */
export function validateTemplates(
  templates: PromptTemplates,
  options: { scoreCrossExamination: boolean }
): void {
  const problems: string[] = [];

  for (const key of PROMPT_KEYS) {
    const required = !CONDITIONAL_KEYS.has(key) || options.scoreCrossExamination;
    const template = templates[key];
    if (template === undefined) {
      if (required) {
        problems.push(`${key}: template is missing`);
      }
      continue;
    }
    if (template.trim() === '') {
      problems.push(`${key}: template is empty`);
      continue;
    }

    const allowed = PROMPT_VARIABLES[key];
    for (const name of extractPlaceholders(template)) {
      if (!allowed.includes(name)) {
        problems.push(`${key}: unknown placeholder {${name}} (allowed: ${allowed.join(', ')})`);
      }
    }
  }

  for (const key of Object.keys(templates)) {
    if (!isPromptKey(key)) {
      problems.push(`${key}: unknown template key`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError('Invalid prompt templates', problems);
  }
}

/**
 * Render transcript history with labelled speakers
 */
export function formatTranscript(
  messages: readonly DebateMessage[],
  options: { includeModerator?: boolean } = {}
): string {
  const visible = options.includeModerator
    ? messages
    : messages.filter((message) => message.role !== Role.MODERATOR);

  if (visible.length === 0) {
    return '(no prior messages)';
  }

  return visible
    .map((message) => {
      const round = message.roundIndex > 0
        ? `${ROUND_LABELS[message.roundType]} ${message.roundIndex}`
        : ROUND_LABELS[message.roundType];
      return `[${ROLE_LABELS[message.role]} | ${round}] ${message.text}`;
    })
    .join('\n\n');
}
