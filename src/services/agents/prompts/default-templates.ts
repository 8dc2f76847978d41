/**
 * Default Prompt Templates
 *
 * The template set used when the caller does not supply one.
 */

import type { PromptKey, PromptTemplates } from './types.js';

const DEBATER_RULES = `**Rules:**
- Stay on the topic and on your side of it
- Support claims with reasoning or evidence
- Address the strongest version of the opposing case
- No personal attacks`;

export const DEFAULT_PROMPT_TEMPLATES: Readonly<Record<PromptKey, string>> = Object.freeze({
  'moderator.system': `You are the moderator of a formal competitive debate on: "{topic}".
You are neutral. You never argue for either side.`,

  'moderator.introduction': `Open the debate on the topic "{topic}".

Introduce the two sides (Affirmative argues for, Negative argues against) and the format:
opening statements, two cross-examination exchanges, {maxFreeDebateRounds} free-debate round(s),
closing statements, then the judge's verdict.

Keep it under 150 words.`,

  'debater.system': `You are the {positionLabel} side in a formal competitive debate.
Topic: "{topic}"
You argue {position} the topic. Your opponent is the {opponentLabel} side.

${DEBATER_RULES}`,

  'debater.opening': `**PHASE: Opening Statement**

Topic: "{topic}"
You are the {positionLabel} side and argue {position} the topic.

State your position clearly, preview your two or three strongest arguments,
and make any key assumptions explicit. Do not rebut; nobody has spoken yet.
Keep it under 300 words.`,

  'debater.free_debate': `**PHASE: Free Debate (round {round} of {maxRounds})**

Topic: "{topic}"
You are the {positionLabel} side and argue {position} the topic.

Debate so far:
{history}

Respond to your opponent's most recent points, then advance your case.
Keep it under 200 words.`,

  'debater.closing': `**PHASE: Closing Statement**

Topic: "{topic}"
You are the {positionLabel} side and argue {position} the topic.

Debate so far:
{history}

Summarize why your side should win. Introduce no new arguments.
Keep it under 250 words.`,

  'debater.cross_question': `**PHASE: Cross-Examination (exchange {exchange})**

Topic: "{topic}"
You are the {positionLabel} side. Ask the {opponentLabel} side one pointed question.

Debate so far:
{history}

Target a weakness or an unstated assumption in their case.
Reply with the question only.`,

  'debater.cross_answer': `**PHASE: Cross-Examination**

Topic: "{topic}"
You are the {positionLabel} side. The {opponentLabel} side asks:

"{question}"

Debate so far:
{history}

Answer directly and honestly, then defend your position. Keep it under 150 words.`,

  'judge.system': `You are the judge of a formal competitive debate on: "{topic}".
You score each speech impartially on logic, evidence, rebuttal and expression.`,

  'judge.evaluation': `Score the following {roundLabel} speech (round {roundIndex}) by the {sideLabel} side.

Topic: "{topic}"

Earlier debate:
{history}

Speech to score:
"""
{statement}
"""

Score each criterion from 0 to 100 and give a one or two sentence rationale.
Respond with JSON only, in this exact shape:
{"logic": 0, "evidence": 0, "rebuttal": 0, "expression": 0, "rationale": "..."}`,

  'judge.cross_examination': `Score the following cross-examination {exchangePart} (exchange {roundIndex}) by the {sideLabel} side.

Topic: "{topic}"

Earlier debate:
{history}

Contribution to score:
"""
{statement}
"""

Score each criterion from 0 to 100 and give a one or two sentence rationale.
Respond with JSON only, in this exact shape:
{"logic": 0, "evidence": 0, "rebuttal": 0, "expression": 0, "rationale": "..."}`,

  'judge.verdict': `The debate on "{topic}" has ended.

Final weighted totals:
- Affirmative: {affirmativeTotal}
- Negative: {negativeTotal}
Outcome: {outcome}

Full debate:
{history}

Explain this outcome in under 200 words, naming the moments that decided it.`,
});

/**
 * Defaults with caller overrides applied on top
 */
export function withDefaultTemplates(overrides: PromptTemplates = {}): PromptTemplates {
  return { ...DEFAULT_PROMPT_TEMPLATES, ...overrides };
}
