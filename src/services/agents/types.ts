/**
 * Agent Type Interfaces
 *
 * Contracts for the role agents. Agents read a slice of the debate state
 * and return new content; they never mutate state.
 */

import type {
  CrossExamination,
  DebateMessage,
  DebatePhase,
  DebaterRole,
  Role,
  RoundType,
  SubScores,
} from '../../types/debate.js';
import type { DebateRules } from '../../config/debate-rules.js';
import type { ScoreSummary } from '../scoring/scoring-engine.js';

/**
 * Agent context - read-only view handed to an agent for one call
 */
export interface AgentContext {
  /** Unique debate identifier */
  debateId: string;

  /** Topic being debated */
  topic: string;

  /** Phase the turn belongs to */
  phase: DebatePhase;

  /** Round type of the message being produced (null for the verdict) */
  roundType: RoundType | null;

  /** Round index of the message being produced */
  roundIndex: number;

  /** Messages so far, in order */
  transcript: readonly DebateMessage[];

  /** Completed cross-examination exchanges */
  crossExams: readonly CrossExamination[];

  rules: Readonly<DebateRules>;
}

/**
 * Agent metadata
 */
export interface AgentMetadata {
  name: string;
  role: Role;
  model?: string;
  capabilities: string[];
}

/**
 * Judge output for one message, before weighting
 */
export interface JudgeEvaluation extends SubScores {
  rationale: string;
}

/**
 * Affirmative or negative debater
 */
export interface DebaterAgent {
  readonly role: DebaterRole;

  /** Opening, free-debate or closing statement, per context.roundType */
  makeStatement(context: AgentContext): Promise<string>;

  /** Cross-examination question for the opponent */
  askQuestion(context: AgentContext): Promise<string>;

  /** Answer to the opponent's cross-examination question */
  answerQuestion(context: AgentContext, question: string): Promise<string>;

  getMetadata(): AgentMetadata;
}

/**
 * Judge
 */
export interface JudgeAgent {
  readonly role: Role.JUDGE;

  /** Score one debater message */
  evaluate(context: AgentContext, target: DebateMessage): Promise<JudgeEvaluation>;

  /** Explain the final outcome */
  writeVerdictRationale(context: AgentContext, summary: ScoreSummary): Promise<string>;

  getMetadata(): AgentMetadata;
}

/**
 * Moderator
 */
export interface ModeratorAgent {
  readonly role: Role.MODERATOR;

  /** Introduce the topic and format */
  introduce(context: AgentContext): Promise<string>;

  getMetadata(): AgentMetadata;
}

/**
 * One agent per role
 */
export interface DebateAgents {
  moderator: ModeratorAgent;
  affirmative: DebaterAgent;
  negative: DebaterAgent;
  judge: JudgeAgent;
}
