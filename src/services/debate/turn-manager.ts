/**
 * Turn Manager
 *
 * Generates the turn sequence for each debate phase and tracks progress
 * through the phase currently being executed.
 */

import { DebatePhase, Role, RoundType } from '../../types/debate.js';
import { CROSS_EXAMINATION_ROUNDS, crossExamQuestioner, getPhaseConfig, opponentOf } from '../../config/debate-protocol.js';
import type { DebateRules } from '../../config/debate-rules.js';
import type { Turn, PhaseExecutionPlan } from '../../types/orchestrator.js';

/**
 * Turn progress information
 */
export interface TurnProgress {
  currentTurnIndex: number;
  totalTurns: number;
  currentTurn: Turn | null;
  isComplete: boolean;
}

/**
 * Turn Manager Class
 *
 * Plans depend on the rules (cross-examination scoring, round limit) and
 * on how many free-debate rounds have already been committed.
 */
export class TurnManager {
  private readonly rules: Pick<DebateRules, 'maxFreeDebateRounds' | 'scoreCrossExamination'>;
  private plan: PhaseExecutionPlan | null = null;
  private currentTurnIndex: number = 0;

  constructor(rules: Pick<DebateRules, 'maxFreeDebateRounds' | 'scoreCrossExamination'>) {
    this.rules = rules;
  }

  /**
   * Start tracking a plan (resets the turn index)
   */
  beginPhase(plan: PhaseExecutionPlan): void {
    this.plan = plan;
    this.currentTurnIndex = 0;
  }

  getCurrentPlan(): PhaseExecutionPlan | null {
    return this.plan;
  }

  getCurrentTurnIndex(): number {
    return this.currentTurnIndex;
  }

  /**
   * Get the current turn or null if the phase is complete
   */
  getCurrentTurn(): Turn | null {
    return this.plan?.turns[this.currentTurnIndex] ?? null;
  }

  /**
   * Advance to the next turn
   */
  advanceTurn(): void {
    this.currentTurnIndex++;
  }

  /**
   * Check if the tracked phase is complete
   */
  isPhaseComplete(): boolean {
    return this.plan !== null && this.currentTurnIndex >= this.plan.turns.length;
  }

  getTurnProgress(): TurnProgress {
    return {
      currentTurnIndex: this.currentTurnIndex,
      totalTurns: this.plan?.turns.length ?? 0,
      currentTurn: this.getCurrentTurn(),
      isComplete: this.isPhaseComplete(),
    };
  }

  /**
   * Stop tracking the current plan
   */
  reset(): void {
    this.plan = null;
    this.currentTurnIndex = 0;
  }

  /**
   * Get the execution plan for a phase
   * @param freeDebateRound - Free-debate rounds already committed
   */
  getPhaseExecutionPlan(phase: DebatePhase, freeDebateRound: number = 0): PhaseExecutionPlan {
    const config = getPhaseConfig(phase);
    return {
      phase,
      name: config.name,
      turns: this.generateTurns(phase, freeDebateRound),
    };
  }

  private generateTurns(phase: DebatePhase, freeDebateRound: number): Turn[] {
    switch (phase) {
      case DebatePhase.INIT:
        return this.generateIntroductionTurns();

      case DebatePhase.OPENING:
        return this.generateStatementTurns(RoundType.OPENING, 1);

      case DebatePhase.CROSS_EXAMINATION:
        return this.generateCrossExamTurns();

      case DebatePhase.FREE_DEBATE:
        if (freeDebateRound >= this.rules.maxFreeDebateRounds) {
          return [];
        }
        return this.generateStatementTurns(RoundType.FREE_DEBATE, freeDebateRound + 1);

      case DebatePhase.CLOSING:
        return this.generateStatementTurns(RoundType.CLOSING, 1);

      case DebatePhase.JUDGMENT:
        return this.generateVerdictTurns();

      default:
        return [];
    }
  }

  /**
   * INIT: moderator introduction, tagged as the opening round 0
   */
  private generateIntroductionTurns(): Turn[] {
    return [
      {
        turnNumber: 1,
        speaker: Role.MODERATOR,
        kind: 'introduction',
        roundType: RoundType.OPENING,
        roundIndex: 0,
        scored: false,
      },
    ];
  }

  /**
   * Affirmative then negative, both scored
   */
  private generateStatementTurns(roundType: RoundType, roundIndex: number): Turn[] {
    return [Role.AFFIRMATIVE, Role.NEGATIVE].map((speaker, index) => ({
      turnNumber: index + 1,
      speaker,
      kind: 'statement' as const,
      roundType,
      roundIndex,
      scored: true,
    }));
  }

  /**
   * Each exchange: questioner asks, opponent answers; questioner alternates
   */
  private generateCrossExamTurns(): Turn[] {
    const turns: Turn[] = [];
    let turnNumber = 1;

    for (let exchange = 1; exchange <= CROSS_EXAMINATION_ROUNDS; exchange++) {
      const questioner = crossExamQuestioner(exchange);

      turns.push({
        turnNumber: turnNumber++,
        speaker: questioner,
        kind: 'cross_question',
        roundType: RoundType.CROSS_EXAMINATION,
        roundIndex: exchange,
        scored: this.rules.scoreCrossExamination,
      });

      turns.push({
        turnNumber: turnNumber++,
        speaker: opponentOf(questioner),
        kind: 'cross_answer',
        roundType: RoundType.CROSS_EXAMINATION,
        roundIndex: exchange,
        scored: this.rules.scoreCrossExamination,
      });
    }

    return turns;
  }

  /**
   * JUDGMENT: the judge explains the computed outcome
   */
  private generateVerdictTurns(): Turn[] {
    return [
      {
        turnNumber: 1,
        speaker: Role.JUDGE,
        kind: 'verdict',
        roundType: null,
        roundIndex: 0,
        scored: false,
      },
    ];
  }
}
