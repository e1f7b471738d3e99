/**
 * ObjectiveEvaluator - Avaliador de Objetivos
 *
 * Calcula a medida de cada objetivo ativo e o score agregado (soma das
 * contribuições assinadas) de uma carteira sobre a janela de treino.
 * Os momentos da janela são calculados uma única vez no construtor.
 *
 * @version 1.0.0
 */

import type { ReturnsMatrix } from "../data/ReturnsMatrix";
import {
  type Objective,
  type WindowMoments,
  computeMoments,
  evaluateObjective,
  objectiveContribution,
  riskContributions,
} from "../spec/objectives";

export interface EvaluationResult {
  /** Score agregado (maior é melhor) */
  score: number;
  measures: Record<string, number>;
  contributions: Record<string, number>;
  /** Fração da variância por ativo, presente quando há objetivo risk_budget */
  riskContributions?: number[];
}

export class ObjectiveEvaluator {
  private readonly objectives: readonly Objective[];
  readonly moments: WindowMoments;

  constructor(objectives: readonly Objective[], window: ReturnsMatrix | WindowMoments) {
    this.objectives = objectives.filter(o => o.enabled);
    this.moments = "covariance" in window ? window : computeMoments(window);
  }

  /**
   * Apenas o score, sem montar os mapas de medidas
   */
  score(weights: number[]): number {
    let total = 0;
    for (const objective of this.objectives) {
      total += objectiveContribution(objective, evaluateObjective(objective, weights, this.moments));
    }
    return total;
  }

  evaluate(weights: number[]): EvaluationResult {
    const measures: Record<string, number> = {};
    const contributions: Record<string, number> = {};
    let score = 0;

    for (const objective of this.objectives) {
      const measure = evaluateObjective(objective, weights, this.moments);
      const contribution = objectiveContribution(objective, measure);
      measures[objective.name] = measure;
      contributions[objective.name] = contribution;
      score += contribution;
    }

    const result: EvaluationResult = { score, measures, contributions };
    if (this.objectives.some(o => o.kind === "risk_budget")) {
      result.riskContributions = riskContributions(weights, this.moments);
    }
    return result;
  }
}
