/**
 * Teste Unitário - Objetivos e Avaliador
 *
 * Janela de 3 períodos, 2 ativos:
 *   A: 0.01, 0.03, 0.02  (média 0.02, var 1e-4)
 *   B: 0.02, -0.01, 0.05 (média 0.02, var 9e-4)
 *   cov(A, B) = -1.5e-4
 */

import { describe, it, expect } from "vitest";
import { ReturnsMatrix } from "../data/ReturnsMatrix";
import {
  computeMoments,
  concentrationObjective,
  evaluateObjective,
  objectiveContribution,
  quadraticUtility,
  returnObjective,
  riskBudgetObjective,
  riskContributions,
  riskObjective,
} from "../spec/objectives";
import { ObjectiveEvaluator } from "../evaluation/ObjectiveEvaluator";
import { ConfigError } from "../utils/PortfolioErrors";

const window = new ReturnsMatrix(
  ["A", "B"],
  [new Date("2024-01-01"), new Date("2024-01-02"), new Date("2024-01-03")],
  [
    [0.01, 0.02],
    [0.03, -0.01],
    [0.02, 0.05],
  ]
);
const moments = computeMoments(window);
const w = [0.5, 0.5];

describe("Objectives - Medidas", () => {
  it("deve calcular médias e covariância amostral", () => {
    expect(moments.means[0]).toBeCloseTo(0.02, 12);
    expect(moments.means[1]).toBeCloseTo(0.02, 12);
    expect(moments.covariance[0][0]).toBeCloseTo(1e-4, 12);
    expect(moments.covariance[1][1]).toBeCloseTo(9e-4, 12);
    expect(moments.covariance[0][1]).toBeCloseTo(-1.5e-4, 12);
  });

  it("retorno deve ser a média da série da carteira", () => {
    expect(evaluateObjective(returnObjective(), w, moments)).toBeCloseTo(0.02, 12);
  });

  it("risco Var e StdDev devem coincidir com a série da carteira", () => {
    // série: 0.015, 0.01, 0.035 -> variância amostral 1.75e-4
    expect(evaluateObjective(riskObjective({ metric: "Var" }), w, moments)).toBeCloseTo(1.75e-4, 12);
    expect(evaluateObjective(riskObjective({ metric: "StdDev" }), w, moments)).toBeCloseTo(Math.sqrt(1.75e-4), 12);
  });

  it("utilidade quadrática deve ser média - λ·variância", () => {
    expect(evaluateObjective(quadraticUtility(2), w, moments)).toBeCloseTo(0.02 - 2 * 1.75e-4, 12);
  });

  it("aversão a risco <= 0 deve lançar ConfigError", () => {
    expect(() => quadraticUtility(0)).toThrow(ConfigError);
    expect(() => quadraticUtility(-1)).toThrow(ConfigError);
  });

  it("concentração deve ser o índice de Herfindahl", () => {
    expect(evaluateObjective(concentrationObjective(), w, moments)).toBeCloseTo(0.5, 12);
    expect(evaluateObjective(concentrationObjective(), [1, 0], moments)).toBeCloseTo(1, 12);
  });

  it("contribuições de risco devem somar 1", () => {
    const pct = riskContributions(w, moments);
    expect(pct[0]).toBeCloseTo(-0.0125 / 0.175, 10);
    expect(pct[1]).toBeCloseTo(0.1875 / 0.175, 10);
    expect(pct[0] + pct[1]).toBeCloseTo(1, 12);
  });

  it("orçamento de risco deve penalizar a distância fora da faixa", () => {
    const objective = riskBudgetObjective({ minPct: 0, maxPct: 0.6 });
    expect(objective.penalty).toBe(1e4);

    // (0 - (-0.0714...)) + (1.0714... - 0.6) = 0.542857...
    const expected = 1e4 * (0.0125 / 0.175 + (0.1875 / 0.175 - 0.6));
    expect(evaluateObjective(objective, w, moments)).toBeCloseTo(expected, 6);
  });

  it("orçamento de risco deve dar a mesma penalidade com StdDev e Var", () => {
    const onStdDev = riskBudgetObjective({ minPct: 0, maxPct: 0.6, metric: "StdDev" });
    const onVar = riskBudgetObjective({ minPct: 0, maxPct: 0.6, metric: "Var" });
    expect(evaluateObjective(onVar, w, moments)).toBe(evaluateObjective(onStdDev, w, moments));
  });

  it("carteira de variância zero não deve gerar contribuições", () => {
    expect(riskContributions([0, 0], moments)).toEqual([0, 0]);
  });
});

describe("Objectives - Contribuições", () => {
  it("retorno soma e risco subtrai", () => {
    expect(objectiveContribution(returnObjective({ multiplier: 2 }), 0.01)).toBeCloseTo(0.02, 12);
    expect(objectiveContribution(riskObjective({ multiplier: 3 }), 0.01)).toBeCloseTo(-0.03, 12);
    expect(objectiveContribution(concentrationObjective(0.5), 0.4)).toBeCloseTo(-0.2, 12);
  });

  it("com target deve penalizar a distância absoluta", () => {
    expect(objectiveContribution(returnObjective({ target: 0.03 }), 0.02)).toBeCloseTo(-0.01, 12);
    expect(objectiveContribution(returnObjective({ target: 0.03 }), 0.04)).toBeCloseTo(-0.01, 12);
    expect(objectiveContribution(riskObjective({ target: 0.05, multiplier: 2 }), 0.02)).toBeCloseTo(-0.06, 12);
  });
});

describe("ObjectiveEvaluator", () => {
  it("deve agregar as contribuições assinadas", () => {
    const evaluator = new ObjectiveEvaluator(
      [returnObjective(), riskObjective({ metric: "Var", multiplier: 2 })],
      window
    );
    const result = evaluator.evaluate(w);

    expect(result.measures.return).toBeCloseTo(0.02, 12);
    expect(result.measures.risk).toBeCloseTo(1.75e-4, 12);
    expect(result.contributions.risk).toBeCloseTo(-3.5e-4, 12);
    expect(result.score).toBeCloseTo(0.02 - 3.5e-4, 12);
    expect(evaluator.score(w)).toBeCloseTo(result.score, 15);
    expect(result.riskContributions).toBeUndefined();
  });

  it("deve ignorar objetivos desabilitados", () => {
    const evaluator = new ObjectiveEvaluator(
      [returnObjective(), { ...concentrationObjective(), enabled: false }],
      window
    );
    expect(Object.keys(evaluator.evaluate(w).measures)).toEqual(["return"]);
  });

  it("deve expor contribuições de risco quando há risk_budget", () => {
    const evaluator = new ObjectiveEvaluator([riskBudgetObjective({ minPct: 0.2, maxPct: 0.8 })], window);
    expect(evaluator.evaluate(w).riskContributions).toHaveLength(2);
  });
});
