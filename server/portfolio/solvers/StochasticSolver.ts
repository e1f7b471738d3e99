/**
 * StochasticSolver - Busca estocástica sobre carteiras aleatórias
 *
 * Percorre as candidatas do RandomPortfolioGenerator, descarta as que violam
 * alguma restrição ativa e fica com a de maior score (empate: a primeira gerada).
 * Candidatas semente (pesos iguais, pesos iniciais) são avaliadas antes.
 *
 * A busca cede controle ao Event Loop periodicamente; abort() interrompe e
 * devolve a melhor candidata até o momento com aborted = true.
 *
 * @version 1.0.0
 */

import type { ReturnsMatrix } from "../data/ReturnsMatrix";
import type { OptimizationResult, RandomPortfolioStrategy } from "../types/portfolio.types";
import type { PortfolioSpec } from "../spec/PortfolioSpec";
import { resolveBounds, resolveBudget, satisfiesAll, targetSum, withinBoxAndBudget } from "../spec/constraints";
import { ObjectiveEvaluator } from "../evaluation/ObjectiveEvaluator";
import { RandomPortfolioGenerator } from "../generation/RandomPortfolioGenerator";
import type { RNGAlgorithm } from "../utils/SeededRNG";
import { createConfigInvalidError, createNoFeasibleCandidatesError } from "../utils/PortfolioErrors";
import { optimizationLogger } from "../utils/PortfolioLogger";
import { yieldIfSlow } from "../utils/AsyncUtils";

// ============================================================================
// TYPES
// ============================================================================

export interface StochasticSolverOptions {
  strategy: RandomPortfolioStrategy;
  permutations: number;
  seed: number;
  fev: number[];
  gridResolution: number;
  maxResample: number;
  /** Avalia a carteira de pesos iguais antes das aleatórias */
  includeEqualWeight: boolean;
  /** Carteira semente avaliada antes das aleatórias */
  initialWeights?: number[];
  /** Intervalo mínimo entre cessões ao Event Loop */
  yieldIntervalMs: number;
  rngAlgorithm?: RNGAlgorithm;
}

interface Best {
  weights: number[];
  score: number;
}

// ============================================================================
// SOLVER
// ============================================================================

export class StochasticSolver {
  private abortRequested: boolean = false;
  private running: boolean = false;

  /**
   * Pede a interrupção da busca em andamento
   */
  abort(): void {
    if (this.running) {
      this.abortRequested = true;
      optimizationLogger.warn("Interrupção da busca solicitada", "StochasticSolver");
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  async solve(spec: PortfolioSpec, window: ReturnsMatrix, options: StochasticSolverOptions): Promise<OptimizationResult> {
    const startTime = Date.now();
    const constraints = spec.activeConstraints;

    for (const c of constraints) {
      if (c.kind === "turnover" && !c.baseWeights) {
        throw createConfigInvalidError(c.name, "restrição de turnover exige pesos base (baseWeights)");
      }
    }
    if (options.initialWeights && options.initialWeights.length !== spec.size) {
      throw createConfigInvalidError(
        "initialWeights",
        `${options.initialWeights.length} pesos para ${spec.size} ativos`
      );
    }

    const bounds = resolveBounds(constraints, spec.size);
    const weightSum = resolveBudget(constraints);
    const generator = new RandomPortfolioGenerator({
      strategy: options.strategy,
      permutations: options.permutations,
      seed: options.seed,
      bounds,
      weightSum,
      gridResolution: options.gridResolution,
      fev: options.fev,
      maxResample: options.maxResample,
      rngAlgorithm: options.rngAlgorithm,
    });
    const evaluator = new ObjectiveEvaluator(spec.activeObjectives, window);
    const ctx = spec.context;

    let evaluated = 0;
    let feasible = 0;
    const search: { best: Best | null } = { best: null };

    const consider = (weights: number[]): void => {
      evaluated++;
      if (!withinBoxAndBudget(weights, bounds, weightSum)) return;
      if (!satisfiesAll(constraints, weights, ctx)) return;
      feasible++;
      const score = evaluator.score(weights);
      if (!Number.isFinite(score)) {
        optimizationLogger.throttled("non-finite-score", "warn", "Candidata com score não finito descartada", "StochasticSolver");
        return;
      }
      if (search.best === null || score > search.best.score) {
        search.best = { weights, score };
      }
    };

    const seeds: number[][] = [];
    if (options.includeEqualWeight) {
      seeds.push(new Array<number>(spec.size).fill(targetSum(weightSum) / spec.size));
    }
    if (options.initialWeights) {
      seeds.push([...options.initialWeights]);
    }

    this.running = true;
    this.abortRequested = false;
    let aborted = false;

    try {
      for (const w of seeds) consider(w);

      let lastYield = Date.now();
      for (const candidate of generator.candidates()) {
        consider(candidate);

        lastYield = await yieldIfSlow(lastYield, options.yieldIntervalMs);
        if (this.abortRequested) {
          aborted = true;
          break;
        }
      }
    } finally {
      this.running = false;
      this.abortRequested = false;
    }

    const chosen = search.best;
    if (chosen === null) {
      throw createNoFeasibleCandidatesError(evaluated);
    }

    optimizationLogger.debug(
      `${feasible}/${evaluated} candidatas viáveis${aborted ? " (interrompido)" : ""}`,
      "StochasticSolver"
    );

    const evaluation = evaluator.evaluate(chosen.weights);

    return {
      weights: { assets: [...spec.assets], weights: chosen.weights },
      score: evaluation.score,
      objectiveMeasures: evaluation.measures,
      contributions: evaluation.contributions,
      solver: {
        method: "stochastic",
        candidatesEvaluated: evaluated,
        feasibleCandidates: feasible,
        iterations: 0,
        aborted,
        seed: options.seed,
        strategy: options.strategy,
        elapsedMs: Date.now() - startTime,
      },
    };
  }
}
