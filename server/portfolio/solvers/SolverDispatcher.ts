/**
 * SolverDispatcher - Ponto de entrada da otimização
 *
 * O método é sempre escolhido pelo chamador ("exact" | "stochastic"); uma
 * especificação não representável no modo exato resulta em ConfigError,
 * nunca em troca silenciosa de método.
 *
 * @version 1.0.0
 */

import type { ReturnsMatrix } from "../data/ReturnsMatrix";
import type { OptimizationMethod, OptimizationResult } from "../types/portfolio.types";
import type { PortfolioSpec } from "../spec/PortfolioSpec";
import type { RNGAlgorithm } from "../utils/SeededRNG";
import { type OptimizerSettings, DEFAULT_OPTIMIZER_SETTINGS } from "../config/optimizer.config";
import { optimizationLogger } from "../utils/PortfolioLogger";
import { ExactSolver } from "./ExactSolver";
import { StochasticSolver } from "./StochasticSolver";
import type { QuadraticProgramSolver } from "./QuadprogSolver";

export interface OptimizeOptions {
  method: OptimizationMethod;
  /** Parâmetros da busca estocástica (padrões do ambiente quando omitidos) */
  settings?: OptimizerSettings;
  /** Sobrescreve settings.seed */
  seed?: number;
  /** Carteira semente para a busca estocástica */
  initialWeights?: number[];
  rngAlgorithm?: RNGAlgorithm;
  /** Rotina de QP do modo exato (padrão: quadprog) */
  qpSolver?: QuadraticProgramSolver;
  /** Instância externa, para que o chamador possa chamar abort() */
  stochasticSolver?: StochasticSolver;
}

/**
 * Otimiza a carteira sobre a janela de retornos.
 *
 * Lança ConfigError (especificação), InfeasibleError (sem carteira viável)
 * ou SolverError (falha numérica do QP).
 */
export async function optimizePortfolio(
  spec: PortfolioSpec,
  returns: ReturnsMatrix,
  options: OptimizeOptions
): Promise<OptimizationResult> {
  const window = spec.prepare(returns);
  const settings = options.settings ?? DEFAULT_OPTIMIZER_SETTINGS;
  const details = {
    method: options.method,
    assets: spec.size,
    periods: window.periods,
  };

  optimizationLogger.startOperation("Otimização", details);

  try {
    let result: OptimizationResult;

    if (options.method === "exact") {
      result = new ExactSolver(options.qpSolver).solve(spec, window);
    } else {
      const solver = options.stochasticSolver ?? new StochasticSolver();
      result = await solver.solve(spec, window, {
        strategy: settings.rpMethod,
        permutations: settings.permutations,
        seed: options.seed ?? settings.seed,
        fev: settings.fev,
        gridResolution: settings.gridResolution,
        maxResample: settings.maxResample,
        includeEqualWeight: settings.includeEqualWeight,
        initialWeights: options.initialWeights,
        yieldIntervalMs: settings.yieldIntervalMs,
        rngAlgorithm: options.rngAlgorithm,
      });
    }

    optimizationLogger.endOperation("Otimização", true, {
      score: result.score,
      candidates: result.solver.candidatesEvaluated,
      elapsedMs: result.solver.elapsedMs,
    });
    return result;
  } catch (error) {
    optimizationLogger.endOperation("Otimização", false, {
      reason: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
