/**
 * RebalancingBacktestEngine - Backtest com rebalanceamento periódico
 *
 * Para cada data do cronograma, otimiza a carteira sobre a janela de treino
 * [windowStart, windowEnd) e registra o resultado. Uma data sem carteira viável
 * vira lacuna (no_solution) e o backtest segue; qualquer outro erro interrompe.
 *
 * Restrições de turnover são encadeadas: a base de cada data é o último peso
 * resolvido. Por isso encadeamento e execução paralela são incompatíveis.
 *
 * @version 1.0.0
 */

import type { ReturnsMatrix } from "../data/ReturnsMatrix";
import type {
  BacktestResult,
  OptimizationMethod,
  RebalanceEntry,
  RebalanceFrequency,
  RebalanceGap,
  RebalanceSolved,
  RebalancingDate,
} from "../types/portfolio.types";
import type { PortfolioSpec } from "../spec/PortfolioSpec";
import type { Constraint } from "../spec/constraints";
import type { QuadraticProgramSolver } from "../solvers/QuadprogSolver";
import type { RNGAlgorithm } from "../utils/SeededRNG";
import { type OptimizerSettings, DEFAULT_OPTIMIZER_SETTINGS } from "../config/optimizer.config";
import { optimizePortfolio } from "../solvers/SolverDispatcher";
import { createConfigInvalidError, InfeasibleError } from "../utils/PortfolioErrors";
import { backtestLogger } from "../utils/PortfolioLogger";
import { createRebalanceSeed } from "../utils/SeededRNG";
import { buildRebalancingSchedule } from "./RebalancingSchedule";

// ============================================================================
// TYPES
// ============================================================================

export interface BacktestOptions {
  method: OptimizationMethod;
  rebalanceOn: RebalanceFrequency;
  trainingPeriod?: number;
  /** Omitido = janela expansiva */
  rollingWindow?: number;
  settings?: OptimizerSettings;
  /** Seed base; cada data deriva o seu a partir dele */
  seed?: number;
  /** Resolve as datas concorrentemente (incompatível com turnover) */
  parallel?: boolean;
  /** Sem pesos anteriores, remove o turnover da primeira data em vez de falhar */
  unconstrainedFirstTurnover?: boolean;
  rngAlgorithm?: RNGAlgorithm;
  qpSolver?: QuadraticProgramSolver;
}

// ============================================================================
// TURNOVER CHAINING
// ============================================================================

function hasTurnover(spec: PortfolioSpec): boolean {
  return spec.activeConstraints.some(c => c.kind === "turnover");
}

/**
 * Especificação da data com a base de turnover substituída pelos últimos pesos
 */
function chainTurnover(
  spec: PortfolioSpec,
  previous: number[] | null,
  unconstrainedFirst: boolean,
  date: Date
): PortfolioSpec {
  if (!hasTurnover(spec)) return spec;

  const constraints = spec.constraints.map((c): Constraint => {
    if (c.kind !== "turnover" || !c.enabled) return c;
    if (previous !== null) return { ...c, baseWeights: [...previous] };
    if (c.baseWeights) return c;
    if (unconstrainedFirst) return { ...c, enabled: false };
    throw createConfigInvalidError(
      c.name,
      `sem pesos anteriores em ${date.toISOString().slice(0, 10)}; informe baseWeights ou unconstrainedFirstTurnover`
    );
  });

  return spec.withConstraints(constraints);
}

// ============================================================================
// ENGINE
// ============================================================================

export async function runRebalancingBacktest(
  spec: PortfolioSpec,
  returns: ReturnsMatrix,
  options: BacktestOptions
): Promise<BacktestResult> {
  const startTime = Date.now();
  const aligned = spec.prepare(returns);
  const settings = options.settings ?? DEFAULT_OPTIMIZER_SETTINGS;
  const baseSeed = options.seed ?? settings.seed;
  const chaining = hasTurnover(spec);

  if (chaining && options.parallel) {
    throw createConfigInvalidError("parallel", "restrições de turnover encadeadas exigem execução sequencial");
  }

  const schedule = buildRebalancingSchedule(aligned.dates, {
    rebalanceOn: options.rebalanceOn,
    trainingPeriod: options.trainingPeriod,
    rollingWindow: options.rollingWindow,
  });

  backtestLogger.startOperation("Backtest", {
    method: options.method,
    dates: schedule.length,
    rebalanceOn: options.rebalanceOn,
    parallel: options.parallel === true,
  });

  const solveDate = async (
    point: RebalancingDate,
    dateSpec: PortfolioSpec,
    previous: number[] | null
  ): Promise<RebalanceEntry> => {
    const window = aligned.slice(point.windowStart, point.windowEnd);
    try {
      const result = await optimizePortfolio(dateSpec, window, {
        method: options.method,
        settings,
        seed: createRebalanceSeed(baseSeed, point.date),
        // Pesos anteriores entram como candidata semente (turnover zero)
        initialWeights: previous ?? undefined,
        rngAlgorithm: options.rngAlgorithm,
        qpSolver: options.qpSolver,
      });
      const solved: RebalanceSolved = { date: point.date, status: "optimal", result };
      return Object.freeze(solved);
    } catch (error) {
      if (error instanceof InfeasibleError) {
        backtestLogger.warn(
          `Sem solução em ${point.date.toISOString().slice(0, 10)}: ${error.message}`,
          "Backtest"
        );
        const gap: RebalanceGap = { date: point.date, status: "no_solution", reason: error.message };
        return Object.freeze(gap);
      }
      throw error;
    }
  };

  let entries: RebalanceEntry[];

  try {
    if (options.parallel) {
      // Promise.all preserva a ordem do cronograma
      entries = await Promise.all(schedule.map(point => solveDate(point, spec, null)));
    } else {
      entries = [];
      let previous: number[] | null = null;

      for (let k = 0; k < schedule.length; k++) {
        const point = schedule[k];
        const dateSpec = chaining
          ? chainTurnover(spec, previous, options.unconstrainedFirstTurnover === true, point.date)
          : spec;
        const entry = await solveDate(point, dateSpec, chaining ? previous : null);
        if (entry.status === "optimal") {
          previous = entry.result.weights.weights;
        }
        entries.push(entry);
        backtestLogger.progress(k + 1, schedule.length, "datas resolvidas", "Backtest");
      }
    }
  } catch (error) {
    backtestLogger.endOperation("Backtest", false, {
      reason: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }

  const solvedCount = entries.filter(e => e.status === "optimal").length;
  const result: BacktestResult = {
    assets: [...spec.assets],
    method: options.method,
    entries: Object.freeze(entries),
    solvedCount,
    gapCount: entries.length - solvedCount,
    elapsedMs: Date.now() - startTime,
  };

  backtestLogger.endOperation("Backtest", true, {
    solved: solvedCount,
    gaps: result.gapCount,
    elapsedMs: result.elapsedMs,
  });

  return Object.freeze(result);
}
