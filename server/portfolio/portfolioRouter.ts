/**
 * Portfolio Router - Endpoints tRPC do Otimizador de Carteiras
 *
 * Expõe endpoints para:
 * - Otimização de uma carteira (exata ou estocástica)
 * - Backtest com rebalanceamento periódico
 * - Consulta do cronograma de rebalanceamento
 *
 * Erros de domínio viram TRPCError: ConfigError -> BAD_REQUEST,
 * InfeasibleError -> PRECONDITION_FAILED, SolverError -> INTERNAL_SERVER_ERROR.
 *
 * @version 1.0.0
 */

import { z } from "zod";
import { router, publicProcedure } from "../_core/trpc";
import type { OptimizationResult, RebalanceEntry } from "./types/portfolio.types";
import { buildPortfolioSpec, buildReturnsMatrix, portfolioSpecInputSchema, returnsInputSchema } from "./spec/portfolioSpec.schema";
import { optimizerSettingsSchema, resolveOptimizerSettings } from "./config/optimizer.config";
import { optimizePortfolio } from "./solvers/SolverDispatcher";
import { runRebalancingBacktest } from "./rebalancing/RebalancingBacktestEngine";
import { buildRebalancingSchedule } from "./rebalancing/RebalancingSchedule";
import { createConfigInvalidError, sanitizeMeasures, sanitizeNumber, withErrorHandling } from "./utils/PortfolioErrors";

// ============================================================================
// INPUT SCHEMAS
// ============================================================================

const methodSchema = z.enum(["exact", "stochastic"]);
const frequencySchema = z.enum(["days", "weeks", "months", "quarters", "years"]);
const settingsOverrideSchema = optimizerSettingsSchema.partial().optional();

const optimizeInputSchema = z.object({
  spec: portfolioSpecInputSchema,
  returns: returnsInputSchema,
  method: methodSchema,
  settings: settingsOverrideSchema,
  seed: z.number().int().nonnegative().optional(),
  initialWeights: z.array(z.number()).optional(),
});

const backtestInputSchema = z.object({
  spec: portfolioSpecInputSchema,
  returns: returnsInputSchema,
  method: methodSchema,
  rebalanceOn: frequencySchema,
  trainingPeriod: z.number().int().positive().optional(),
  rollingWindow: z.number().int().positive().optional(),
  parallel: z.boolean().default(false),
  unconstrainedFirstTurnover: z.boolean().default(false),
  settings: settingsOverrideSchema,
  seed: z.number().int().nonnegative().optional(),
});

const scheduleInputSchema = z.object({
  dates: z.array(z.string()).min(1),
  rebalanceOn: frequencySchema,
  trainingPeriod: z.number().int().positive().optional(),
  rollingWindow: z.number().int().positive().optional(),
});

// ============================================================================
// SERIALIZATION
// ============================================================================

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function serializeResult(result: OptimizationResult) {
  const weights: Record<string, number> = {};
  result.weights.assets.forEach((asset, i) => {
    weights[asset] = sanitizeNumber(result.weights.weights[i]);
  });

  return {
    weights,
    score: sanitizeNumber(result.score),
    objectiveMeasures: sanitizeMeasures(result.objectiveMeasures),
    contributions: sanitizeMeasures(result.contributions),
    solver: result.solver,
  };
}

function serializeEntry(entry: RebalanceEntry) {
  if (entry.status === "no_solution") {
    return { date: toIsoDate(entry.date), status: entry.status, reason: entry.reason, result: null };
  }
  return { date: toIsoDate(entry.date), status: entry.status, reason: null, result: serializeResult(entry.result) };
}

function parseDates(dates: string[]): Date[] {
  return dates.map((raw, i) => {
    const date = new Date(raw);
    if (Number.isNaN(date.getTime())) {
      throw createConfigInvalidError("dates", `data inválida na posição ${i}: "${raw}"`);
    }
    return date;
  });
}

// ============================================================================
// ROUTER
// ============================================================================

export const portfolioRouter = router({
  /**
   * Otimiza uma carteira sobre toda a matriz de retornos
   */
  optimize: publicProcedure
    .input(optimizeInputSchema)
    .mutation(({ input, ctx }) =>
      withErrorHandling("optimize", async () => {
        const settings = resolveOptimizerSettings(input.settings, ctx.settings);
        const spec = buildPortfolioSpec(input.spec, settings.riskBudgetPenalty);
        const returns = buildReturnsMatrix(input.returns);

        const result = await optimizePortfolio(spec, returns, {
          method: input.method,
          settings,
          seed: input.seed,
          initialWeights: input.initialWeights,
        });
        return serializeResult(result);
      }, "PortfolioRouter")
    ),

  /**
   * Backtest com rebalanceamento periódico
   */
  backtest: publicProcedure
    .input(backtestInputSchema)
    .mutation(({ input, ctx }) =>
      withErrorHandling("backtest", async () => {
        const settings = resolveOptimizerSettings(input.settings, ctx.settings);
        const spec = buildPortfolioSpec(input.spec, settings.riskBudgetPenalty);
        const returns = buildReturnsMatrix(input.returns);

        const result = await runRebalancingBacktest(spec, returns, {
          method: input.method,
          rebalanceOn: input.rebalanceOn,
          trainingPeriod: input.trainingPeriod,
          rollingWindow: input.rollingWindow,
          parallel: input.parallel,
          unconstrainedFirstTurnover: input.unconstrainedFirstTurnover,
          settings,
          seed: input.seed,
        });

        return {
          assets: result.assets,
          method: result.method,
          solvedCount: result.solvedCount,
          gapCount: result.gapCount,
          elapsedMs: result.elapsedMs,
          entries: result.entries.map(serializeEntry),
        };
      }, "PortfolioRouter")
    ),

  /**
   * Datas de rebalanceamento e janelas de treino, sem otimizar
   */
  schedule: publicProcedure
    .input(scheduleInputSchema)
    .query(({ input }) =>
      withErrorHandling("schedule", async () => {
        const schedule = buildRebalancingSchedule(parseDates(input.dates), {
          rebalanceOn: input.rebalanceOn,
          trainingPeriod: input.trainingPeriod,
          rollingWindow: input.rollingWindow,
        });
        return schedule.map(point => ({
          index: point.index,
          date: toIsoDate(point.date),
          windowStart: point.windowStart,
          windowEnd: point.windowEnd,
        }));
      }, "PortfolioRouter")
    ),
});

export type PortfolioRouter = typeof portfolioRouter;
