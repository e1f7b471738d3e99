/**
 * Extração de séries a partir de um BacktestResult
 */

import type { ReturnsMatrix } from "../data/ReturnsMatrix";
import type { BacktestResult } from "../types/portfolio.types";
import { createConfigInvalidError } from "../utils/PortfolioErrors";
import { dotProduct } from "../math/matrix";

export interface WeightHistoryRow {
  date: Date;
  /** null nas datas sem solução */
  weights: number[] | null;
}

export interface MeasureHistoryRow {
  date: Date;
  measures: Record<string, number> | null;
}

export interface RealizedReturn {
  date: Date;
  return: number;
}

/**
 * Matriz data × ativo dos pesos escolhidos
 */
export function extractWeights(backtest: BacktestResult): WeightHistoryRow[] {
  return backtest.entries.map(entry => ({
    date: entry.date,
    weights: entry.status === "optimal" ? [...entry.result.weights.weights] : null,
  }));
}

export function extractObjectiveMeasures(backtest: BacktestResult): MeasureHistoryRow[] {
  return backtest.entries.map(entry => ({
    date: entry.date,
    measures: entry.status === "optimal" ? { ...entry.result.objectiveMeasures } : null,
  }));
}

/**
 * Retornos fora da amostra: os pesos escolhidos na data de rebalanceamento
 * valem daquela linha até a véspera do próximo rebalanceamento. Uma lacuna
 * mantém os últimos pesos; linhas antes da primeira solução são omitidas.
 */
export function realizedPortfolioReturns(backtest: BacktestResult, returns: ReturnsMatrix): RealizedReturn[] {
  const aligned = returns.alignTo(backtest.assets);

  const byTime = new Map<number, number[] | null>();
  for (const entry of backtest.entries) {
    byTime.set(entry.date.getTime(), entry.status === "optimal" ? entry.result.weights.weights : null);
  }

  const firstDate = backtest.entries.length > 0 ? backtest.entries[0].date.getTime() : Infinity;
  if (backtest.entries.length > 0 && !aligned.dates.some(d => d.getTime() === firstDate)) {
    throw createConfigInvalidError("returns", "datas do backtest não pertencem à matriz de retornos");
  }

  const realized: RealizedReturn[] = [];
  let current: number[] | null = null;

  for (let t = 0; t < aligned.periods; t++) {
    const date = aligned.dates[t];
    const scheduled = byTime.get(date.getTime());
    if (scheduled) current = scheduled;
    if (current === null) continue;

    realized.push({ date, return: dotProduct(current, [...aligned.rows[t]]) });
  }

  return realized;
}
