/**
 * RebalancingSchedule - Datas de rebalanceamento e janelas de treino
 *
 * A linha t é data de rebalanceamento quando t >= trainingPeriod e o período
 * de calendário (UTC) de dates[t] difere do de dates[t - 1].
 */

import type { RebalanceFrequency, RebalancingDate } from "../types/portfolio.types";
import { createConfigInvalidError } from "../utils/PortfolioErrors";

export const DEFAULT_TRAINING_PERIOD = 36;

export interface ScheduleOptions {
  rebalanceOn: RebalanceFrequency;
  /** Linhas mínimas antes do primeiro rebalanceamento */
  trainingPeriod?: number;
  /** Tamanho da janela móvel; omitido = janela expansiva [0, t) */
  rollingWindow?: number;
}

/**
 * Semana ISO (segunda a domingo), como "2024-W05"
 */
function isoWeekKey(date: Date): string {
  const d = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  const day = d.getUTCDay() || 7;
  // Quinta-feira da mesma semana define o ano ISO
  d.setUTCDate(d.getUTCDate() + 4 - day);
  const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart) / 86400000 + 1) / 7);
  return `${d.getUTCFullYear()}-W${week}`;
}

export function periodKey(date: Date, frequency: RebalanceFrequency): string {
  const year = date.getUTCFullYear();
  switch (frequency) {
    case "days":
      return date.toISOString().slice(0, 10);
    case "weeks":
      return isoWeekKey(date);
    case "months":
      return `${year}-${date.getUTCMonth()}`;
    case "quarters":
      return `${year}-Q${Math.floor(date.getUTCMonth() / 3)}`;
    case "years":
      return `${year}`;
  }
}

export function buildRebalancingSchedule(dates: readonly Date[], options: ScheduleOptions): RebalancingDate[] {
  const { rebalanceOn, rollingWindow } = options;
  const trainingPeriod = options.trainingPeriod ?? rollingWindow ?? DEFAULT_TRAINING_PERIOD;

  if (rollingWindow !== undefined && !(Number.isInteger(rollingWindow) && rollingWindow > 0)) {
    throw createConfigInvalidError("rollingWindow", `deve ser inteiro > 0 (recebido ${rollingWindow})`);
  }
  if (!(Number.isInteger(trainingPeriod) && trainingPeriod > 0)) {
    throw createConfigInvalidError("trainingPeriod", `deve ser inteiro > 0 (recebido ${trainingPeriod})`);
  }
  if (rollingWindow !== undefined && rollingWindow > trainingPeriod) {
    throw createConfigInvalidError(
      "rollingWindow",
      `janela (${rollingWindow}) maior que o período de treino (${trainingPeriod})`
    );
  }
  if (trainingPeriod >= dates.length) {
    throw createConfigInvalidError(
      "trainingPeriod",
      `período de treino (${trainingPeriod}) não deixa datas para rebalancear em ${dates.length} linhas`
    );
  }

  const schedule: RebalancingDate[] = [];
  for (let t = Math.max(trainingPeriod, 1); t < dates.length; t++) {
    if (periodKey(dates[t], rebalanceOn) === periodKey(dates[t - 1], rebalanceOn)) continue;
    schedule.push({
      index: t,
      date: dates[t],
      windowStart: rollingWindow === undefined ? 0 : t - rollingWindow,
      windowEnd: t,
    });
  }
  return schedule;
}
