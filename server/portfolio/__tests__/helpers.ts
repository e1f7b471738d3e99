/**
 * Dados sintéticos para os testes do otimizador
 */

import { ReturnsMatrix } from "../data/ReturnsMatrix";
import { createSeededRNG } from "../utils/SeededRNG";

export interface SyntheticAsset {
  name: string;
  mean: number;
  stdDev: number;
}

export const DEFAULT_SYNTHETIC_ASSETS: SyntheticAsset[] = [
  { name: "ALFA", mean: 0.008, stdDev: 0.04 },
  { name: "BETA", mean: 0.010, stdDev: 0.06 },
  { name: "GAMA", mean: 0.012, stdDev: 0.08 },
];

/**
 * Último dia de cada mês (UTC) a partir de janeiro de startYear
 */
export function monthEnds(count: number, startYear: number = 2015): Date[] {
  return Array.from({ length: count }, (_, m) => new Date(Date.UTC(startYear, m + 1, 0)));
}

/**
 * Retornos mensais normais e independentes, determinísticos pelo seed
 */
export function syntheticReturns(
  periods: number,
  seed: number = 2024,
  assets: SyntheticAsset[] = DEFAULT_SYNTHETIC_ASSETS
): ReturnsMatrix {
  const rng = createSeededRNG(seed);
  const rows = Array.from({ length: periods }, () => assets.map(a => rng.randomNormal(a.mean, a.stdDev)));
  return new ReturnsMatrix(assets.map(a => a.name), monthEnds(periods), rows);
}
