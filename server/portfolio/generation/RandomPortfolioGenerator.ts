/**
 * RandomPortfolioGenerator - Gerador de Carteiras Candidatas
 *
 * Três estratégias:
 * - simplex: pesos no simplex deslocado pelos mínimos da caixa, com viés
 *   face/aresta/vértice controlado por fev (expoente 2^fev nas exponenciais)
 * - sample: uniforme dentro da caixa e projetado na soma-alvo (ou descartado)
 * - grid: reticulado determinístico e exaustivo na resolução configurada
 *
 * candidates() devolve uma sequência preguiçosa e finita; cada chamada
 * recomeça do seed, então duas chamadas produzem exatamente as mesmas candidatas.
 *
 * @version 1.0.0
 */

import type { Bounds, Range, RandomPortfolioStrategy } from "../types/portfolio.types";
import { FEASIBILITY_TOLERANCE, projectOrReject, targetSum } from "../spec/constraints";
import { createConfigInvalidError } from "../utils/PortfolioErrors";
import { type RNGAlgorithm, type SeededRNG, createSeededRNG } from "../utils/SeededRNG";
import { sum } from "../math/matrix";

// ============================================================================
// TYPES
// ============================================================================

export interface RandomPortfolioGeneratorConfig {
  strategy: RandomPortfolioStrategy;
  /** Número de sorteios (ignorado por grid) */
  permutations: number;
  seed: number;
  bounds: Bounds;
  weightSum: Range;
  /** Passo do reticulado (grid) */
  gridResolution: number;
  /** Expoentes face/edge/vertex percorridos em ciclo (simplex) */
  fev: number[];
  /** Tentativas de re-sorteio quando a candidata sai da caixa (simplex) */
  maxResample: number;
  rngAlgorithm?: RNGAlgorithm;
}

export const DEFAULT_GENERATOR_CONFIG: Omit<RandomPortfolioGeneratorConfig, "bounds" | "weightSum"> = {
  strategy: "simplex",
  permutations: 2000,
  seed: 42,
  gridResolution: 0.05,
  fev: [0, 1, 2, 3, 4, 5],
  maxResample: 50,
};

// ============================================================================
// GENERATOR
// ============================================================================

export class RandomPortfolioGenerator {
  private readonly config: RandomPortfolioGeneratorConfig;
  private readonly n: number;

  constructor(config: RandomPortfolioGeneratorConfig) {
    this.config = { ...config };
    this.n = config.bounds.min.length;
    this.validate();
  }

  private validate(): void {
    const { bounds, permutations, gridResolution, fev, maxResample } = this.config;

    if (bounds.max.length !== this.n || this.n === 0) {
      throw createConfigInvalidError("bounds", "limites mínimo e máximo com tamanhos diferentes");
    }
    if ([...bounds.min, ...bounds.max].some(b => !Number.isFinite(b))) {
      throw createConfigInvalidError("bounds", "a busca estocástica exige limites finitos para todos os ativos");
    }
    if (!(Number.isInteger(permutations) && permutations > 0)) {
      throw createConfigInvalidError("permutations", `deve ser inteiro > 0 (recebido ${permutations})`);
    }
    if (!(gridResolution > 0 && gridResolution <= 1)) {
      throw createConfigInvalidError("gridResolution", `deve estar em (0, 1] (recebido ${gridResolution})`);
    }
    if (fev.length === 0 || fev.some(f => !Number.isFinite(f) || f < 0)) {
      throw createConfigInvalidError("fev", "lista de expoentes vazia ou com valores negativos");
    }
    if (!(Number.isInteger(maxResample) && maxResample >= 0)) {
      throw createConfigInvalidError("maxResample", `deve ser inteiro >= 0 (recebido ${maxResample})`);
    }
  }

  get strategy(): RandomPortfolioStrategy {
    return this.config.strategy;
  }

  get seed(): number {
    return this.config.seed;
  }

  /**
   * Sequência de candidatas. Reinicia do seed a cada chamada.
   */
  *candidates(): Generator<number[], void, undefined> {
    switch (this.config.strategy) {
      case "simplex":
        yield* this.simplexCandidates();
        return;
      case "sample":
        yield* this.sampleCandidates();
        return;
      case "grid":
        yield* this.gridCandidates();
        return;
    }
  }

  /**
   * Materializa todas as candidatas
   */
  generate(): number[][] {
    return Array.from(this.candidates());
  }

  // ==========================================================================
  // SIMPLEX
  // ==========================================================================

  private *simplexCandidates(): Generator<number[], void, undefined> {
    const { bounds, weightSum, fev, permutations, maxResample, seed, rngAlgorithm } = this.config;
    const target = targetSum(weightSum);
    const free = target - sum(bounds.min);

    // Mínimos já excedem a soma-alvo: nenhuma candidata possível
    if (free < -FEASIBILITY_TOLERANCE) return;

    const rng = createSeededRNG(seed, rngAlgorithm);

    for (let k = 0; k < permutations; k++) {
      const power = Math.pow(2, fev[k % fev.length]);

      for (let attempt = 0; attempt <= maxResample; attempt++) {
        const w = this.drawSimplex(rng, power, Math.max(free, 0));
        if (this.insideBox(w)) {
          yield w;
          break;
        }
      }
    }
  }

  private drawSimplex(rng: SeededRNG, power: number, free: number): number[] {
    const draws = new Array<number>(this.n);
    for (let i = 0; i < this.n; i++) {
      draws[i] = Math.pow(rng.randomExponential(), power);
    }
    const total = sum(draws);
    const { min } = this.config.bounds;

    if (!(total > 0 && Number.isFinite(total))) {
      // Sorteio degenerado (underflow/overflow): divide igualmente
      return min.map(m => m + free / this.n);
    }
    return draws.map((d, i) => min[i] + (free * d) / total);
  }

  // ==========================================================================
  // SAMPLE
  // ==========================================================================

  private *sampleCandidates(): Generator<number[], void, undefined> {
    const { bounds, weightSum, permutations, seed, rngAlgorithm } = this.config;
    const target = targetSum(weightSum);
    const range = { min: target, max: target };
    const rng = createSeededRNG(seed, rngAlgorithm);

    for (let k = 0; k < permutations; k++) {
      const w = bounds.min.map((lo, i) => rng.randomFloat(lo, bounds.max[i]));
      const projected = projectOrReject(w, bounds, range);
      if (projected !== null) yield projected;
    }
  }

  // ==========================================================================
  // GRID
  // ==========================================================================

  private *gridCandidates(): Generator<number[], void, undefined> {
    const { bounds, weightSum, gridResolution } = this.config;
    const tol = FEASIBILITY_TOLERANCE;

    // Níveis inteiros por ativo: peso = nível * resolução
    const levels = bounds.min.map((lo, i) => {
      const first = Math.ceil(lo / gridResolution - tol);
      const last = Math.floor(bounds.max[i] / gridResolution + tol);
      const values: number[] = [];
      for (let k = first; k <= last; k++) values.push(k);
      return values;
    });

    if (levels.some(l => l.length === 0)) return;

    // Menor/maior soma alcançável pelos ativos a partir de i (poda)
    const restMin = new Array<number>(this.n + 1).fill(0);
    const restMax = new Array<number>(this.n + 1).fill(0);
    for (let i = this.n - 1; i >= 0; i--) {
      restMin[i] = restMin[i + 1] + levels[i][0] * gridResolution;
      restMax[i] = restMax[i + 1] + levels[i][levels[i].length - 1] * gridResolution;
    }

    const n = this.n;
    const current = new Array<number>(n).fill(0);

    function* walk(i: number, partial: number): Generator<number[], void, undefined> {
      if (partial + restMin[i] > weightSum.max + tol) return;
      if (partial + restMax[i] < weightSum.min - tol) return;

      if (i === n) {
        yield [...current];
        return;
      }

      for (const level of levels[i]) {
        const w = roundToResolution(level * gridResolution);
        current[i] = w;
        yield* walk(i + 1, partial + w);
      }
    }

    yield* walk(0, 0);
  }

  private insideBox(w: number[]): boolean {
    const { min, max } = this.config.bounds;
    for (let i = 0; i < this.n; i++) {
      if (w[i] < min[i] - FEASIBILITY_TOLERANCE || w[i] > max[i] + FEASIBILITY_TOLERANCE) return false;
    }
    return true;
  }
}

/** Remove ruído de ponto flutuante de level * resolution (e o -0) */
function roundToResolution(value: number): number {
  return Math.round(value * 1e10) / 1e10 + 0;
}

export function createRandomPortfolioGenerator(
  config: Partial<RandomPortfolioGeneratorConfig> & Pick<RandomPortfolioGeneratorConfig, "bounds" | "weightSum">
): RandomPortfolioGenerator {
  return new RandomPortfolioGenerator({ ...DEFAULT_GENERATOR_CONFIG, ...config });
}
