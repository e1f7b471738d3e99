/**
 * Portfolio Types - Tipos compartilhados do Otimizador de Carteiras
 *
 * @version 1.0.0
 */

// ============================================================================
// ENUMS / UNIONS
// ============================================================================

/** Método de solução escolhido explicitamente pelo chamador */
export type OptimizationMethod = "exact" | "stochastic";

/** Estratégias de amostragem do gerador de carteiras aleatórias */
export type RandomPortfolioStrategy = "simplex" | "sample" | "grid";

/** Métrica de risco */
export type RiskMetric = "StdDev" | "Var";

/** Frequência de rebalanceamento */
export type RebalanceFrequency = "days" | "weeks" | "months" | "quarters" | "years";

// ============================================================================
// WEIGHTS
// ============================================================================

export interface WeightVector {
  /** Ativos na ordem da especificação */
  assets: string[];
  /** Peso de cada ativo (mesmo comprimento de assets) */
  weights: number[];
}

/** Intervalo fechado [min, max] */
export interface Range {
  min: number;
  max: number;
}

/** Limites por ativo já resolvidos a partir das restrições box */
export interface Bounds {
  min: number[];
  max: number[];
}

// ============================================================================
// OPTIMIZATION RESULT
// ============================================================================

export interface SolverMetadata {
  method: OptimizationMethod;
  /** Candidatas avaliadas (estocástico) */
  candidatesEvaluated: number;
  /** Candidatas que passaram em todas as restrições (estocástico) */
  feasibleCandidates: number;
  /** Iterações do QP (exato) */
  iterations: number;
  /** Busca interrompida externamente */
  aborted: boolean;
  /** Seed usado (estocástico) */
  seed?: number;
  /** Estratégia de amostragem (estocástico) */
  strategy?: RandomPortfolioStrategy;
  elapsedMs: number;
}

export interface OptimizationResult {
  weights: WeightVector;
  /** Score agregado (maximizado) */
  score: number;
  /** Valor realizado de cada objetivo, por nome */
  objectiveMeasures: Record<string, number>;
  /** Contribuição assinada de cada objetivo para o score */
  contributions: Record<string, number>;
  solver: SolverMetadata;
}

// ============================================================================
// REBALANCING
// ============================================================================

export interface RebalancingDate {
  /** Índice da linha da matriz de retornos */
  index: number;
  date: Date;
  /** Início da janela de treino (inclusive) */
  windowStart: number;
  /** Fim da janela de treino (exclusivo, = index) */
  windowEnd: number;
}

export interface RebalanceSolved {
  date: Date;
  status: "optimal";
  result: OptimizationResult;
}

export interface RebalanceGap {
  date: Date;
  status: "no_solution";
  reason: string;
}

export type RebalanceEntry = RebalanceSolved | RebalanceGap;

export interface BacktestResult {
  assets: string[];
  method: OptimizationMethod;
  entries: readonly RebalanceEntry[];
  solvedCount: number;
  gapCount: number;
  elapsedMs: number;
}
