/**
 * Portfolio Module - Exports
 *
 * Ponto de entrada do otimizador de carteiras.
 *
 * @version 1.0.0
 */

// Types
export * from "./types/portfolio.types";

// Data
export { ReturnsMatrix } from "./data/ReturnsMatrix";
export type { ReturnsRecord } from "./data/ReturnsMatrix";

// Specification
export * from "./spec/constraints";
export * from "./spec/objectives";
export { PortfolioSpec } from "./spec/PortfolioSpec";
export {
  constraintInputSchema,
  objectiveInputSchema,
  portfolioSpecInputSchema,
  returnsInputSchema,
  buildPortfolioSpec,
  buildReturnsMatrix,
} from "./spec/portfolioSpec.schema";

// Generation / Evaluation
export { RandomPortfolioGenerator, createRandomPortfolioGenerator, DEFAULT_GENERATOR_CONFIG } from "./generation/RandomPortfolioGenerator";
export type { RandomPortfolioGeneratorConfig } from "./generation/RandomPortfolioGenerator";
export { ObjectiveEvaluator } from "./evaluation/ObjectiveEvaluator";
export type { EvaluationResult } from "./evaluation/ObjectiveEvaluator";

// Solvers
export { optimizePortfolio } from "./solvers/SolverDispatcher";
export type { OptimizeOptions } from "./solvers/SolverDispatcher";
export { ExactSolver, assertExactRepresentable } from "./solvers/ExactSolver";
export { StochasticSolver } from "./solvers/StochasticSolver";
export { QuadprogSolver } from "./solvers/QuadprogSolver";
export type { QuadraticProgram, QuadraticProgramSolution, QuadraticProgramSolver } from "./solvers/QuadprogSolver";

// Rebalancing
export { runRebalancingBacktest } from "./rebalancing/RebalancingBacktestEngine";
export type { BacktestOptions } from "./rebalancing/RebalancingBacktestEngine";
export { buildRebalancingSchedule, periodKey } from "./rebalancing/RebalancingSchedule";
export { extractWeights, extractObjectiveMeasures, realizedPortfolioReturns } from "./rebalancing/backtestExtractors";

// Config / Utils
export * from "./config/optimizer.config";
export * from "./utils/PortfolioErrors";
export { optimizationLogger, backtestLogger, portfolioLogger, setGlobalLogLevel, enableSilentMode } from "./utils/PortfolioLogger";
export { SeededRNG, createSeededRNG, createRebalanceSeed } from "./utils/SeededRNG";

// Router
export { portfolioRouter } from "./portfolioRouter";
