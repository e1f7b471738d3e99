/**
 * ExactSolver - Solução exata por programação quadrática
 *
 * Só aceita especificações representáveis como QP convexo:
 * - restrições: weight_sum, box, group, factor_exposure e leverage_exposure
 *   (esta última apenas com mínimos >= 0, quando Σ|w| = Σw)
 * - objetivos sem target: return, risk(Var), quadratic_utility, concentration;
 *   risk(StdDev) apenas como objetivo único (minimizar σ e σ² coincidem)
 *
 * Qualquer outra coisa é ConfigError: o chamador escolhe "stochastic" explicitamente.
 *
 * @version 1.0.0
 */

import type { ReturnsMatrix } from "../data/ReturnsMatrix";
import type { Bounds, OptimizationResult, Range } from "../types/portfolio.types";
import type { PortfolioSpec } from "../spec/PortfolioSpec";
import { type Constraint, FEASIBILITY_TOLERANCE, checkAll, resolveBounds, resolveBudget } from "../spec/constraints";
import type { Objective } from "../spec/objectives";
import { ObjectiveEvaluator } from "../evaluation/ObjectiveEvaluator";
import { addScaled, identity, sum, zeros } from "../math/matrix";
import { ConfigError, InfeasibleError, SolverError } from "../utils/PortfolioErrors";
import { optimizationLogger } from "../utils/PortfolioLogger";
import { type QuadraticProgram, type QuadraticProgramSolver, QuadprogSolver } from "./QuadprogSolver";

/** Violações de caixa abaixo disso são ruído numérico do QP e são cortadas */
const CLAMP_TOLERANCE = 1e-8;

const EXACT_CONSTRAINTS = new Set<Constraint["kind"]>([
  "weight_sum",
  "box",
  "group",
  "factor_exposure",
  "leverage_exposure",
]);

// ============================================================================
// REPRESENTABILITY
// ============================================================================

/**
 * Lança ConfigError se a especificação não for representável como QP
 */
export function assertExactRepresentable(spec: PortfolioSpec): void {
  const constraints = spec.activeConstraints;
  const objectives = spec.activeObjectives;

  for (const c of constraints) {
    if (!EXACT_CONSTRAINTS.has(c.kind)) {
      throw new ConfigError(
        `Restrição "${c.name}" não é representável no modo exato; use method "stochastic"`,
        { constraint: c.kind }
      );
    }
  }

  if (constraints.some(c => c.kind === "leverage_exposure")) {
    const bounds = resolveBounds(constraints, spec.size);
    if (bounds.min.some(m => m < 0)) {
      throw new ConfigError(
        "leverage_exposure só é representável no modo exato com limites mínimos >= 0",
        { constraint: "leverage_exposure" }
      );
    }
  }

  for (const o of objectives) {
    if (o.kind === "risk_budget") {
      throw new ConfigError(
        `Objetivo "${o.name}" (risk_budget) exige solver não linear; use method "stochastic"`,
        { objective: o.kind }
      );
    }
    if ((o.kind === "return" || o.kind === "risk") && o.target !== undefined) {
      throw new ConfigError(
        `Objetivo "${o.name}" com target não é representável no modo exato`,
        { objective: o.kind }
      );
    }
    if (o.kind === "risk" && o.metric === "StdDev" && objectives.length > 1) {
      throw new ConfigError(
        `Objetivo "${o.name}" (StdDev) só é aceito no modo exato como objetivo único; use metric "Var"`,
        { objective: o.kind }
      );
    }
  }
}

// ============================================================================
// FORMULATION
// ============================================================================

function objectiveTerms(objectives: readonly Objective[], means: number[], covariance: number[][]): { Q: number[][]; c: number[] } {
  const n = means.length;
  let Q = zeros(n, n);
  const c = new Array<number>(n).fill(0);

  for (const o of objectives) {
    switch (o.kind) {
      case "return":
        for (let i = 0; i < n; i++) c[i] += o.multiplier * means[i];
        break;
      case "risk":
        Q = addScaled(Q, covariance, o.multiplier);
        break;
      case "quadratic_utility":
        for (let i = 0; i < n; i++) c[i] += means[i];
        Q = addScaled(Q, covariance, o.riskAversion);
        break;
      case "concentration":
        Q = addScaled(Q, identity(n), o.multiplier);
        break;
      case "risk_budget":
        break;
    }
  }
  return { Q, c };
}

function pushRange(problem: QuadraticProgram, row: number[], range: Range): void {
  if (range.min === range.max) {
    problem.Aeq.push(row);
    problem.beq.push(range.min);
    return;
  }
  if (Number.isFinite(range.max)) {
    problem.Aineq.push(row);
    problem.bineq.push(range.max);
  }
  if (Number.isFinite(range.min)) {
    problem.Aineq.push(row.map(v => -v));
    problem.bineq.push(-range.min);
  }
}

/**
 * Monta Q, c e as restrições lineares a partir da especificação
 */
export function buildQuadraticProgram(
  spec: PortfolioSpec,
  means: number[],
  covariance: number[][],
  bounds: Bounds,
  weightSum: Range
): QuadraticProgram {
  const n = spec.size;
  const { Q, c } = objectiveTerms(spec.activeObjectives, means, covariance);
  const problem: QuadraticProgram = { Q, c, Aeq: [], beq: [], Aineq: [], bineq: [] };
  const unit = (i: number): number[] => Array.from({ length: n }, (_, j) => (i === j ? 1 : 0));
  const ones = new Array<number>(n).fill(1);

  pushRange(problem, ones, weightSum);

  for (let i = 0; i < n; i++) {
    pushRange(problem, unit(i), { min: bounds.min[i], max: bounds.max[i] });
  }

  for (const constraint of spec.activeConstraints) {
    switch (constraint.kind) {
      case "group":
        for (const g of constraint.groups) {
          const row = spec.assets.map(a => (g.assets.includes(a) ? 1 : 0));
          pushRange(problem, row, { min: g.min, max: g.max });
        }
        break;
      case "factor_exposure":
        constraint.min.forEach((min, f) => {
          const row = constraint.loadings.map(loading => loading[f]);
          pushRange(problem, row, { min, max: constraint.max[f] });
        });
        break;
      case "leverage_exposure":
        pushRange(problem, ones, { min: -Infinity, max: constraint.max });
        break;
      default:
        break;
    }
  }

  return problem;
}

/**
 * Detecta caixa e orçamento incompatíveis antes de chamar o QP
 */
export function assertBoxBudgetCompatible(bounds: Bounds, weightSum: Range): void {
  const tol = FEASIBILITY_TOLERANCE;

  bounds.min.forEach((min, i) => {
    if (min > bounds.max[i] + tol) {
      throw new InfeasibleError(`Limites do ativo ${i} vazios: [${min}, ${bounds.max[i]}]`, { asset: i });
    }
  });

  if (weightSum.min > weightSum.max + tol) {
    throw new InfeasibleError(`Faixa de soma vazia: [${weightSum.min}, ${weightSum.max}]`);
  }

  const minTotal = sum(bounds.min);
  const maxTotal = sum(bounds.max);
  if (minTotal > weightSum.max + tol) {
    throw new InfeasibleError(
      `Soma dos mínimos (${minTotal}) excede a soma máxima de pesos (${weightSum.max})`,
      { minTotal, maxSum: weightSum.max }
    );
  }
  if (maxTotal < weightSum.min - tol) {
    throw new InfeasibleError(
      `Soma dos máximos (${maxTotal}) abaixo da soma mínima de pesos (${weightSum.min})`,
      { maxTotal, minSum: weightSum.min }
    );
  }
}

// ============================================================================
// SOLVER
// ============================================================================

export class ExactSolver {
  constructor(private readonly qpSolver: QuadraticProgramSolver = new QuadprogSolver()) {}

  solve(spec: PortfolioSpec, window: ReturnsMatrix): OptimizationResult {
    const startTime = Date.now();
    assertExactRepresentable(spec);

    const bounds = resolveBounds(spec.activeConstraints, spec.size);
    const weightSum = resolveBudget(spec.activeConstraints);
    assertBoxBudgetCompatible(bounds, weightSum);

    const evaluator = new ObjectiveEvaluator(spec.activeObjectives, window);
    const { means, covariance } = evaluator.moments;
    const problem = buildQuadraticProgram(spec, means, covariance, bounds, weightSum);

    optimizationLogger.debug(
      `QP com ${problem.Aeq.length} igualdades e ${problem.Aineq.length} desigualdades`,
      "ExactSolver"
    );

    const solution = this.qpSolver.solve(problem);

    const weights = solution.weights.map((w, i) => {
      if (w < bounds.min[i] && bounds.min[i] - w < CLAMP_TOLERANCE) return bounds.min[i];
      if (w > bounds.max[i] && w - bounds.max[i] < CLAMP_TOLERANCE) return bounds.max[i];
      return w;
    });

    const check = checkAll(spec.activeConstraints, weights, spec.context);
    if (!check.feasible) {
      throw new SolverError(
        `Solução do QP viola restrições: ${check.violations.map(v => v.message).join("; ")}`,
        { violations: check.violations }
      );
    }

    const evaluation = evaluator.evaluate(weights);

    return {
      weights: { assets: [...spec.assets], weights },
      score: evaluation.score,
      objectiveMeasures: evaluation.measures,
      contributions: evaluation.contributions,
      solver: {
        method: "exact",
        candidatesEvaluated: 1,
        feasibleCandidates: 1,
        iterations: solution.iterations,
        aborted: false,
        elapsedMs: Date.now() - startTime,
      },
    };
  }
}
