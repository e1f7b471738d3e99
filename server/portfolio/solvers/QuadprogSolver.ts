/**
 * QuadprogSolver - Adaptador do pacote quadprog (Goldfarb-Idnani)
 *
 * Problema no formato do otimizador:
 *   minimizar wᵀQw − cᵀw
 *   sujeito a  Aeq w = beq,  Aineq w ≤ bineq
 *
 * quadprog resolve ½ wᵀDw − dᵀw com Aᵀw ≥ b em arrays indexados a partir de 1,
 * então D = 2Q, d = c e as desigualdades são negadas.
 */

import { solveQP } from "quadprog";
import { InfeasibleError, SolverError } from "../utils/PortfolioErrors";

export interface QuadraticProgram {
  Q: number[][];
  c: number[];
  Aeq: number[][];
  beq: number[];
  Aineq: number[][];
  bineq: number[];
}

export interface QuadraticProgramSolution {
  weights: number[];
  /** Valor de wᵀQw − cᵀw na solução */
  objectiveValue: number;
  iterations: number;
}

/**
 * Rotina de QP injetável. Deve lançar InfeasibleError quando a região
 * viável é vazia e SolverError para falhas numéricas.
 */
export interface QuadraticProgramSolver {
  solve(problem: QuadraticProgram): QuadraticProgramSolution;
}

/** Regularização da diagonal para manter D positiva definida */
export const QP_RIDGE = 1e-8;

function oneIndexedMatrix(rows: number, cols: number): number[][] {
  return Array.from({ length: rows + 1 }, () => new Array<number>(cols + 1).fill(0));
}

export class QuadprogSolver implements QuadraticProgramSolver {
  constructor(private readonly ridge: number = QP_RIDGE) {}

  solve(problem: QuadraticProgram): QuadraticProgramSolution {
    const n = problem.c.length;
    const meq = problem.Aeq.length;
    const m = meq + problem.Aineq.length;

    const Dmat = oneIndexedMatrix(n, n);
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        Dmat[i + 1][j + 1] = 2 * problem.Q[i][j] + (i === j ? this.ridge : 0);
      }
    }

    const dvec = [0, ...problem.c];

    // Cada restrição é uma coluna de Amat
    const Amat = oneIndexedMatrix(n, Math.max(m, 1));
    const bvec = new Array<number>(Math.max(m, 1) + 1).fill(0);

    problem.Aeq.forEach((row, k) => {
      for (let i = 0; i < n; i++) Amat[i + 1][k + 1] = row[i];
      bvec[k + 1] = problem.beq[k];
    });
    problem.Aineq.forEach((row, k) => {
      const col = meq + k + 1;
      for (let i = 0; i < n; i++) Amat[i + 1][col] = -row[i];
      bvec[col] = -problem.bineq[k];
    });

    const result = solveQP(Dmat, dvec, Amat, bvec, meq);

    if (result.message !== "") {
      if (result.message.includes("inconsistent")) {
        throw new InfeasibleError(`Região viável vazia: ${result.message}`, { qpMessage: result.message });
      }
      throw new SolverError(`Falha no QP: ${result.message}`, { qpMessage: result.message });
    }

    const weights = result.solution.slice(1, n + 1);
    if (weights.length !== n || weights.some(w => !Number.isFinite(w))) {
      throw new SolverError("QP devolveu solução não finita", { solution: weights });
    }

    const iterations = result.iterations[1];
    const value = result.value[1];

    return {
      weights,
      objectiveValue: Number.isFinite(value) ? value : Number.NaN,
      iterations: Number.isFinite(iterations) ? iterations : 0,
    };
  }
}
