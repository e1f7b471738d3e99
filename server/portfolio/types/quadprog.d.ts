/**
 * Tipos do pacote quadprog (o pacote não publica declarações).
 * Vetores e matrizes são indexados a partir de 1; a posição 0 é ignorada.
 */
declare module "quadprog" {
  export interface QPResult {
    solution: number[];
    value: number[];
    unconstrained_solution: number[];
    iterations: number[];
    iact: number[];
    /** Vazio em caso de sucesso */
    message: string;
  }

  /**
   * Minimiza ½ xᵀDx − dᵀx sujeito a Aᵀx ≥ b; as primeiras meq restrições são igualdades.
   */
  export function solveQP(
    Dmat: number[][],
    dvec: number[],
    Amat: number[][],
    bvec: number[],
    meq?: number,
    factorized?: number[]
  ): QPResult;
}
