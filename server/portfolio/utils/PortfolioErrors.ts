/**
 * PortfolioErrors - Erros Estruturados do Otimizador
 *
 * Taxonomia:
 * - ConfigError: especificação mal formada (nunca é re-tentada)
 * - InfeasibleError: nenhuma carteira viável (o backtest registra como lacuna)
 * - SolverError: falha numérica do QP que não é inviabilidade
 *
 * @version 1.0.0
 */

import { TRPCError } from "@trpc/server";
import { portfolioLogger } from "./PortfolioLogger";

// ============================================================================
// ERROR CODES
// ============================================================================

export const PORTFOLIO_ERROR_CODES = {
  CONFIG_INVALID: "PORTFOLIO_CONFIG_INVALID",
  INFEASIBLE: "PORTFOLIO_INFEASIBLE",
  SOLVER_FAILED: "PORTFOLIO_SOLVER_FAILED",
  INTERNAL_ERROR: "PORTFOLIO_INTERNAL_ERROR",
} as const;

export type PortfolioErrorCode = typeof PORTFOLIO_ERROR_CODES[keyof typeof PORTFOLIO_ERROR_CODES];

export type ErrorDetails = Record<string, unknown>;

// ============================================================================
// ERROR CLASSES
// ============================================================================

export class PortfolioError extends Error {
  public readonly code: PortfolioErrorCode;
  public readonly details?: ErrorDetails;
  public readonly timestamp: string;

  constructor(code: PortfolioErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = "PortfolioError";
    this.code = code;
    this.details = details;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Converte para TRPCError
   */
  toTRPCError(): TRPCError {
    return new TRPCError({
      code: this.mapToTRPCCode(),
      message: this.message,
      cause: this,
    });
  }

  private mapToTRPCCode(): "BAD_REQUEST" | "PRECONDITION_FAILED" | "INTERNAL_SERVER_ERROR" {
    switch (this.code) {
      case PORTFOLIO_ERROR_CODES.CONFIG_INVALID:
        return "BAD_REQUEST";
      case PORTFOLIO_ERROR_CODES.INFEASIBLE:
        return "PRECONDITION_FAILED";
      default:
        return "INTERNAL_SERVER_ERROR";
    }
  }
}

export class ConfigError extends PortfolioError {
  constructor(message: string, details?: ErrorDetails) {
    super(PORTFOLIO_ERROR_CODES.CONFIG_INVALID, message, details);
    this.name = "ConfigError";
  }
}

export class InfeasibleError extends PortfolioError {
  constructor(message: string, details?: ErrorDetails) {
    super(PORTFOLIO_ERROR_CODES.INFEASIBLE, message, details);
    this.name = "InfeasibleError";
  }
}

export class SolverError extends PortfolioError {
  constructor(message: string, details?: ErrorDetails) {
    super(PORTFOLIO_ERROR_CODES.SOLVER_FAILED, message, details);
    this.name = "SolverError";
  }
}

// ============================================================================
// ERROR FACTORY FUNCTIONS
// ============================================================================

export function createConfigInvalidError(field: string, reason: string, details?: ErrorDetails): ConfigError {
  return new ConfigError(`Configuração inválida: ${field} - ${reason}`, { field, reason, ...details });
}

export function createAssetMismatchError(expected: string[], received: string[]): ConfigError {
  const missing = expected.filter(a => !received.includes(a));
  const unexpected = received.filter(a => !expected.includes(a));
  return new ConfigError(
    `Colunas da matriz de retornos não correspondem aos ativos da carteira (faltando: [${missing.join(", ")}], sobrando: [${unexpected.join(", ")}])`,
    { field: "returns", missing, unexpected }
  );
}

export function createNoFeasibleCandidatesError(evaluated: number): InfeasibleError {
  return new InfeasibleError(
    `Nenhuma carteira viável entre ${evaluated} candidatas. Aumente permutations ou relaxe as restrições.`,
    { evaluated }
  );
}

// ============================================================================
// SANITIZATION FUNCTIONS
// ============================================================================

/**
 * Sanitiza um valor numérico para evitar NaN e Infinity
 */
export function sanitizeNumber(value: unknown, defaultValue: number = 0): number {
  if (typeof value === "bigint") {
    return Number(value);
  }

  if (typeof value !== "number" || !Number.isFinite(value)) {
    return defaultValue;
  }

  return value;
}

/**
 * Sanitiza um mapa nome -> medida antes de expor para fora
 */
export function sanitizeMeasures(measures: Record<string, number>): Record<string, number | null> {
  const sanitized: Record<string, number | null> = {};

  for (const [key, value] of Object.entries(measures)) {
    sanitized[key] = Number.isFinite(value) ? value : null;
  }

  return sanitized;
}

// ============================================================================
// ERROR HANDLER
// ============================================================================

/**
 * Handler centralizado: converte qualquer erro em TRPCError e loga
 */
export function handlePortfolioError(error: unknown, context?: string): never {
  if (error instanceof PortfolioError) {
    portfolioLogger.error(error.message, error, context);
    throw error.toTRPCError();
  }

  if (error instanceof TRPCError) {
    portfolioLogger.error(error.message, error, context);
    throw error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const wrapped = new PortfolioError(PORTFOLIO_ERROR_CODES.INTERNAL_ERROR, message, { originalError: message });

  portfolioLogger.error(message, error instanceof Error ? error : undefined, context);
  throw wrapped.toTRPCError();
}

/**
 * Executa a operação convertendo erros para o formato do router
 */
export async function withErrorHandling<T>(
  operation: string,
  fn: () => Promise<T>,
  context?: string
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    return handlePortfolioError(error, context ?? operation);
  }
}
