/**
 * Optimizer Configuration - Parâmetros padrão do otimizador
 *
 * Valores padrão do solver estocástico e do backtest, sobrescrevíveis por
 * variáveis de ambiente e validados com zod.
 *
 * @version 1.0.0
 */

import { z } from "zod";
import { DEFAULT_RISK_BUDGET_PENALTY } from "../spec/objectives";
import { createConfigInvalidError } from "../utils/PortfolioErrors";
import { isLogLevel, setGlobalLogLevel } from "../utils/PortfolioLogger";

// ============================================================================
// SCHEMA
// ============================================================================

export const optimizerSettingsSchema = z.object({
  /** Candidatas sorteadas pela busca estocástica */
  permutations: z.number().int().positive().default(2000),
  seed: z.number().int().nonnegative().default(42),
  rpMethod: z.enum(["simplex", "sample", "grid"]).default("simplex"),
  /** Expoentes face/edge/vertex do simplex */
  fev: z.array(z.number().nonnegative()).min(1).default([0, 1, 2, 3, 4, 5]),
  gridResolution: z.number().positive().max(1).default(0.05),
  maxResample: z.number().int().nonnegative().default(50),
  riskBudgetPenalty: z.number().positive().default(DEFAULT_RISK_BUDGET_PENALTY),
  yieldIntervalMs: z.number().nonnegative().default(10),
  includeEqualWeight: z.boolean().default(true),
});

export type OptimizerSettings = z.infer<typeof optimizerSettingsSchema>;
export type OptimizerSettingsInput = z.input<typeof optimizerSettingsSchema>;

export const DEFAULT_OPTIMIZER_SETTINGS: OptimizerSettings = optimizerSettingsSchema.parse({});

// ============================================================================
// ENVIRONMENT
// ============================================================================

/**
 * Variáveis de ambiente reconhecidas
 */
export const ENV_KEYS = {
  PERMUTATIONS: "PORTFOLIO_PERMUTATIONS",
  SEED: "PORTFOLIO_SEED",
  RP_METHOD: "PORTFOLIO_RP_METHOD",
  GRID_RESOLUTION: "PORTFOLIO_GRID_RESOLUTION",
  LOG_LEVEL: "LOG_LEVEL",
} as const;

function numberFromEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw createConfigInvalidError(key, `valor numérico inválido: "${raw}"`);
  }
  return value;
}

/**
 * Lê as configurações do ambiente sobre os padrões. Valores inválidos
 * resultam em ConfigError, nunca em padrão silencioso.
 */
export function loadOptimizerSettings(env: NodeJS.ProcessEnv = process.env): OptimizerSettings {
  const rpMethod = env[ENV_KEYS.RP_METHOD];
  const candidate = {
    permutations: numberFromEnv(env, ENV_KEYS.PERMUTATIONS),
    seed: numberFromEnv(env, ENV_KEYS.SEED),
    rpMethod: rpMethod === undefined || rpMethod === "" ? undefined : rpMethod,
    gridResolution: numberFromEnv(env, ENV_KEYS.GRID_RESOLUTION),
  };

  const parsed = optimizerSettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw createConfigInvalidError(issue.path.join(".") || "settings", issue.message);
  }

  const logLevel = env[ENV_KEYS.LOG_LEVEL];
  if (logLevel !== undefined && logLevel !== "") {
    if (!isLogLevel(logLevel)) {
      throw createConfigInvalidError(ENV_KEYS.LOG_LEVEL, `nível desconhecido: "${logLevel}"`);
    }
    setGlobalLogLevel(logLevel);
  }

  return parsed.data;
}

/**
 * Mescla valores parciais (ex: vindos do router) sobre uma base já validada
 */
export function resolveOptimizerSettings(
  overrides: OptimizerSettingsInput = {},
  base: OptimizerSettings = DEFAULT_OPTIMIZER_SETTINGS
): OptimizerSettings {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const parsed = optimizerSettingsSchema.safeParse({ ...base, ...defined });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw createConfigInvalidError(issue.path.join(".") || "settings", issue.message);
  }
  return parsed.data;
}
