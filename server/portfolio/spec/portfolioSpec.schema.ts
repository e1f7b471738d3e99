/**
 * Schemas zod da entrada da especificação e da matriz de retornos,
 * e a conversão para os tipos do domínio.
 */

import { z } from "zod";
import { ReturnsMatrix } from "../data/ReturnsMatrix";
import { PortfolioSpec } from "./PortfolioSpec";
import {
  type Constraint,
  box,
  diversification,
  factorExposure,
  fullInvestment,
  group,
  leverageExposure,
  longOnly,
  positionLimit,
  turnover,
  weightSum,
} from "./constraints";
import {
  type Objective,
  DEFAULT_RISK_BUDGET_PENALTY,
  concentrationObjective,
  quadraticUtility,
  returnObjective,
  riskBudgetObjective,
  riskObjective,
} from "./objectives";

// ============================================================================
// CONSTRAINTS
// ============================================================================

const boundSchema = z.union([z.number(), z.array(z.number())]);
const enabledSchema = z.boolean().default(true);

export const constraintInputSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("full_investment"), enabled: enabledSchema }),
  z.object({ type: z.literal("weight_sum"), min: z.number(), max: z.number(), enabled: enabledSchema }),
  z.object({ type: z.literal("box"), min: boundSchema, max: boundSchema, enabled: enabledSchema }),
  z.object({ type: z.literal("long_only"), enabled: enabledSchema }),
  z.object({
    type: z.literal("group"),
    groups: z.array(z.object({
      id: z.string().min(1),
      assets: z.array(z.string()).min(1),
      min: z.number(),
      max: z.number(),
    })).min(1),
    enabled: enabledSchema,
  }),
  z.object({
    type: z.literal("turnover"),
    max: z.number().nonnegative(),
    baseWeights: z.array(z.number()).optional(),
    enabled: enabledSchema,
  }),
  z.object({
    type: z.literal("diversification"),
    target: z.number(),
    tolerance: z.number().nonnegative().default(0.05),
    enabled: enabledSchema,
  }),
  z.object({
    type: z.literal("position_limit"),
    maxPositions: z.number().int().nonnegative().optional(),
    maxLong: z.number().int().nonnegative().optional(),
    maxShort: z.number().int().nonnegative().optional(),
    enabled: enabledSchema,
  }),
  z.object({
    type: z.literal("factor_exposure"),
    loadings: z.array(z.array(z.number())),
    min: z.array(z.number()),
    max: z.array(z.number()),
    factorNames: z.array(z.string()).optional(),
    enabled: enabledSchema,
  }),
  z.object({ type: z.literal("leverage_exposure"), max: z.number().positive(), enabled: enabledSchema }),
]);

export type ConstraintInput = z.infer<typeof constraintInputSchema>;

// ============================================================================
// OBJECTIVES
// ============================================================================

const riskMetricSchema = z.enum(["StdDev", "Var"]);

export const objectiveInputSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("return"),
    name: z.string().optional(),
    multiplier: z.number().default(1),
    target: z.number().optional(),
    enabled: enabledSchema,
  }),
  z.object({
    type: z.literal("risk"),
    name: z.string().optional(),
    metric: riskMetricSchema.default("StdDev"),
    multiplier: z.number().default(1),
    target: z.number().optional(),
    enabled: enabledSchema,
  }),
  z.object({
    type: z.literal("risk_budget"),
    name: z.string().optional(),
    metric: riskMetricSchema.default("StdDev"),
    minPct: z.number(),
    maxPct: z.number(),
    penalty: z.number().positive().optional(),
    enabled: enabledSchema,
  }),
  z.object({
    type: z.literal("quadratic_utility"),
    name: z.string().optional(),
    riskAversion: z.number(),
    enabled: enabledSchema,
  }),
  z.object({
    type: z.literal("concentration"),
    name: z.string().optional(),
    multiplier: z.number().default(1),
    enabled: enabledSchema,
  }),
]);

export type ObjectiveInput = z.infer<typeof objectiveInputSchema>;

// ============================================================================
// SPEC / RETURNS
// ============================================================================

export const portfolioSpecInputSchema = z.object({
  assets: z.array(z.string().min(1)).min(1),
  constraints: z.array(constraintInputSchema).default([]),
  objectives: z.array(objectiveInputSchema).min(1),
});

export type PortfolioSpecInput = z.infer<typeof portfolioSpecInputSchema>;

export const returnsInputSchema = z.object({
  assets: z.array(z.string().min(1)).min(1),
  /** Datas ISO (YYYY-MM-DD ou timestamp completo) */
  dates: z.array(z.string()),
  /** Uma linha por data, uma coluna por ativo */
  rows: z.array(z.array(z.number())),
});

export type ReturnsInput = z.infer<typeof returnsInputSchema>;

// ============================================================================
// CONVERSION
// ============================================================================

function toConstraint(input: ConstraintInput): Constraint {
  const constraint = ((): Constraint => {
    switch (input.type) {
      case "full_investment":
        return fullInvestment();
      case "weight_sum":
        return weightSum(input.min, input.max);
      case "box":
        return box(input.min, input.max);
      case "long_only":
        return longOnly();
      case "group":
        return group(input.groups);
      case "turnover":
        return turnover(input.max, input.baseWeights);
      case "diversification":
        return diversification(input.target, input.tolerance);
      case "position_limit":
        return positionLimit({ maxPositions: input.maxPositions, maxLong: input.maxLong, maxShort: input.maxShort });
      case "factor_exposure":
        return factorExposure(input.loadings, input.min, input.max, input.factorNames);
      case "leverage_exposure":
        return leverageExposure(input.max);
    }
  })();
  return { ...constraint, enabled: input.enabled };
}

function toObjective(input: ObjectiveInput, riskBudgetPenalty: number): Objective {
  const objective = ((): Objective => {
    switch (input.type) {
      case "return":
        return returnObjective({ name: input.name, multiplier: input.multiplier, target: input.target });
      case "risk":
        return riskObjective({ name: input.name, metric: input.metric, multiplier: input.multiplier, target: input.target });
      case "risk_budget":
        return riskBudgetObjective({
          name: input.name,
          metric: input.metric,
          minPct: input.minPct,
          maxPct: input.maxPct,
          penalty: input.penalty ?? riskBudgetPenalty,
        });
      case "quadratic_utility":
        return quadraticUtility(input.riskAversion, input.name);
      case "concentration":
        return concentrationObjective(input.multiplier, input.name);
    }
  })();
  return { ...objective, enabled: input.enabled };
}

/**
 * Monta a PortfolioSpec a partir da entrada validada pelo zod.
 * Erros de domínio (limites invertidos, grupos que não particionam...) saem como ConfigError.
 */
export function buildPortfolioSpec(
  input: PortfolioSpecInput,
  riskBudgetPenalty: number = DEFAULT_RISK_BUDGET_PENALTY
): PortfolioSpec {
  let spec = PortfolioSpec.create(input.assets);
  for (const c of input.constraints) {
    spec = spec.addConstraint(toConstraint(c));
  }
  for (const o of input.objectives) {
    spec = spec.addObjective(toObjective(o, riskBudgetPenalty));
  }
  return spec;
}

export function buildReturnsMatrix(input: ReturnsInput): ReturnsMatrix {
  return new ReturnsMatrix(
    input.assets,
    input.dates.map(d => new Date(d)),
    input.rows
  );
}
