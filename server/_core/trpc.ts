import { initTRPC } from "@trpc/server";
import { type OptimizerSettings, loadOptimizerSettings } from "../portfolio/config/optimizer.config";

export type TrpcContext = {
  /** Configurações do otimizador carregadas do ambiente */
  settings: OptimizerSettings;
};

export function createContext(env: NodeJS.ProcessEnv = process.env): TrpcContext {
  return { settings: loadOptimizerSettings(env) };
}

const t = initTRPC.context<TrpcContext>().create();

export const router = t.router;
export const publicProcedure = t.procedure;
export const createCallerFactory = t.createCallerFactory;
