/**
 * PortfolioLogger - Logging do Otimizador de Carteiras
 *
 * Implementa:
 * - Níveis de log configuráveis (debug, info, warn, error)
 * - Throttling para logs dentro da busca estocástica
 * - Logs de progresso a cada N candidatos / datas
 * - Banners de início e fim de operação
 *
 * @version 1.0.0
 */

// ============================================================================
// TYPES
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerConfig {
  /** Nível mínimo de log a ser exibido */
  level: LogLevel;
  /** Prefixo para todas as mensagens */
  prefix: string;
  /** Intervalo mínimo entre logs throttled (ms) */
  throttleIntervalMs: number;
  /** Habilitar logs de progresso em loops */
  enableProgressLogs: boolean;
  /** Intervalo para logs de progresso (número de iterações) */
  progressLogInterval: number;
}

interface ThrottleState {
  lastLogTime: number;
  suppressedCount: number;
}

// ============================================================================
// DEFAULT CONFIG
// ============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL;

const DEFAULT_CONFIG: LoggerConfig = {
  level: isLogLevel(envLevel) ? envLevel : "info",
  prefix: "[Portfolio]",
  throttleIntervalMs: 5000,
  enableProgressLogs: true,
  progressLogInterval: 1000,
};

// ============================================================================
// PORTFOLIO LOGGER CLASS
// ============================================================================

export class PortfolioLogger {
  private config: LoggerConfig;
  private throttleStates: Map<string, ThrottleState> = new Map();

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  private formatMessage(message: string, context?: string): string {
    const timestamp = new Date().toISOString().split("T")[1].slice(0, 12);
    const contextStr = context ? ` [${context}]` : "";
    return `${timestamp} ${this.config.prefix}${contextStr} ${message}`;
  }

  debug(message: string, context?: string): void {
    if (this.shouldLog("debug")) {
      console.log(this.formatMessage(message, context));
    }
  }

  info(message: string, context?: string): void {
    if (this.shouldLog("info")) {
      console.log(this.formatMessage(message, context));
    }
  }

  warn(message: string, context?: string): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage(`⚠️ ${message}`, context));
    }
  }

  error(message: string, error?: Error, context?: string): void {
    if (this.shouldLog("error")) {
      const errorDetails = error ? `: ${error.message}` : "";
      console.error(this.formatMessage(`❌ ${message}${errorDetails}`, context));
    }
  }

  /**
   * Log throttled - máximo 1 log por intervalo para a mesma chave
   */
  throttled(key: string, level: LogLevel, message: string, context?: string): void {
    if (!this.shouldLog(level)) return;

    const now = Date.now();
    const state = this.throttleStates.get(key) ?? { lastLogTime: 0, suppressedCount: 0 };

    if (now - state.lastLogTime >= this.config.throttleIntervalMs) {
      const suppressedInfo = state.suppressedCount > 0
        ? ` (${state.suppressedCount} logs suprimidos)`
        : "";

      switch (level) {
        case "debug":
          this.debug(`${message}${suppressedInfo}`, context);
          break;
        case "info":
          this.info(`${message}${suppressedInfo}`, context);
          break;
        case "warn":
          this.warn(`${message}${suppressedInfo}`, context);
          break;
        case "error":
          this.error(`${message}${suppressedInfo}`, undefined, context);
          break;
      }

      this.throttleStates.set(key, { lastLogTime: now, suppressedCount: 0 });
    } else {
      state.suppressedCount++;
      this.throttleStates.set(key, state);
    }
  }

  /**
   * Log de progresso - exibe apenas a cada N iterações ou no final
   */
  progress(current: number, total: number, message: string, context?: string): void {
    if (!this.config.enableProgressLogs) return;
    if (!this.shouldLog("info")) return;

    if (current % this.config.progressLogInterval === 0 || current === total) {
      const percent = total > 0 ? ((current / total) * 100).toFixed(1) : "100.0";
      this.info(`${message} [${current}/${total}] (${percent}%)`, context);
    }
  }

  /**
   * Início de operação (respeita o nível info)
   */
  startOperation(operation: string, details?: Record<string, string | number | boolean>): void {
    if (!this.shouldLog("info")) return;
    console.log(`${this.config.prefix} 🚀 ${operation}${formatDetails(details)}`);
  }

  endOperation(operation: string, success: boolean, details?: Record<string, string | number | boolean>): void {
    if (!this.shouldLog(success ? "info" : "error")) return;
    const status = success ? "✅ CONCLUÍDO" : "❌ FALHOU";
    const line = `${this.config.prefix} ${status}: ${operation}${formatDetails(details)}`;
    if (success) {
      console.log(line);
    } else {
      console.error(line);
    }
  }

  setConfig(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  reset(): void {
    this.throttleStates.clear();
  }
}

function formatDetails(details?: Record<string, string | number | boolean>): string {
  if (!details) return "";
  return ` | ${Object.entries(details).map(([k, v]) => `${k}: ${v}`).join(", ")}`;
}

// ============================================================================
// SINGLETON INSTANCES
// ============================================================================

/** Logger dos solvers (exato e estocástico) */
export const optimizationLogger = new PortfolioLogger({
  prefix: "[Optimization]",
  progressLogInterval: 1000,
});

/** Logger do backtest com rebalanceamento */
export const backtestLogger = new PortfolioLogger({
  prefix: "[Rebalancing]",
  progressLogInterval: 12,
});

/** Logger genérico (config, router) */
export const portfolioLogger = new PortfolioLogger({
  prefix: "[Portfolio]",
});

const ALL_LOGGERS = [optimizationLogger, backtestLogger, portfolioLogger];

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

export function setGlobalLogLevel(level: LogLevel): void {
  for (const logger of ALL_LOGGERS) {
    logger.setConfig({ level });
  }
}

export function disableProgressLogs(): void {
  for (const logger of ALL_LOGGERS) {
    logger.setConfig({ enableProgressLogs: false });
  }
}

/**
 * Modo silencioso (apenas erros) - usado pelos testes
 */
export function enableSilentMode(): void {
  setGlobalLogLevel("error");
  disableProgressLogs();
}
