/**
 * LabLogger - Sistema de Logging do Laboratório
 *
 * Implementa:
 * - Níveis de log configuráveis (debug, info, warn, error)
 * - Throttling para logs em loops (máximo 1 log por intervalo)
 * - Logs de progresso para enumerações longas
 * - Controle de verbosidade por ambiente
 *
 * @version 1.0.0
 */

import { parseLogLevel } from "../config/lab.config";

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

type LogDetails = Record<string, string | number | boolean | null | undefined>;

// ============================================================================
// DEFAULT CONFIG
// ============================================================================

const DEFAULT_CONFIG: LoggerConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL),
  prefix: "[Lab]",
  throttleIntervalMs: 5000,
  enableProgressLogs: true,
  progressLogInterval: 1000,
};

// Níveis de log ordenados por prioridade
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ============================================================================
// LAB LOGGER CLASS
// ============================================================================

export class LabLogger {
  private config: LoggerConfig;
  private throttleStates: Map<string, ThrottleState> = new Map();

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Verifica se o nível de log deve ser exibido
   */
  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  private formatMessage(message: string, context?: string): string {
    const timestamp = new Date().toISOString().split("T")[1].slice(0, 12);
    const contextStr = context ? ` [${context}]` : "";
    return `${timestamp} ${this.config.prefix}${contextStr} ${message}`;
  }

  debug(message: string, context?: string): void {
    if (this.isEnabled("debug")) {
      console.log(this.formatMessage(message, context));
    }
  }

  info(message: string, context?: string): void {
    if (this.isEnabled("info")) {
      console.log(this.formatMessage(message, context));
    }
  }

  warn(message: string, context?: string): void {
    if (this.isEnabled("warn")) {
      console.warn(this.formatMessage(`⚠️ ${message}`, context));
    }
  }

  error(message: string, error?: Error, context?: string): void {
    if (this.isEnabled("error")) {
      const errorDetails = error ? `: ${error.message}` : "";
      console.error(this.formatMessage(`❌ ${message}${errorDetails}`, context));
    }
  }

  /**
   * Log throttled - máximo 1 log por intervalo para a mesma chave
   */
  throttled(key: string, level: LogLevel, message: string, context?: string): void {
    if (!this.isEnabled(level)) return;

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
   * Log de progresso - exibe apenas a cada N iterações
   *
   * `total` pode ser null quando a enumeração não tem tamanho conhecido.
   */
  progress(current: number, total: number | null, message: string, context?: string): void {
    if (!this.config.enableProgressLogs) return;
    if (!this.isEnabled("info")) return;

    if (current % this.config.progressLogInterval === 0 || current === total) {
      const suffix = total !== null && total > 0
        ? ` [${current}/${total}] (${((current / total) * 100).toFixed(1)}%)`
        : ` [${current}]`;
      this.info(`${message}${suffix}`, context);
    }
  }

  startOperation(operation: string, details?: LogDetails): void {
    if (!this.isEnabled("info")) return;
    console.log(`${this.config.prefix} 🚀 ${operation}${formatDetails(details)}`);
  }

  endOperation(operation: string, success: boolean, details?: LogDetails): void {
    if (!this.isEnabled(success ? "info" : "error")) return;
    const status = success ? "✅ CONCLUÍDO" : "❌ FALHOU";
    console.log(`${this.config.prefix} ${status}: ${operation}${formatDetails(details)}`);
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

function formatDetails(details?: LogDetails): string {
  if (!details) return "";
  return ` | ${Object.entries(details).map(([k, v]) => `${k}: ${v}`).join(", ")}`;
}

// ============================================================================
// SINGLETON INSTANCES
// ============================================================================

/** Logger para enumeração em grade */
export const gridLogger = new LabLogger({
  prefix: "[Grid]",
  progressLogInterval: 10_000,
});

/** Logger para o motor de OLR */
export const overlapLogger = new LabLogger({
  prefix: "[Overlap]",
  progressLogInterval: 100,
});

/** Logger para os operadores evolutivos e objetivo */
export const evolutionLogger = new LabLogger({
  prefix: "[Evolution]",
  progressLogInterval: 100,
});

const ALL_LOGGERS = [gridLogger, overlapLogger, evolutionLogger];

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * Configura o nível de log global para todos os loggers
 */
export function setGlobalLogLevel(level: LogLevel): void {
  for (const logger of ALL_LOGGERS) {
    logger.setConfig({ level });
  }
}

/**
 * Habilita modo silencioso (apenas erros, sem progresso)
 */
export function enableSilentMode(): void {
  for (const logger of ALL_LOGGERS) {
    logger.setConfig({ level: "error", enableProgressLogs: false });
  }
}
