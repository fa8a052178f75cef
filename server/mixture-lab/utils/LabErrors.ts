/**
 * LabErrors - Erros Estruturados do Laboratório
 *
 * Separa três famílias de falha para que o chamador consiga distinguir:
 * - Configuração inválida (falha rápida na construção)
 * - Exaustão de enumeração (uso incorreto de step() sem valor seguinte)
 * - Falha numérica irrecuperável (matriz inválida, dimensões incompatíveis)
 *
 * Exaustão normal de iteradores NÃO usa exceção: é sinalizada por `done: true`.
 *
 * @version 1.0.0
 */

// ============================================================================
// ERROR CODES
// ============================================================================

export const LAB_ERROR_CODES = {
  // Erros de configuração
  CONFIG_INVALID: "LAB_CONFIG_INVALID",
  NODE_NOT_FOUND: "LAB_NODE_NOT_FOUND",

  // Erros de enumeração
  GRID_EXHAUSTED: "LAB_GRID_EXHAUSTED",
  CONSTRAINT_UNSATISFIABLE: "LAB_CONSTRAINT_UNSATISFIABLE",
  SHUFFLE_ATTEMPTS_EXCEEDED: "LAB_SHUFFLE_ATTEMPTS_EXCEEDED",

  // Erros numéricos
  DIMENSION_MISMATCH: "LAB_DIMENSION_MISMATCH",
  MATRIX_NOT_PSD: "LAB_MATRIX_NOT_PSD",
  NOT_POSITIVE_DEFINITE: "LAB_NOT_POSITIVE_DEFINITE",

  // Erro genérico (último recurso)
  INTERNAL_ERROR: "LAB_INTERNAL_ERROR",
} as const;

export type LabErrorCode = typeof LAB_ERROR_CODES[keyof typeof LAB_ERROR_CODES];

export type LabErrorCategory = "configuration" | "exhaustion" | "numerical" | "internal";

export type LabErrorDetails = Record<string, unknown>;

export interface LabErrorResponse {
  success: false;
  error: {
    code: LabErrorCode;
    category: LabErrorCategory;
    message: string;
    details?: LabErrorDetails;
    timestamp: string;
  };
}

// ============================================================================
// CUSTOM ERROR CLASS
// ============================================================================

export class LabError extends Error {
  public readonly code: LabErrorCode;
  public readonly details?: LabErrorDetails;
  public readonly timestamp: string;

  constructor(code: LabErrorCode, message: string, details?: LabErrorDetails) {
    super(message);
    this.name = "LabError";
    this.code = code;
    this.details = details;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LabError);
    }
  }

  /**
   * Família do erro, derivada do código
   */
  get category(): LabErrorCategory {
    switch (this.code) {
      case LAB_ERROR_CODES.CONFIG_INVALID:
      case LAB_ERROR_CODES.NODE_NOT_FOUND:
        return "configuration";

      case LAB_ERROR_CODES.GRID_EXHAUSTED:
      case LAB_ERROR_CODES.CONSTRAINT_UNSATISFIABLE:
      case LAB_ERROR_CODES.SHUFFLE_ATTEMPTS_EXCEEDED:
        return "exhaustion";

      case LAB_ERROR_CODES.DIMENSION_MISMATCH:
      case LAB_ERROR_CODES.MATRIX_NOT_PSD:
      case LAB_ERROR_CODES.NOT_POSITIVE_DEFINITE:
        return "numerical";

      default:
        return "internal";
    }
  }

  toResponse(): LabErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        category: this.category,
        message: this.message,
        details: this.details,
        timestamp: this.timestamp,
      },
    };
  }
}

// ============================================================================
// ERROR FACTORY FUNCTIONS
// ============================================================================

export function createConfigInvalidError(field: string, reason: string): LabError {
  return new LabError(
    LAB_ERROR_CODES.CONFIG_INVALID,
    `Configuração inválida: ${field} - ${reason}`,
    { field, reason }
  );
}

export function createGridExhaustedError(source: string): LabError {
  return new LabError(
    LAB_ERROR_CODES.GRID_EXHAUSTED,
    `Enumeração esgotada: ${source} não possui próximo valor`,
    { source }
  );
}

export function createConstraintUnsatisfiableError(target: number): LabError {
  return new LabError(
    LAB_ERROR_CODES.CONSTRAINT_UNSATISFIABLE,
    `Nenhuma combinação da grade soma ${target}`,
    { target }
  );
}

export function createShuffleAttemptsExceededError(attempts: number, nodes: number): LabError {
  return new LabError(
    LAB_ERROR_CODES.SHUFFLE_ATTEMPTS_EXCEEDED,
    `Nenhum DAG cobrindo os ${nodes} nós após ${attempts} tentativas`,
    { attempts, nodes }
  );
}

export function createDimensionMismatchError(what: string, expected: number, actual: number): LabError {
  return new LabError(
    LAB_ERROR_CODES.DIMENSION_MISMATCH,
    `Dimensão incompatível em ${what}: esperado ${expected}, recebido ${actual}`,
    { what, expected, actual }
  );
}

export function createMatrixNotPsdError(minEigenvalue: number): LabError {
  return new LabError(
    LAB_ERROR_CODES.MATRIX_NOT_PSD,
    `Covariância não é simétrica semidefinida positiva (menor autovalor: ${minEigenvalue})`,
    { minEigenvalue }
  );
}

export function createNotPositiveDefiniteError(component: number): LabError {
  return new LabError(
    LAB_ERROR_CODES.NOT_POSITIVE_DEFINITE,
    `Caminho rápido exige covariâncias definidas positivas (componente ${component})`,
    { component }
  );
}

export function createNodeNotFoundError(name: string): LabError {
  return new LabError(
    LAB_ERROR_CODES.NODE_NOT_FOUND,
    `Nó "${name}" não encontrado`,
    { name }
  );
}

// ============================================================================
// HELPERS
// ============================================================================

export function isLabError(error: unknown, code?: LabErrorCode): error is LabError {
  return error instanceof LabError && (code === undefined || error.code === code);
}

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
