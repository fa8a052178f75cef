/**
 * Teste Unitário - Configuração e erros do laboratório
 *
 * @version 1.0.0
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import {
  DEFAULT_LAB_CONFIG,
  getLabConfig,
  loadLabConfig,
  parseLogLevel,
  reloadLabConfig,
} from "../config/lab.config";
import { ConstrainedGridIterator } from "../grid/ConstrainedGridIterator";
import { GridIterator } from "../grid/GridIterator";
import { NumericRange } from "../grid/NumericRange";
import { pairwiseOverlapRates } from "../overlap/OverlapRateEngine";
import {
  createConfigInvalidError,
  createGridExhaustedError,
  createMatrixNotPsdError,
  isLabError,
  LAB_ERROR_CODES,
  LabError,
  sanitizeNumber,
} from "../utils/LabErrors";
import { evolutionLogger, gridLogger, LabLogger, setGlobalLogLevel } from "../utils/LabLogger";

describe("LabConfig - Configuração", () => {
  it("deve usar os valores padrão sem variáveis de ambiente", () => {
    expect(loadLabConfig({})).toEqual(DEFAULT_LAB_CONFIG);
    expect(DEFAULT_LAB_CONFIG).toEqual({
      logLevel: "info",
      overlapPath: "auto",
      sumTolerance: 1e-9,
      shuffleMaxAttempts: 1000,
    });
  });

  it("deve ler as variáveis de ambiente", () => {
    const config = loadLabConfig({
      LOG_LEVEL: "debug",
      LAB_OLR_PATH: "fallback",
      LAB_SUM_TOLERANCE: "0.001",
      LAB_SHUFFLE_MAX_ATTEMPTS: "50",
    });

    expect(config).toEqual({
      logLevel: "debug",
      overlapPath: "fallback",
      sumTolerance: 0.001,
      shuffleMaxAttempts: 50,
    });
  });

  it("nível de log desconhecido deve cair em info", () => {
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
    expect(loadLabConfig({ LOG_LEVEL: "verbose" }).logLevel).toBe("info");
  });

  it("deve rejeitar valores fora dos limites", () => {
    expect(() => loadLabConfig({ LAB_SUM_TOLERANCE: "0.5" })).toThrow();
    expect(() => loadLabConfig({ LAB_SHUFFLE_MAX_ATTEMPTS: "abc" })).toThrow();
    expect(() => loadLabConfig({ LAB_OLR_PATH: "gpu" })).toThrow();
  });
});

describe("LabConfig - Variáveis de ambiente no motor", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    reloadLabConfig();
  });

  it("LAB_OLR_PATH deve trocar o caminho padrão do OLR", () => {
    const singular = {
      weights: [0.5, 0.5],
      means: [[0], [10]],
      covariances: [[[0]], [[1]]],
    };
    expect(() => pairwiseOverlapRates(singular)).not.toThrow();

    vi.stubEnv("LAB_OLR_PATH", "fast");
    reloadLabConfig();

    expect(getLabConfig().overlapPath).toBe("fast");
    expect(() => pairwiseOverlapRates(singular)).toThrow(
      expect.objectContaining({ code: LAB_ERROR_CODES.NOT_POSITIVE_DEFINITE })
    );
  });

  it("LAB_SUM_TOLERANCE deve valer como tolerância padrão da restrição de soma", () => {
    const grid = () => GridIterator.of([NumericRange.const(0.3), NumericRange.const(0.3)]);

    expect(() => new ConstrainedGridIterator(grid(), 0.605)).toThrow(
      expect.objectContaining({ code: LAB_ERROR_CODES.CONSTRAINT_UNSATISFIABLE })
    );

    vi.stubEnv("LAB_SUM_TOLERANCE", "0.01");
    reloadLabConfig();

    expect([...new ConstrainedGridIterator(grid(), 0.605)]).toEqual([[0.3, 0.3]]);
  });
});

describe("LabErrors - Erros estruturados", () => {
  it("deve derivar a categoria do código", () => {
    expect(createConfigInvalidError("x", "y").category).toBe("configuration");
    expect(createGridExhaustedError("grade").category).toBe("exhaustion");
    expect(createMatrixNotPsdError(-1).category).toBe("numerical");
    expect(new LabError(LAB_ERROR_CODES.INTERNAL_ERROR, "falha").category).toBe("internal");
  });

  it("toResponse deve expor código, categoria e detalhes", () => {
    const response = createConfigInvalidError("target", "não finito").toResponse();

    expect(response.success).toBe(false);
    expect(response.error).toMatchObject({
      code: "LAB_CONFIG_INVALID",
      category: "configuration",
      message: "Configuração inválida: target - não finito",
      details: { field: "target", reason: "não finito" },
    });
  });

  it("isLabError deve filtrar por código", () => {
    const error = createMatrixNotPsdError(-2);

    expect(isLabError(error)).toBe(true);
    expect(isLabError(error, LAB_ERROR_CODES.MATRIX_NOT_PSD)).toBe(true);
    expect(isLabError(error, LAB_ERROR_CODES.CONFIG_INVALID)).toBe(false);
    expect(isLabError(new Error("comum"))).toBe(false);
  });

  it("sanitizeNumber deve substituir NaN e Infinity", () => {
    expect(sanitizeNumber(Number.NaN, 100)).toBe(100);
    expect(sanitizeNumber(Number.POSITIVE_INFINITY)).toBe(0);
    expect(sanitizeNumber("3")).toBe(0);
    expect(sanitizeNumber(BigInt(4))).toBe(4);
    expect(sanitizeNumber(0.25)).toBe(0.25);
  });
});

describe("LabLogger - Níveis", () => {
  it("deve respeitar o nível mínimo", () => {
    const logger = new LabLogger({ level: "warn" });

    expect(logger.isEnabled("debug")).toBe(false);
    expect(logger.isEnabled("info")).toBe(false);
    expect(logger.isEnabled("warn")).toBe(true);
    expect(logger.isEnabled("error")).toBe(true);
  });

  it("setGlobalLogLevel deve valer para todos os loggers do módulo", () => {
    setGlobalLogLevel("debug");
    expect(gridLogger.isEnabled("debug")).toBe(true);
    expect(evolutionLogger.isEnabled("debug")).toBe(true);

    setGlobalLogLevel("error");
    expect(gridLogger.isEnabled("warn")).toBe(false);
    expect(evolutionLogger.isEnabled("error")).toBe(true);
  });
});
