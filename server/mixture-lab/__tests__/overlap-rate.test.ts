/**
 * Teste Unitário - Motor de OLR
 *
 * Valores esperados em 1-D com pesos iguais e variância 1: o vale fica no
 * ponto médio, então OLR = 2·exp(-d²/8) para médias a distância d.
 *
 * @version 1.0.0
 */

import { describe, it, expect } from "vitest";
import {
  classifyProfile,
  computeOverlapRate,
  overlapRateFromFlat,
  pairwiseOverlapRates,
  parametersFromFlat,
  scoreProfile,
  selectOverlapPath,
} from "../overlap/OverlapRateEngine";
import type { MixtureParameters } from "../overlap/types/overlap.types";
import { LAB_ERROR_CODES } from "../utils/LabErrors";

function oneDimensional(means: number[], variance: number = 1): MixtureParameters {
  return {
    weights: means.map(() => 1 / means.length),
    means: means.map(m => [m]),
    covariances: means.map(() => [[variance]]),
  };
}

const TWO_DIMENSIONAL: MixtureParameters = {
  weights: [0.3, 0.7],
  means: [[0, 0], [3, 1]],
  covariances: [
    [[1, 0.2], [0.2, 1]],
    [[2, 0], [0, 0.5]],
  ],
};

// ============================================================================
// TESTS
// ============================================================================

describe("OverlapRateEngine - Taxa de sobreposição", () => {
  describe("Análise de perfil", () => {
    it("deve classificar picos e vales estritos", () => {
      expect(classifyProfile([0, 1, 0, 1, 0])).toEqual({ peaks: [1, 1], saddles: [0] });
    });

    it("deve ignorar platôs", () => {
      expect(classifyProfile([0, 1, 1, 0])).toEqual({ peaks: [], saddles: [] });
    });

    it("OLR deve ser primeiro vale / menor pico sobre log-densidades", () => {
      expect(scoreProfile([-5, Math.log(2), 0, Math.log(3), -5])).toBeCloseTo(0.5, 14);
    });

    it("um único pico deve valer 1", () => {
      expect(scoreProfile([0, 1, 2, 1, 0])).toBe(1);
    });

    it("perfil plano deve valer 1", () => {
      expect(scoreProfile([-3, -3, -3, -3])).toBe(1);
    });
  });

  describe("Pares", () => {
    it("componentes separados devem ter OLR próximo de zero", () => {
      const [rate] = pairwiseOverlapRates(oneDimensional([0, 10]));

      expect(rate).toBeCloseTo(2 * Math.exp(-12.5), 12);
    });

    it("componentes fundidos (um pico) devem ter OLR 1", () => {
      expect(pairwiseOverlapRates(oneDimensional([0, 1]))).toEqual([1]);
    });

    it("médias idênticas devem ter OLR 1", () => {
      expect(pairwiseOverlapRates(oneDimensional([2, 2]))).toEqual([1]);
    });

    it("par muito afastado (densidade nula entre os picos) deve ter OLR próximo de zero", () => {
      const params = oneDimensional([0, 100], 0.01);

      for (const path of ["fast", "fallback"] as const) {
        const [rate] = pairwiseOverlapRates(params, { path });
        expect(rate).toBeGreaterThanOrEqual(0);
        expect(rate).toBeLessThan(1e-12);
      }
    });

    it.each([80, 100, 200])("OLR deve continuar perto de zero com médias a distância %d", (distance) => {
      for (const path of ["fast", "fallback"] as const) {
        const [rate] = pairwiseOverlapRates(oneDimensional([0, distance]), { path });
        expect(rate).toBeLessThan(1e-12);
      }
    });

    it("OLR de par afastado deve seguir 2·exp(-d²/8) sem arredondar para 1", () => {
      const [rate] = pairwiseOverlapRates(oneDimensional([0, 40]), { path: "fast" });

      expect(rate / (2 * Math.exp(-200))).toBeCloseTo(1, 6);
    });

    it("deve listar os pares na ordem (0,1), (0,2), (1,2)", () => {
      const rates = pairwiseOverlapRates(oneDimensional([0, 10, 1]));

      expect(rates).toHaveLength(3);
      expect(rates[0]).toBeCloseTo(2 * Math.exp(-12.5), 12);
      expect(rates[1]).toBe(1);
      expect(rates[2]).toBeCloseTo(2 * Math.exp(-10.125), 12);
    });

    it("trocar a ordem dos componentes não deve mudar o OLR", () => {
      const swapped: MixtureParameters = {
        weights: [...TWO_DIMENSIONAL.weights].reverse(),
        means: [...TWO_DIMENSIONAL.means].reverse(),
        covariances: [...TWO_DIMENSIONAL.covariances].reverse(),
      };

      expect(computeOverlapRate(swapped)).toBeCloseTo(computeOverlapRate(TWO_DIMENSIONAL), 6);
    });
  });

  describe("Mistura", () => {
    it("deve ser a média dos pares", () => {
      const params = oneDimensional([0, 10, 1]);
      const rates = pairwiseOverlapRates(params);
      const expected = (rates[0] + rates[1] + rates[2]) / 3;

      expect(computeOverlapRate(params)).toBeCloseTo(expected, 15);
    });

    it("deve exigir ao menos dois componentes", () => {
      expect(pairwiseOverlapRates(oneDimensional([3]))).toEqual([]);
      expect(() => computeOverlapRate(oneDimensional([3]))).toThrow(
        expect.objectContaining({ code: LAB_ERROR_CODES.CONFIG_INVALID })
      );
    });

    it("resultado deve ficar em [0, 1]", () => {
      const rate = computeOverlapRate(TWO_DIMENSIONAL);

      expect(rate).toBeGreaterThanOrEqual(0);
      expect(rate).toBeLessThanOrEqual(1);
    });
  });

  describe("Caminhos de cálculo", () => {
    it("auto deve escolher o caminho rápido para covariâncias definidas positivas", () => {
      expect(selectOverlapPath(TWO_DIMENSIONAL.covariances, "auto")).toBe("fast");
      expect(selectOverlapPath([[[1, 1], [1, 1]]], "auto")).toBe("fallback");
    });

    it("caminhos rápido e fallback devem concordar", () => {
      const fast = computeOverlapRate(TWO_DIMENSIONAL, { path: "fast" });
      const fallback = computeOverlapRate(TWO_DIMENSIONAL, { path: "fallback" });

      expect(fast).toBeCloseTo(fallback, 6);
    });

    it("deve aceitar covariância singular pelo fallback", () => {
      const params: MixtureParameters = {
        weights: [0.5, 0.5],
        means: [[0, 0], [10, 10]],
        covariances: [
          [[1, 1], [1, 1]],
          [[1, 1], [1, 1]],
        ],
      };

      expect(computeOverlapRate(params)).toBeCloseTo(2 * Math.exp(-12.5), 10);
    });

    it("forçar caminho rápido com matriz singular deve falhar", () => {
      const params = oneDimensional([0, 10], 0);

      expect(() => computeOverlapRate(params, { path: "fast" })).toThrow(
        expect.objectContaining({ code: LAB_ERROR_CODES.NOT_POSITIVE_DEFINITE })
      );
    });

    it("variância negativa deve falhar como matriz não PSD", () => {
      const params: MixtureParameters = {
        weights: [0.5, 0.5],
        means: [[0], [10]],
        covariances: [[[-1]], [[1]]],
      };

      expect(() => computeOverlapRate(params)).toThrow(
        expect.objectContaining({ code: LAB_ERROR_CODES.MATRIX_NOT_PSD })
      );
    });
  });

  describe("Validação", () => {
    it("deve rejeitar dimensões incompatíveis", () => {
      const params: MixtureParameters = {
        weights: [0.5, 0.5],
        means: [[0], [1, 2]],
        covariances: [[[1]], [[1]]],
      };

      expect(() => computeOverlapRate(params)).toThrow(
        expect.objectContaining({ code: LAB_ERROR_CODES.DIMENSION_MISMATCH })
      );
    });

    it("deve rejeitar número diferente de pesos e médias", () => {
      const params: MixtureParameters = {
        weights: [1],
        means: [[0], [1]],
        covariances: [[[1]], [[1]]],
      };

      expect(() => computeOverlapRate(params)).toThrow(
        expect.objectContaining({ code: LAB_ERROR_CODES.DIMENSION_MISMATCH })
      );
    });

    it("deve rejeitar covariância não simétrica", () => {
      const params: MixtureParameters = {
        weights: [0.5, 0.5],
        means: [[0, 0], [1, 1]],
        covariances: [
          [[1, 0.5], [0.1, 1]],
          [[1, 0], [0, 1]],
        ],
      };

      expect(() => computeOverlapRate(params)).toThrow(
        expect.objectContaining({ code: LAB_ERROR_CODES.CONFIG_INVALID })
      );
    });
  });

  describe("Vetor plano", () => {
    it("deve ler pesos, médias e covariâncias em sequência", () => {
      expect(parametersFromFlat(2, 2, [0.4, 0.6, 1, 2, 3, 4, 1, 0, 0, 1, 2, 0, 0, 2])).toEqual({
        weights: [0.4, 0.6],
        means: [[1, 2], [3, 4]],
        covariances: [
          [[1, 0], [0, 1]],
          [[2, 0], [0, 2]],
        ],
      });
    });

    it("deve rejeitar vetor curto", () => {
      expect(() => parametersFromFlat(2, 1, [0.5, 0.5, 0, 10, 1])).toThrow(
        expect.objectContaining({ code: LAB_ERROR_CODES.CONFIG_INVALID })
      );
    });

    it("overlapRateFromFlat deve calcular o OLR da mistura lida", () => {
      expect(overlapRateFromFlat(2, 1, [0.5, 0.5, 0, 10, 1, 1])).toBeCloseTo(2 * Math.exp(-12.5), 12);
    });
  });
});
