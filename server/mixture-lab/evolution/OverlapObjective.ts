/**
 * OverlapObjective - Função objetivo do otimizador evolutivo
 *
 * Para um grafo candidato, o estimador (externo) devolve a mistura que o
 * grafo gera; o objetivo é o erro quadrático entre o OLR médio dessa
 * mistura e o OLR alvo.
 *
 * @version 1.0.0
 */

import { z } from "zod";
import { pairwiseOverlapRates } from "../overlap/OverlapRateEngine";
import type { MixtureParameters, OverlapEngineOptions } from "../overlap/types/overlap.types";
import { createConfigInvalidError, isLabError, sanitizeNumber } from "../utils/LabErrors";
import { evolutionLogger } from "../utils/LabLogger";
import { mean, symmetrizeFromLower } from "../utils/MathUtils";
import type { GeneratorModel } from "./GeneratorModel";

/** OLR usado como penalidade quando a avaliação falha */
export const INFINITELY_LARGE_OLR = 100;

const targetOlrSchema = z.number().min(0, "OLR alvo mínimo é 0").max(1, "OLR alvo máximo é 1");

/**
 * Ajusta o modelo definido pelo grafo, amostra dele e estima a mistura
 * resultante
 */
export interface MixtureEstimator {
  estimate(graph: GeneratorModel): MixtureParameters;
}

export type GraphObjective = (graph: GeneratorModel) => number;

/**
 * Erro quadrático entre o OLR médio e o alvo. Sem pares: penalidade.
 */
export function overlapObjectiveScore(rates: readonly number[], targetOlr: number): number {
  if (rates.length === 0) return INFINITELY_LARGE_OLR;
  return (mean(rates) - targetOlr) ** 2;
}

/**
 * OLRs dos pares de cada mistura, com covariâncias simetrizadas a partir
 * do triângulo inferior. Falha numérica vira [INFINITELY_LARGE_OLR].
 */
export function scoreMixtures(mixtures: readonly MixtureParameters[], options: OverlapEngineOptions = {}): number[] {
  const rates: number[] = [];

  for (const mixture of mixtures) {
    const symmetric: MixtureParameters = {
      weights: mixture.weights,
      means: mixture.means,
      covariances: symmetrizeFromLower(mixture.covariances),
    };

    try {
      rates.push(...pairwiseOverlapRates(symmetric, options).map(rate => sanitizeNumber(rate, INFINITELY_LARGE_OLR)));
    } catch (error) {
      if (isLabError(error) && error.category === "numerical") {
        evolutionLogger.error("Falha no cálculo do OLR, aplicando penalidade", error, "objective");
        rates.push(INFINITELY_LARGE_OLR);
      } else {
        throw error;
      }
    }
  }

  return rates;
}

export function createOverlapObjective(
  targetOlr: number,
  estimator: MixtureEstimator,
  options: OverlapEngineOptions = {}
): GraphObjective {
  const parsed = targetOlrSchema.safeParse(targetOlr);
  if (!parsed.success) {
    throw createConfigInvalidError("targetOlr", parsed.error.errors[0]?.message ?? "inválido");
  }

  return (graph) => overlapObjectiveScore(scoreMixtures([estimator.estimate(graph)], options), parsed.data);
}
