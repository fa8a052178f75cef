/**
 * Overlap Types - Tipos do Motor de Taxa de Sobreposição (OLR)
 *
 * @version 1.0.0
 */

import { z } from "zod";
import { overlapPathSchema } from "../../config/lab.config";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Divisões do segmento entre as duas médias */
export const OLR_SEGMENT_DIVISIONS = 1000;

/** Passos tomados antes da primeira média */
export const OLR_LEADING_STEPS = 10;

/** Pontos avaliados por par (10 antes + 1001 no segmento + 20 depois) */
export const OLR_PROFILE_POINTS = 1031;

// ============================================================================
// MIXTURE
// ============================================================================

/**
 * Parâmetros de uma mistura gaussiana com n componentes em d dimensões
 */
export interface MixtureParameters {
  weights: number[];
  /** n vetores de tamanho d */
  means: number[][];
  /** n matrizes d×d */
  covariances: number[][][];
}

export const mixtureParametersSchema = z.object({
  weights: z.array(z.number()),
  means: z.array(z.array(z.number())),
  covariances: z.array(z.array(z.array(z.number()))),
});

/**
 * Layout de combinação de grade: [pesos, médias, covariâncias]
 */
export const mixtureTupleSchema = z.tuple([
  z.array(z.number()),
  z.array(z.array(z.number())),
  z.array(z.array(z.array(z.number()))),
]);

// ============================================================================
// ENGINE OPTIONS
// ============================================================================

export type OverlapPath = z.infer<typeof overlapPathSchema>;

export const overlapEngineOptionsSchema = z.object({
  path: overlapPathSchema.default("auto"),
});

export type OverlapEngineOptions = z.input<typeof overlapEngineOptionsSchema>;

/**
 * Extremos estritos de um perfil de densidade
 */
export interface ProfileExtrema {
  peaks: number[];
  saddles: number[];
}
