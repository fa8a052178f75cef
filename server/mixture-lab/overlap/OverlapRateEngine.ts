/**
 * OverlapRateEngine - Taxa de sobreposição (OLR) de misturas gaussianas
 *
 * Para cada par de componentes (i, j), a log-densidade da mistura de dois
 * componentes (pesos renormalizados) é avaliada em 1031 pontos sobre a reta
 * que liga as médias, começando 10 passos antes de m[i]. O perfil resultante
 * é classificado em picos e vales estritos:
 *
 * - exatamente um pico: OLR = 1 (componentes fundidos)
 * - sem pico ou sem vale: OLR = 1 (perfil plano ou degenerado)
 * - caso geral: primeiro vale / menor pico
 *
 * O perfil fica no domínio log para que pares muito afastados mantenham um
 * vale estrito; a razão final é exp(vale - pico) e tende a 0.
 *
 * O OLR da mistura é a média dos OLRs dos pares.
 *
 * @version 1.0.0
 */

import { getLabConfig } from "../config/lab.config";
import {
  createConfigInvalidError,
  createDimensionMismatchError,
} from "../utils/LabErrors";
import { overlapLogger } from "../utils/LabLogger";
import { logAddExp, mean } from "../utils/MathUtils";
import {
  CholeskyNormalDensity,
  GeneralizedNormalDensity,
  isSymmetric,
  isSymmetricPositiveDefinite,
  type NormalDensity,
} from "./MultivariateNormal";
import {
  mixtureParametersSchema,
  OLR_LEADING_STEPS,
  OLR_PROFILE_POINTS,
  OLR_SEGMENT_DIVISIONS,
  overlapEngineOptionsSchema,
  type MixtureParameters,
  type OverlapEngineOptions,
  type OverlapPath,
  type ProfileExtrema,
} from "./types/overlap.types";

type ResolvedPath = Exclude<OverlapPath, "auto">;

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Valida formas e simetria; lança erro de configuração ou numérico
 */
export function validateMixture(params: MixtureParameters): void {
  const parsed = mixtureParametersSchema.safeParse(params);
  if (!parsed.success) {
    throw createConfigInvalidError("mixture", parsed.error.errors.map(e => e.message).join("; "));
  }

  const n = params.weights.length;
  if (params.means.length !== n) {
    throw createDimensionMismatchError("means", n, params.means.length);
  }
  if (params.covariances.length !== n) {
    throw createDimensionMismatchError("covariances", n, params.covariances.length);
  }
  if (params.weights.some(w => !Number.isFinite(w) || w < 0)) {
    throw createConfigInvalidError("weights", "pesos devem ser finitos e não negativos");
  }
  if (n === 0) return;

  const d = params.means[0].length;
  params.means.forEach((m, i) => {
    if (m.length !== d) throw createDimensionMismatchError(`means[${i}]`, d, m.length);
    if (m.some(v => !Number.isFinite(v))) {
      throw createConfigInvalidError(`means[${i}]`, "valores devem ser finitos");
    }
  });
  params.covariances.forEach((cov, i) => {
    if (cov.length !== d) throw createDimensionMismatchError(`covariances[${i}]`, d, cov.length);
    cov.forEach(row => {
      if (row.length !== d) throw createDimensionMismatchError(`covariances[${i}]`, d, row.length);
    });
    if (!isSymmetric(cov)) {
      throw createConfigInvalidError(`covariances[${i}]`, "matriz de covariância não é simétrica");
    }
  });
}

/**
 * Decide o caminho de cálculo: rápido somente quando todas as
 * covariâncias são definidas positivas
 */
export function selectOverlapPath(covariances: readonly number[][][], requested: OverlapPath): ResolvedPath {
  if (requested !== "auto") return requested;
  return covariances.every(isSymmetricPositiveDefinite) ? "fast" : "fallback";
}

// ============================================================================
// PROFILE ANALYSIS
// ============================================================================

/**
 * Picos (maior que ambos os vizinhos) e vales (menor que ambos) estritos,
 * para k = 1..length-2
 */
export function classifyProfile(profile: ArrayLike<number>): ProfileExtrema {
  const peaks: number[] = [];
  const saddles: number[] = [];

  for (let k = 1; k < profile.length - 1; k++) {
    const prev = profile[k - 1];
    const curr = profile[k];
    const next = profile[k + 1];

    if (curr > prev && curr > next) peaks.push(curr);
    else if (curr < prev && curr < next) saddles.push(curr);
  }

  return { peaks, saddles };
}

/**
 * OLR de um perfil em log-densidade: exp(primeiro vale - menor pico)
 */
export function scoreProfile(logProfile: ArrayLike<number>): number {
  const { peaks, saddles } = classifyProfile(logProfile);

  if (peaks.length === 1) return 1;
  if (peaks.length === 0 || saddles.length === 0) {
    overlapLogger.throttled(
      "degenerate-pair",
      "debug",
      `Par degenerado (picos=${peaks.length}, vales=${saddles.length}), OLR = 1`
    );
    return 1;
  }

  return Math.exp(saddles[0] - Math.min(...peaks));
}

// ============================================================================
// PAIR PROFILES
// ============================================================================

interface PairGeometry {
  origin: number[];
  delta: number[];
  logW1: number;
  logW2: number;
}

function pairGeometry(params: MixtureParameters, i: number, j: number): PairGeometry {
  const mi = params.means[i];
  const mj = params.means[j];
  const delta = mi.map((v, c) => (mj[c] - v) / OLR_SEGMENT_DIVISIONS);
  const origin = mi.map((v, c) => v - OLR_LEADING_STEPS * delta[c]);

  const w1 = params.weights[i] / (params.weights[i] + params.weights[j]);
  return { origin, delta, logW1: Math.log(w1), logW2: Math.log(1 - w1) };
}

/**
 * Perfil ponto a ponto: pontos construídos por acumulação sucessiva de delta
 */
function pointwiseProfile(geometry: PairGeometry, first: NormalDensity, second: NormalDensity): number[] {
  const profile: number[] = [];
  let point = geometry.origin;

  for (let k = 0; k < OLR_PROFILE_POINTS; k++) {
    profile.push(logAddExp(
      geometry.logW1 + first.logDensity(point),
      geometry.logW2 + second.logDensity(point)
    ));
    const current = point;
    point = current.map((v, c) => v + geometry.delta[c]);
  }

  return profile;
}

function batchProfile(geometry: PairGeometry, first: CholeskyNormalDensity, second: CholeskyNormalDensity): Float64Array {
  const a = first.logDensityAlongLine(geometry.origin, geometry.delta, OLR_PROFILE_POINTS);
  const b = second.logDensityAlongLine(geometry.origin, geometry.delta, OLR_PROFILE_POINTS);

  const profile = new Float64Array(OLR_PROFILE_POINTS);
  for (let k = 0; k < OLR_PROFILE_POINTS; k++) {
    profile[k] = logAddExp(geometry.logW1 + a[k], geometry.logW2 + b[k]);
  }
  return profile;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * OLR de cada par (i < j), na ordem (0,1), (0,2), ..., (1,2), ...
 */
export function pairwiseOverlapRates(params: MixtureParameters, options: OverlapEngineOptions = {}): number[] {
  const { path: requested } = overlapEngineOptionsSchema.parse({
    path: options.path ?? getLabConfig().overlapPath,
  });
  validateMixture(params);

  const n = params.weights.length;
  if (n < 2) return [];

  const path = selectOverlapPath(params.covariances, requested);
  overlapLogger.debug(`OLR de ${n} componentes via caminho ${path}`, "pairwise");

  const rates: number[] = [];

  if (path === "fast") {
    const densities = params.means.map((m, i) => new CholeskyNormalDensity(m, params.covariances[i], i));
    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        rates.push(scoreProfile(batchProfile(pairGeometry(params, i, j), densities[i], densities[j])));
      }
    }
    return rates;
  }

  const densities = params.means.map((m, i) => new GeneralizedNormalDensity(m, params.covariances[i]));
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      rates.push(scoreProfile(pointwiseProfile(pairGeometry(params, i, j), densities[i], densities[j])));
    }
  }
  return rates;
}

/**
 * OLR da mistura: média dos OLRs dos pares. Exige ao menos dois componentes.
 */
export function computeOverlapRate(params: MixtureParameters, options: OverlapEngineOptions = {}): number {
  const rates = pairwiseOverlapRates(params, options);
  if (rates.length === 0) {
    throw createConfigInvalidError("weights", "OLR exige pelo menos dois componentes");
  }
  return mean(rates);
}

/**
 * Lê um vetor plano como mistura: pesos, médias (linha a linha),
 * covariâncias (matriz a matriz, linha a linha)
 */
export function parametersFromFlat(components: number, dims: number, data: readonly number[]): MixtureParameters {
  if (!Number.isInteger(components) || components < 1) {
    throw createConfigInvalidError("components", "deve ser inteiro positivo");
  }
  if (!Number.isInteger(dims) || dims < 1) {
    throw createConfigInvalidError("dims", "deve ser inteiro positivo");
  }

  const meansStart = components;
  const covsStart = meansStart + components * dims;
  const required = covsStart + components * dims * dims;

  if (data.length < required) {
    throw createConfigInvalidError("data", `vetor plano precisa de ${required} valores, recebeu ${data.length}`);
  }

  const weights = data.slice(0, components);
  const means = Array.from({ length: components }, (_, i) =>
    data.slice(meansStart + i * dims, meansStart + (i + 1) * dims)
  );
  const covariances = Array.from({ length: components }, (_, i) =>
    Array.from({ length: dims }, (_, r) => {
      const rowStart = covsStart + i * dims * dims + r * dims;
      return data.slice(rowStart, rowStart + dims);
    })
  );

  return { weights, means, covariances };
}

export function overlapRateFromFlat(
  components: number,
  dims: number,
  data: readonly number[],
  options: OverlapEngineOptions = {}
): number {
  return computeOverlapRate(parametersFromFlat(components, dims, data), options);
}
