/**
 * Overlap Module - Taxa de sobreposição de misturas gaussianas
 *
 * @version 1.0.0
 */

export * from "./types/overlap.types";

export {
  CholeskyNormalDensity,
  GeneralizedNormalDensity,
  isSymmetric,
  isSymmetricPositiveDefinite,
  weightedNormalDensity,
  type NormalDensity,
} from "./MultivariateNormal";

export {
  classifyProfile,
  computeOverlapRate,
  overlapRateFromFlat,
  pairwiseOverlapRates,
  parametersFromFlat,
  scoreProfile,
  selectOverlapPath,
  validateMixture,
} from "./OverlapRateEngine";
