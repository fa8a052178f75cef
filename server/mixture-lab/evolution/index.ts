/**
 * Evolution Module - Grafo de parâmetros, operadores e objetivo
 *
 * @version 1.0.0
 */

export * from "./types/evolution.types";

export {
  cloneNode,
  createGeneratorModel,
  extractIndexFromNodeName,
  GeneratorModel,
  generatorNodeName,
  readField,
  writeField,
} from "./GeneratorModel";

export {
  AverageWeightsInitializer,
  ConstantCovariancesInitializer,
  ConstantMeansInitializer,
  DataMeansInitializer,
  DirichletWeightsInitializer,
  RandomCovariancesInitializer,
  RandomMeansInitializer,
  RandomWeightsInitializer,
  type CovariancesInitializer,
  type GmmParametersInitializer,
  type MeansInitializer,
  type WeightsInitializer,
} from "./ParameterInitializers";

export { ProbabilisticGraphShuffler, type GraphShuffler } from "./GraphShuffler";

export {
  applyBounds,
  ByNameNodeSelector,
  ClampNodeMutator,
  DirichletSumToOneNodeMutator,
  Mutation,
  mutation,
  RandomDeltaNodeMutator,
  RandomIndexRandomDeltaNodeMutator,
  RandomNodeSelector,
  RandomSumToOneNodeMutator,
  RandomValueNodeMutator,
  type NodeMutator,
  type NodeSelector,
} from "./NodeMutators";

export { exchangeField, exchangeFieldAtIndex, type Crossover } from "./Crossovers";

export { EvolutionaryConfiguration, type OptimizerParameters } from "./EvolutionaryConfiguration";

export {
  createOverlapObjective,
  INFINITELY_LARGE_OLR,
  overlapObjectiveScore,
  scoreMixtures,
  type GraphObjective,
  type MixtureEstimator,
} from "./OverlapObjective";

export {
  GmmOptimizer,
  type EvolutionaryDriver,
  type OptimisationRequest,
} from "./GmmOptimizer";
