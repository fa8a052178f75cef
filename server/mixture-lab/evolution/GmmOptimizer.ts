/**
 * GmmOptimizer - Busca evolutiva de geradores com OLR alvo
 *
 * Monta o grafo inicial, sorteia sua estrutura e entrega grafo, objetivo,
 * parâmetros e requisitos ao driver evolutivo injetado.
 *
 * @version 1.0.0
 */

import { createConfigInvalidError } from "../utils/LabErrors";
import { evolutionLogger } from "../utils/LabLogger";
import type { EvolutionaryConfiguration, OptimizerParameters } from "./EvolutionaryConfiguration";
import { createGeneratorModel, type GeneratorModel } from "./GeneratorModel";
import type { GraphShuffler } from "./GraphShuffler";
import { createOverlapObjective, type GraphObjective, type MixtureEstimator } from "./OverlapObjective";
import type { GmmParametersInitializer } from "./ParameterInitializers";
import {
  DEFAULT_OPTIMIZER_REQUIREMENTS,
  optimizerRequirementsSchema,
  type OptimizerRequirements,
} from "./types/evolution.types";

export interface OptimisationRequest {
  initialGraphs: GeneratorModel[];
  objective: GraphObjective;
  parameters: OptimizerParameters;
  requirements: OptimizerRequirements;
}

/**
 * Motor evolutivo externo (seleção, reposição, paralelismo)
 */
export interface EvolutionaryDriver {
  optimise(request: OptimisationRequest): Promise<GeneratorModel[]>;
}

export class GmmOptimizer {
  private readonly requirements: OptimizerRequirements;

  constructor(
    private readonly evolConfig: EvolutionaryConfiguration,
    private readonly shuffler: GraphShuffler,
    private readonly initializer: GmmParametersInitializer,
    private readonly estimator: MixtureEstimator,
    private readonly driver: EvolutionaryDriver,
    requirements: Partial<OptimizerRequirements> = {}
  ) {
    const parsed = optimizerRequirementsSchema.safeParse({ ...DEFAULT_OPTIMIZER_REQUIREMENTS, ...requirements });
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw createConfigInvalidError(issue?.path.join(".") ?? "requirements", issue?.message ?? "inválido");
    }
    this.requirements = parsed.data;
  }

  getRequirements(): OptimizerRequirements {
    return { ...this.requirements };
  }

  async optimize(nDim: number, nComp: number, targetOlr: number): Promise<GeneratorModel[]> {
    evolutionLogger.startOperation("Otimização GMM", { nDim, nComp, targetOlr });

    try {
      const graph = this.shuffler.shuffle(createGeneratorModel(nDim, nComp, this.initializer));
      evolutionLogger.info(`Grafo inicial com ${graph.edges().length} arestas`, "optimize");

      const result = await this.driver.optimise({
        initialGraphs: [graph],
        objective: createOverlapObjective(targetOlr, this.estimator),
        parameters: this.evolConfig.createOptimizerParameters(),
        requirements: this.getRequirements(),
      });

      evolutionLogger.endOperation("Otimização GMM", true, { graphs: result.length });
      return result;
    } catch (error) {
      evolutionLogger.endOperation("Otimização GMM", false, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
