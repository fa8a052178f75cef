/**
 * EvolutionaryConfiguration - Builder dos parâmetros do otimizador evolutivo
 *
 * @version 1.0.0
 */

import { createConfigInvalidError } from "../utils/LabErrors";
import type { Crossover } from "./Crossovers";
import type { Mutation } from "./NodeMutators";
import {
  evolutionaryConfigurationSchema,
  GENETIC_SCHEME,
  SELECTION_TYPE,
  type EvolutionarySettings,
} from "./types/evolution.types";

export interface OptimizerParameters extends EvolutionarySettings {
  geneticScheme: typeof GENETIC_SCHEME;
  selectionTypes: Array<typeof SELECTION_TYPE>;
  mutationTypes: Mutation[];
  crossoverTypes: Crossover[];
}

export class EvolutionaryConfiguration {
  private populationSize = 10;
  private maxPopulationSize = 55;
  private crossoverProbability = 0.8;
  private mutationProbability = 0.9;
  private mutationTypes: Mutation[] = [];
  private crossoverTypes: Crossover[] = [];

  setPopulationSize(populationSize: number): this {
    this.populationSize = populationSize;
    return this;
  }

  setMaxPopulationSize(maxPopulationSize: number): this {
    this.maxPopulationSize = maxPopulationSize;
    return this;
  }

  setCrossoverProbability(probability: number): this {
    if (probability < 0) {
      throw createConfigInvalidError("crossoverProbability", "deve ser maior ou igual a zero");
    }
    this.crossoverProbability = probability;
    return this;
  }

  setMutationProbability(probability: number): this {
    if (probability < 0) {
      throw createConfigInvalidError("mutationProbability", "deve ser maior ou igual a zero");
    }
    this.mutationProbability = probability;
    return this;
  }

  setMutationTypes(mutationTypes: Mutation[]): this {
    this.mutationTypes = [...mutationTypes];
    return this;
  }

  appendMutationType(mutationType: Mutation): this {
    this.mutationTypes.push(mutationType);
    return this;
  }

  setCrossoverTypes(crossoverTypes: Crossover[]): this {
    this.crossoverTypes = [...crossoverTypes];
    return this;
  }

  appendCrossoverType(crossoverType: Crossover): this {
    this.crossoverTypes.push(crossoverType);
    return this;
  }

  /**
   * Valida o conjunto e monta os parâmetros (esquema steady-state,
   * seleção por torneio)
   */
  createOptimizerParameters(): OptimizerParameters {
    const parsed = evolutionaryConfigurationSchema.safeParse({
      populationSize: this.populationSize,
      maxPopulationSize: this.maxPopulationSize,
      crossoverProbability: this.crossoverProbability,
      mutationProbability: this.mutationProbability,
    });

    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw createConfigInvalidError(issue?.path.join(".") ?? "evolution", issue?.message ?? "configuração inválida");
    }

    return {
      ...parsed.data,
      geneticScheme: GENETIC_SCHEME,
      selectionTypes: [SELECTION_TYPE],
      mutationTypes: [...this.mutationTypes],
      crossoverTypes: [...this.crossoverTypes],
    };
  }
}
