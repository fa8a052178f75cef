/**
 * ParameterInitializers - Valores iniciais dos nós do grafo
 *
 * Cada nó recebe pesos, médias e covariâncias de uma mistura 1-D; os
 * inicializadores recebem o nome do nó para permitir valores por variável.
 *
 * @version 1.0.0
 */

import { createConfigInvalidError, createDimensionMismatchError } from "../utils/LabErrors";
import type { SeededRNG } from "../utils/SeededRNG";
import { extractIndexFromNodeName } from "./GeneratorModel";

// ============================================================================
// INTERFACES
// ============================================================================

export interface WeightsInitializer {
  createInitialWeights(nodeName: string, nComp: number): number[];
}

export interface MeansInitializer {
  createInitialMeans(nodeName: string, nComp: number): number[][];
}

export interface CovariancesInitializer {
  createInitialCovariances(nodeName: string, nComp: number): number[][][];
}

export interface GmmParametersInitializer {
  weights: WeightsInitializer;
  means: MeansInitializer;
  covariances: CovariancesInitializer;
}

function checkInterval(min: number, max: number): void {
  if (min > max) {
    throw createConfigInvalidError("min", `min (${min}) deve ser menor ou igual a max (${max})`);
  }
}

// ============================================================================
// WEIGHTS
// ============================================================================

export class AverageWeightsInitializer implements WeightsInitializer {
  createInitialWeights(_nodeName: string, nComp: number): number[] {
    return Array.from({ length: nComp }, () => 1 / nComp);
  }
}

export class RandomWeightsInitializer implements WeightsInitializer {
  constructor(private readonly rng: SeededRNG) {}

  createInitialWeights(_nodeName: string, nComp: number): number[] {
    const values = Array.from({ length: nComp }, () => this.rng.random());
    const total = values.reduce((sum, v) => sum + v, 0);
    return values.map(v => v / total);
  }
}

export class DirichletWeightsInitializer implements WeightsInitializer {
  constructor(private readonly rng: SeededRNG, private readonly multiplier: number = 1) {
    if (!(multiplier > 0)) {
      throw createConfigInvalidError("multiplier", "deve ser positivo");
    }
  }

  createInitialWeights(_nodeName: string, nComp: number): number[] {
    return this.rng.randomDirichlet(Array.from({ length: nComp }, () => this.multiplier));
  }
}

// ============================================================================
// MEANS
// ============================================================================

/** Médias inteiras uniformes em [min, max] */
export class RandomMeansInitializer implements MeansInitializer {
  constructor(private readonly min: number, private readonly max: number, private readonly rng: SeededRNG) {
    checkInterval(min, max);
  }

  createInitialMeans(_nodeName: string, nComp: number): number[][] {
    return Array.from({ length: nComp }, () => [this.rng.randomInt(this.min, this.max)]);
  }
}

export class ConstantMeansInitializer implements MeansInitializer {
  constructor(private readonly means: Readonly<Record<string, number[][]>>) {}

  createInitialMeans(nodeName: string): number[][] {
    const means = this.means[nodeName];
    if (!means) {
      throw createConfigInvalidError("means", `sem médias para o nó "${nodeName}"`);
    }
    return means.map(m => [...m]);
  }
}

/**
 * Médias extraídas de dados: o nó Comp_k recebe a coordenada k de cada
 * média estimada
 */
export class DataMeansInitializer implements MeansInitializer {
  constructor(private readonly dataMeans: readonly (readonly number[])[]) {}

  createInitialMeans(nodeName: string, nComp: number): number[][] {
    if (this.dataMeans.length < nComp) {
      throw createDimensionMismatchError("dataMeans", nComp, this.dataMeans.length);
    }

    const index = extractIndexFromNodeName(nodeName);

    return this.dataMeans.slice(0, nComp).map(mean => {
      if (index >= mean.length) {
        throw createDimensionMismatchError("dataMeans dimension", index + 1, mean.length);
      }
      return [mean[index]];
    });
  }
}

// ============================================================================
// COVARIANCES
// ============================================================================

/** Variâncias inteiras uniformes em [min, max], uma matriz 1×1 por componente */
export class RandomCovariancesInitializer implements CovariancesInitializer {
  constructor(private readonly min: number, private readonly max: number, private readonly rng: SeededRNG) {
    checkInterval(min, max);
  }

  createInitialCovariances(_nodeName: string, nComp: number): number[][][] {
    return Array.from({ length: nComp }, () => [[this.rng.randomInt(this.min, this.max)]]);
  }
}

export class ConstantCovariancesInitializer implements CovariancesInitializer {
  constructor(private readonly covariances: Readonly<Record<string, number[][][]>>) {}

  createInitialCovariances(nodeName: string): number[][][] {
    const covariances = this.covariances[nodeName];
    if (!covariances) {
      throw createConfigInvalidError("covariances", `sem covariâncias para o nó "${nodeName}"`);
    }
    return covariances.map(c => c.map(row => [...row]));
  }
}
