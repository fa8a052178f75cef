/**
 * GraphShuffler - Estrutura aleatória (DAG) para o grafo de parâmetros
 *
 * @version 1.0.0
 */

import { getLabConfig } from "../config/lab.config";
import { createConfigInvalidError, createShuffleAttemptsExceededError } from "../utils/LabErrors";
import { evolutionLogger } from "../utils/LabLogger";
import type { SeededRNG } from "../utils/SeededRNG";
import type { GeneratorModel } from "./GeneratorModel";

export interface GraphShuffler {
  shuffle(graph: GeneratorModel): GeneratorModel;
}

/**
 * Sorteia cada aresta u → v (u < v) com probabilidade `probOfEdges` até que
 * todos os nós toquem pelo menos uma aresta. Probabilidades abaixo de 0.01
 * deixam o grafo como está.
 */
export class ProbabilisticGraphShuffler implements GraphShuffler {
  static readonly PROBABILITY_EPSILON = 0.01;

  private readonly probOfEdges: number;
  private readonly rng: SeededRNG;
  private readonly maxAttempts: number;

  constructor(probOfEdges: number, rng: SeededRNG, maxAttempts: number = getLabConfig().shuffleMaxAttempts) {
    if (!(probOfEdges >= 0) || probOfEdges > 1) {
      throw createConfigInvalidError("probOfEdges", "deve estar em [0, 1]");
    }
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw createConfigInvalidError("maxAttempts", "deve ser inteiro positivo");
    }

    this.probOfEdges = probOfEdges;
    this.rng = rng;
    this.maxAttempts = maxAttempts;
  }

  shuffle(graph: GeneratorModel): GeneratorModel {
    if (this.probOfEdges < ProbabilisticGraphShuffler.PROBABILITY_EPSILON) {
      return graph;
    }

    const n = graph.nodes.length;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const edges = this.drawEdges(n);
      const touched = new Set(edges.flat());

      if (touched.size === n) {
        graph.nodes.forEach((node, v) => {
          node.parents = edges.filter(([, to]) => to === v).map(([from]) => graph.nodes[from].name);
        });
        if (attempt > this.maxAttempts / 2) {
          evolutionLogger.warn(
            `DAG encontrado perto do limite: ${attempt} de ${this.maxAttempts} tentativas`,
            "shuffle"
          );
        } else {
          evolutionLogger.debug(`DAG com ${edges.length} arestas após ${attempt} tentativa(s)`, "shuffle");
        }
        return graph;
      }
    }

    throw createShuffleAttemptsExceededError(this.maxAttempts, n);
  }

  private drawEdges(n: number): Array<[number, number]> {
    const edges: Array<[number, number]> = [];
    for (let u = 0; u < n; u++) {
      for (let v = u + 1; v < n; v++) {
        if (this.rng.randomBool(this.probOfEdges)) {
          edges.push([u, v]);
        }
      }
    }
    return edges;
  }
}
