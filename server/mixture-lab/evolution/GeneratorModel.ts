/**
 * GeneratorModel - Grafo de parâmetros do gerador
 *
 * @version 1.0.0
 */

import type { z } from "zod";
import { createConfigInvalidError } from "../utils/LabErrors";
import type { GmmParametersInitializer } from "./ParameterInitializers";
import {
  fieldSchemas,
  GmmField,
  NODE_NAME_PREFIX,
  type GeneratorNode,
  type ValueTree,
} from "./types/evolution.types";

// ============================================================================
// NODE NAMES
// ============================================================================

export function generatorNodeName(index: number): string {
  return `${NODE_NAME_PREFIX}${index}`;
}

export function extractIndexFromNodeName(name: string): number {
  const match = /^Comp_(\d+)$/.exec(name);
  if (!match) {
    throw createConfigInvalidError("name", `nome de nó inválido: "${name}"`);
  }
  return Number(match[1]);
}

// ============================================================================
// FIELD ACCESS
// ============================================================================

/**
 * Lista de valores do campo (um item por componente)
 */
export function readField(node: GeneratorNode, field: GmmField): ValueTree[] {
  switch (field) {
    case GmmField.WEIGHTS:
      return node.weights;
    case GmmField.MEANS:
      return node.means;
    case GmmField.COVARIANCES:
      return node.covariances;
  }
}

/**
 * Grava o campo depois de conferir a forma do valor
 */
export function writeField(node: GeneratorNode, field: GmmField, value: ValueTree): void {
  switch (field) {
    case GmmField.WEIGHTS:
      node.weights = parseField(fieldSchemas[GmmField.WEIGHTS], field, value);
      break;
    case GmmField.MEANS:
      node.means = parseField(fieldSchemas[GmmField.MEANS], field, value);
      break;
    case GmmField.COVARIANCES:
      node.covariances = parseField(fieldSchemas[GmmField.COVARIANCES], field, value);
      break;
  }
}

function parseField<T>(
  schema: z.ZodType<T>,
  field: GmmField,
  value: ValueTree
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw createConfigInvalidError(field, "forma do valor incompatível com o campo");
  }
  return parsed.data;
}

export function cloneNode(node: GeneratorNode): GeneratorNode {
  return {
    name: node.name,
    weights: [...node.weights],
    means: node.means.map(m => [...m]),
    covariances: node.covariances.map(c => c.map(row => [...row])),
    parents: [...node.parents],
  };
}

// ============================================================================
// MODEL
// ============================================================================

export class GeneratorModel {
  readonly nodes: GeneratorNode[];

  constructor(nodes: GeneratorNode[] = []) {
    this.nodes = nodes;
  }

  findNode(name: string): GeneratorNode | undefined {
    return this.nodes.find(node => node.name === name);
  }

  /**
   * Pares (pai, filho) de todas as arestas
   */
  edges(): Array<[string, string]> {
    return this.nodes.flatMap(node => node.parents.map((parent): [string, string] => [parent, node.name]));
  }

  clone(): GeneratorModel {
    return new GeneratorModel(this.nodes.map(cloneNode));
  }
}

/**
 * Um nó por dimensão, sem arestas
 */
export function createGeneratorModel(
  nDim: number,
  nComp: number,
  initializer: GmmParametersInitializer
): GeneratorModel {
  if (!Number.isInteger(nDim) || nDim < 1) {
    throw createConfigInvalidError("nDim", "deve ser inteiro positivo");
  }
  if (!Number.isInteger(nComp) || nComp < 1) {
    throw createConfigInvalidError("nComp", "deve ser inteiro positivo");
  }

  const nodes = Array.from({ length: nDim }, (_, i): GeneratorNode => {
    const name = generatorNodeName(i);
    return {
      name,
      weights: initializer.weights.createInitialWeights(name, nComp),
      means: initializer.means.createInitialMeans(name, nComp),
      covariances: initializer.covariances.createInitialCovariances(name, nComp),
      parents: [],
    };
  });

  return new GeneratorModel(nodes);
}
