/**
 * NodeMutators - Operadores de mutação sobre nós do grafo de parâmetros
 *
 * Uma Mutation combina um seletor de nó com um mutador. Os mutadores
 * limitados percorrem o valor do campo junto com uma árvore de limites de
 * mesma forma e aplicam uma regra a cada folha.
 *
 * @version 1.0.0
 */

import {
  createConfigInvalidError,
  createNodeNotFoundError,
} from "../utils/LabErrors";
import type { SeededRNG } from "../utils/SeededRNG";
import { readField, writeField, type GeneratorModel } from "./GeneratorModel";
import {
  GmmField,
  isBound,
  type Bound,
  type BoundTree,
  type GeneratorNode,
  type ValueTree,
} from "./types/evolution.types";

// ============================================================================
// SELECTORS
// ============================================================================

export interface NodeSelector {
  select(graph: GeneratorModel): GeneratorNode;
}

export class RandomNodeSelector implements NodeSelector {
  constructor(private readonly rng: SeededRNG) {}

  select(graph: GeneratorModel): GeneratorNode {
    return this.rng.randomChoice(graph.nodes);
  }
}

export class ByNameNodeSelector implements NodeSelector {
  constructor(private readonly name: string) {}

  select(graph: GeneratorModel): GeneratorNode {
    const node = graph.findNode(this.name);
    if (!node) {
      throw createNodeNotFoundError(this.name);
    }
    return node;
  }
}

// ============================================================================
// BOUND TREE TRAVERSAL
// ============================================================================

type LeafRule = (value: number, bound: Bound) => number;

/**
 * Percorre valor e limites juntos; um Bound sobre uma lista vale para
 * todos os elementos dela
 */
export function applyBounds(value: ValueTree, bounds: BoundTree, rule: LeafRule, path: string = "$"): ValueTree {
  if (isBound(bounds)) {
    if (typeof value === "number") return rule(value, bounds);
    return value.map((child, i) => applyBounds(child, bounds, rule, `${path}[${i}]`));
  }

  if (typeof value === "number" || value.length !== bounds.length) {
    throw createConfigInvalidError(path, "forma do valor não corresponde à árvore de limites");
  }

  return value.map((child, i) => applyBounds(child, bounds[i], rule, `${path}[${i}]`));
}

function validateBoundTree(bounds: BoundTree, path: string = "$"): void {
  if (isBound(bounds)) {
    if (!Number.isFinite(bounds[0]) || !Number.isFinite(bounds[1]) || bounds[0] > bounds[1]) {
      throw createConfigInvalidError(path, `limite inválido [${bounds[0]}, ${bounds[1]}]`);
    }
    return;
  }
  if (bounds.length === 0) {
    throw createConfigInvalidError(path, "lista de limites vazia");
  }
  bounds.forEach((child, i) => validateBoundTree(child, `${path}[${i}]`));
}

// ============================================================================
// MUTATORS
// ============================================================================

export interface NodeMutator {
  mutate(node: GeneratorNode): void;
}

abstract class BoundedNodeMutator implements NodeMutator {
  protected constructor(
    protected readonly field: GmmField,
    protected readonly bounds: BoundTree,
    protected readonly rng: SeededRNG
  ) {
    validateBoundTree(bounds);
  }

  mutate(node: GeneratorNode): void {
    const updated = applyBounds(readField(node, this.field), this.bounds, (v, b) => this.leaf(v, b));
    writeField(node, this.field, updated);
  }

  protected abstract leaf(value: number, bound: Bound): number;
}

/** Soma um delta uniforme em [min, max) a cada valor */
export class RandomDeltaNodeMutator extends BoundedNodeMutator {
  constructor(field: GmmField, bounds: BoundTree, rng: SeededRNG) {
    super(field, bounds, rng);
  }

  protected leaf(value: number, [min, max]: Bound): number {
    return min === max ? value : value + this.rng.randomFloat(min, max);
  }
}

/** Substitui cada valor por um uniforme em [min, max) */
export class RandomValueNodeMutator extends BoundedNodeMutator {
  constructor(field: GmmField, bounds: BoundTree, rng: SeededRNG) {
    super(field, bounds, rng);
  }

  protected leaf(value: number, [min, max]: Bound): number {
    return min === max ? value : this.rng.randomFloat(min, max);
  }
}

/**
 * Aplica delta aleatório apenas ao componente de índice sorteado.
 * Os limites precisam ser uma lista com um item por componente.
 */
export class RandomIndexRandomDeltaNodeMutator extends BoundedNodeMutator {
  constructor(field: GmmField, bounds: readonly BoundTree[], rng: SeededRNG) {
    super(field, bounds, rng);
  }

  mutate(node: GeneratorNode): void {
    if (isBound(this.bounds)) {
      throw createConfigInvalidError("bounds", "esperada uma lista de limites por componente");
    }

    const values = [...readField(node, this.field)];
    if (values.length < this.bounds.length) {
      throw createConfigInvalidError(this.field, "menos componentes do que limites");
    }

    const index = this.rng.randomInt(0, this.bounds.length - 1);
    values[index] = applyBounds(values[index], this.bounds[index], (v, b) => this.leaf(v, b), `$[${index}]`);
    writeField(node, this.field, values);
  }

  protected leaf(value: number, [min, max]: Bound): number {
    return min === max ? value : value + this.rng.randomFloat(min, max);
  }
}

/**
 * Executa o mutador decorado e depois sorteia de novo, uniformemente em
 * [min, max), todo valor que ficou fora dos limites
 */
export class ClampNodeMutator extends BoundedNodeMutator {
  constructor(
    field: GmmField,
    private readonly decorated: NodeMutator,
    bounds: BoundTree,
    rng: SeededRNG
  ) {
    super(field, bounds, rng);
  }

  mutate(node: GeneratorNode): void {
    this.decorated.mutate(node);
    super.mutate(node);
  }

  protected leaf(value: number, [min, max]: Bound): number {
    return value < min || value > max ? this.rng.randomFloat(min, max) : value;
  }
}

/** Pesos uniformes normalizados para somar 1 */
export class RandomSumToOneNodeMutator implements NodeMutator {
  constructor(private readonly rng: SeededRNG) {}

  mutate(node: GeneratorNode): void {
    const values = node.weights.map(() => this.rng.random());
    const total = values.reduce((sum, v) => sum + v, 0);
    node.weights = values.map(v => v / total);
  }
}

/** Pesos sorteados de Dirichlet(multiplier, ..., multiplier) */
export class DirichletSumToOneNodeMutator implements NodeMutator {
  constructor(private readonly rng: SeededRNG, private readonly multiplier: number = 1) {
    if (!(multiplier > 0)) {
      throw createConfigInvalidError("multiplier", "deve ser positivo");
    }
  }

  mutate(node: GeneratorNode): void {
    node.weights = this.rng.randomDirichlet(node.weights.map(() => this.multiplier));
  }
}

// ============================================================================
// MUTATION
// ============================================================================

export class Mutation {
  constructor(
    private readonly selector: NodeSelector,
    private readonly mutator: NodeMutator
  ) {}

  /**
   * Muta o nó selecionado no próprio grafo e devolve o grafo
   */
  apply(graph: GeneratorModel): GeneratorModel {
    this.mutator.mutate(this.selector.select(graph));
    return graph;
  }
}

export function mutation(mutator: NodeMutator, rng: SeededRNG): Mutation {
  return new Mutation(new RandomNodeSelector(rng), mutator);
}
