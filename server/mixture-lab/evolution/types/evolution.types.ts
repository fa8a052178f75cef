/**
 * Evolution Types - Tipos do grafo de parâmetros e dos operadores evolutivos
 *
 * Cada nó do grafo representa uma variável do gerador (uma dimensão) e
 * guarda os parâmetros de uma mistura 1-D sobre essa variável.
 *
 * @version 1.0.0
 */

import { z } from "zod";

// ============================================================================
// FIELDS
// ============================================================================

export enum GmmField {
  WEIGHTS = "weights",
  MEANS = "means",
  COVARIANCES = "covariances",
}

export const NODE_NAME_PREFIX = "Comp_";

export interface GeneratorNode {
  name: string;
  weights: number[];
  /** um vetor por componente */
  means: number[][];
  /** uma matriz por componente */
  covariances: number[][][];
  /** nomes dos nós pais */
  parents: string[];
}

// ============================================================================
// VALUE / BOUND TREES
// ============================================================================

export type ValueTree = number | ValueTree[];

/** [mínimo, máximo] */
export type Bound = readonly [number, number];

/**
 * Árvore de limites com a mesma forma do valor; um Bound aplicado a uma
 * lista vale para todos os seus elementos
 */
export type BoundTree = Bound | readonly BoundTree[];

export function isBound(tree: BoundTree): tree is Bound {
  return tree.length === 2 && typeof tree[0] === "number" && typeof tree[1] === "number";
}

export const fieldSchemas = {
  [GmmField.WEIGHTS]: z.array(z.number()),
  [GmmField.MEANS]: z.array(z.array(z.number())),
  [GmmField.COVARIANCES]: z.array(z.array(z.array(z.number()))),
} as const;

// ============================================================================
// OPTIMIZER CONFIG
// ============================================================================

export const GENETIC_SCHEME = "steady_state";
export const SELECTION_TYPE = "tournament";

export const evolutionaryConfigurationSchema = z.object({
  populationSize: z.number().int("Deve ser inteiro").positive("População deve ser positiva"),
  maxPopulationSize: z.number().int("Deve ser inteiro").positive("População máxima deve ser positiva"),
  crossoverProbability: z.number().min(0, "Probabilidade de crossover deve ser >= 0"),
  mutationProbability: z.number().min(0, "Probabilidade de mutação deve ser >= 0"),
}).refine(
  (data) => data.populationSize <= data.maxPopulationSize,
  {
    message: "populationSize deve ser menor ou igual a maxPopulationSize",
    path: ["populationSize"],
  }
);

export type EvolutionarySettings = z.infer<typeof evolutionaryConfigurationSchema>;

export const optimizerRequirementsSchema = z.object({
  maxArity: z.number().int().positive(),
  maxDepth: z.number().int().positive(),
  earlyStoppingIterations: z.number().int().positive(),
  numOfGenerations: z.number().int().positive(),
  timeoutMinutes: z.number().positive(),
  nJobs: z.number().int().positive(),
});

export type OptimizerRequirements = z.infer<typeof optimizerRequirementsSchema>;

export const DEFAULT_OPTIMIZER_REQUIREMENTS: OptimizerRequirements = {
  maxArity: 100,
  maxDepth: 100,
  earlyStoppingIterations: 5,
  numOfGenerations: 500,
  timeoutMinutes: 60,
  nJobs: 6,
};
