/**
 * Grid Types - Tipos do Motor de Enumeração em Grade
 *
 * Uma grade é um odômetro multidimensional: cada eixo (faixa numérica,
 * sub-grade aninhada ou grade restrita) avança de forma independente e
 * o "vai-um" propaga para o próximo eixo quando um eixo se esgota.
 *
 * @version 1.0.0
 */

import { z } from "zod";

// ============================================================================
// VALUES
// ============================================================================

/**
 * Valor de uma grade: número (faixa) ou lista aninhada (sub-grade)
 */
export type GridValue = number | GridValue[];

// ============================================================================
// ENUMS
// ============================================================================

/**
 * Sentido de uma faixa numérica, derivado de start/end
 */
export enum RangeDirection {
  INCREMENTAL = "INCREMENTAL",
  DECREMENTAL = "DECREMENTAL",
}

/**
 * Ordem em que os eixos recebem o "vai-um".
 * REVERSED (default): o último eixo listado varia mais rápido.
 */
export enum EnumerationDirection {
  FORWARD = "FORWARD",
  REVERSED = "REVERSED",
}

// ============================================================================
// AXIS CONTRACT
// ============================================================================

/**
 * Contrato de um eixo da grade
 */
export interface GridAxis<T extends GridValue = GridValue> {
  /** Valor atual */
  getValue(): T;

  /** true enquanto o eixo ainda pode avançar */
  within(): boolean;

  /** Avança uma posição e retorna o novo valor */
  step(): T;

  /** Volta ao valor inicial */
  reset(): void;

  /** Quantidade de valores visitados do início ao fim */
  size(): number;

  /** Particiona o eixo em até n eixos disjuntos */
  split(n: number): GridAxis<T>[];

  /** Cópia independente, posicionada no valor inicial */
  clone(): GridAxis<T>;

  toString(): string;
}

/**
 * Especificação de eixos para GridIterator.of: listas viram sub-grades
 */
export type AxisSpec = GridAxis | AxisSpec[];

/**
 * Fonte de combinações consumida pelos produtores
 */
export interface GridSource extends Iterable<GridValue[]> {
  next(): IteratorResult<GridValue[], undefined>;
  reset(): void;
  size(): number;
  split(n: number): GridSource[];
  clone(): GridSource;
}

export const EXHAUSTED: IteratorReturnResult<undefined> = { done: true, value: undefined };

// ============================================================================
// SCHEMAS
// ============================================================================

export const numericRangeSchema = z.object({
  start: z.number().finite("start deve ser finito"),
  end: z.number().finite("end deve ser finito"),
  step: z.number()
    .finite("step deve ser finito")
    .positive("step deve ser positivo"),
  roundDigits: z.number()
    .int("Deve ser inteiro")
    .min(0, "Mínimo de 0 casas")
    .max(15, "Máximo de 15 casas"),
});

export const partitionCountSchema = z.number()
  .int("Número de partições deve ser inteiro")
  .positive("Número de partições deve ser positivo");
