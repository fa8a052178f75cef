/**
 * ConstrainedGridIterator - Grade filtrada por soma alvo
 *
 * Produz apenas as combinações da grade cuja soma de todas as folhas fica a
 * menos de `tolerance` do alvo. Já na construção posiciona-se na primeira
 * combinação válida, de modo que getValue() sempre devolve uma combinação
 * que satisfaz a restrição.
 *
 * Também é um eixo: within() olha adiante até a próxima combinação válida.
 *
 * @version 1.0.0
 */

import { getLabConfig } from "../config/lab.config";
import {
  createConfigInvalidError,
  createConstraintUnsatisfiableError,
  createGridExhaustedError,
  LabError,
  LAB_ERROR_CODES,
} from "../utils/LabErrors";
import { GridIterator } from "./GridIterator";
import {
  EXHAUSTED,
  partitionCountSchema,
  type GridAxis,
  type GridSource,
  type GridValue,
} from "./types/grid.types";

export class ConstrainedGridIterator implements GridAxis<GridValue[]>, GridSource {
  private readonly grid: GridIterator;
  private readonly target: number;
  private readonly tolerance: number;
  private current: GridValue[];
  /** undefined: ainda não calculado; null: não há próxima combinação */
  private lookahead: GridValue[] | null | undefined = undefined;
  private started = false;
  private exhausted = false;

  constructor(grid: GridIterator, target: number, tolerance: number = getLabConfig().sumTolerance) {
    if (!Number.isFinite(target)) {
      throw createConfigInvalidError("target", "alvo deve ser finito");
    }
    if (!(tolerance > 0)) {
      throw createConfigInvalidError("tolerance", "tolerância deve ser positiva");
    }

    this.grid = grid.clone();
    this.target = target;
    this.tolerance = tolerance;

    const first = this.seekMatch();
    if (first === null) {
      throw createConstraintUnsatisfiableError(target);
    }
    this.current = first;
  }

  /**
   * Soma de todas as folhas de um valor (possivelmente aninhado)
   */
  static sumDeep(value: GridValue): number {
    if (typeof value === "number") return value;
    return value.reduce((sum: number, child) => sum + ConstrainedGridIterator.sumDeep(child), 0);
  }

  getTarget(): number {
    return this.target;
  }

  getValue(): GridValue[] {
    return this.current;
  }

  within(): boolean {
    if (this.lookahead === undefined) {
      this.lookahead = this.seekMatch();
    }
    return this.lookahead !== null;
  }

  step(): GridValue[] {
    if (!this.within() || !this.lookahead) {
      throw createGridExhaustedError(this.toString());
    }
    this.current = this.lookahead;
    this.lookahead = undefined;
    this.started = true;
    return this.current;
  }

  next(): IteratorResult<GridValue[], undefined> {
    if (this.exhausted) return EXHAUSTED;

    if (!this.started) {
      this.started = true;
      return { done: false, value: this.current };
    }

    if (this.within()) {
      return { done: false, value: this.step() };
    }

    this.exhausted = true;
    return EXHAUSTED;
  }

  [Symbol.iterator](): Iterator<GridValue[], undefined> {
    return this;
  }

  reset(): void {
    this.grid.reset();
    const first = this.seekMatch();
    if (first === null) {
      throw new LabError(LAB_ERROR_CODES.INTERNAL_ERROR, "Grade restrita perdeu a primeira combinação após reset");
    }
    this.current = first;
    this.lookahead = undefined;
    this.started = false;
    this.exhausted = false;
  }

  /**
   * Quantidade de combinações válidas (percorre uma cópia)
   */
  size(): number {
    const probe = this.clone();
    let count = 0;
    while (!probe.next().done) {
      count++;
    }
    return count;
  }

  /**
   * Não particiona: devolve uma única cópia restrita
   */
  split(n: number): ConstrainedGridIterator[] {
    const parsed = partitionCountSchema.safeParse(n);
    if (!parsed.success) {
      throw createConfigInvalidError("split", parsed.error.errors[0]?.message ?? "n inválido");
    }
    return [this.clone()];
  }

  clone(): ConstrainedGridIterator {
    return new ConstrainedGridIterator(this.grid, this.target, this.tolerance);
  }

  toString(): string {
    return `ConstrainedGridIterator(${this.grid.toString()}, alvo=${this.target})`;
  }

  private satisfies(value: GridValue[]): boolean {
    return Math.abs(ConstrainedGridIterator.sumDeep(value) - this.target) < this.tolerance;
  }

  private seekMatch(): GridValue[] | null {
    for (;;) {
      const result = this.grid.next();
      if (result.done) return null;
      if (this.satisfies(result.value)) return result.value;
    }
  }
}
