/**
 * NumericRange - Faixa numérica com passo fixo
 *
 * Visita start, start ± step, ... até alcançar end (inclusive). O último passo
 * é ajustado para end quando ultrapassa ou fica próximo dele; cada valor é
 * arredondado para `roundDigits` casas.
 *
 * @version 1.0.0
 */

import { createConfigInvalidError, createGridExhaustedError } from "../utils/LabErrors";
import { isClose, roundTo } from "../utils/MathUtils";
import {
  numericRangeSchema,
  partitionCountSchema,
  RangeDirection,
  type GridAxis,
} from "./types/grid.types";

export const DEFAULT_ROUND_DIGITS = 9;

export class NumericRange implements GridAxis<number> {
  private readonly start: number;
  private readonly end: number;
  private readonly stepSize: number;
  private readonly roundDigits: number;
  private readonly direction: RangeDirection;
  private value: number;

  constructor(start: number, end: number, step: number, roundDigits: number = DEFAULT_ROUND_DIGITS) {
    const parsed = numericRangeSchema.safeParse({ start, end, step, roundDigits });
    if (!parsed.success) {
      throw createConfigInvalidError(
        "NumericRange",
        parsed.error.errors.map(e => `${e.path.join(".")}: ${e.message}`).join("; ")
      );
    }

    this.start = start;
    this.end = end;
    this.stepSize = step;
    this.roundDigits = roundDigits;
    this.direction = start <= end ? RangeDirection.INCREMENTAL : RangeDirection.DECREMENTAL;
    this.value = start;
  }

  /** Faixa [a, b] com passo 1 */
  static unit(a: number, b: number): NumericRange {
    return new NumericRange(a, b, 1);
  }

  /** Faixa degenerada que produz apenas c */
  static const(c: number): NumericRange {
    return new NumericRange(c, c, 1);
  }

  getValue(): number {
    return this.value;
  }

  getStart(): number {
    return this.start;
  }

  getEnd(): number {
    return this.end;
  }

  getStep(): number {
    return this.stepSize;
  }

  getDirection(): RangeDirection {
    return this.direction;
  }

  within(): boolean {
    if (this.direction === RangeDirection.INCREMENTAL) {
      return this.value >= this.start && this.value < this.end;
    }
    return this.value > this.end && this.value <= this.start;
  }

  step(): number {
    if (!this.within()) {
      throw createGridExhaustedError(this.toString());
    }

    let next: number;
    if (this.direction === RangeDirection.INCREMENTAL) {
      next = this.value + this.stepSize;
      if (next > this.end || isClose(next, this.end)) next = this.end;
    } else {
      next = this.value - this.stepSize;
      if (next < this.end || isClose(next, this.end)) next = this.end;
    }

    this.value = roundTo(next, this.roundDigits);
    return this.value;
  }

  reset(): void {
    this.value = this.start;
  }

  /**
   * Todos os valores visitados, em ordem
   */
  values(): number[] {
    const probe = this.clone();
    const visited = [probe.getValue()];
    while (probe.within()) {
      visited.push(probe.step());
    }
    return visited;
  }

  size(): number {
    return this.values().length;
  }

  /**
   * Particiona por índice de visita em min(n, size) faixas contíguas.
   * O resto da divisão fica na última faixa. Faixa degenerada: n cópias.
   */
  split(n: number): NumericRange[] {
    const parsed = partitionCountSchema.safeParse(n);
    if (!parsed.success) {
      throw createConfigInvalidError("split", parsed.error.errors[0]?.message ?? "n inválido");
    }

    if (this.start === this.end) {
      return Array.from({ length: n }, () => this.clone());
    }

    const visited = this.values();
    const parts = Math.min(n, visited.length);
    const width = Math.floor(visited.length / parts);

    const ranges: NumericRange[] = [];
    for (let i = 0; i < parts; i++) {
      const from = i * width;
      const to = i === parts - 1 ? visited.length - 1 : (i + 1) * width - 1;
      ranges.push(new NumericRange(visited[from], visited[to], this.stepSize, this.roundDigits));
    }
    return ranges;
  }

  clone(): NumericRange {
    return new NumericRange(this.start, this.end, this.stepSize, this.roundDigits);
  }

  toString(): string {
    return `NumericRange(${this.start}, ${this.end}, ${this.stepSize})`;
  }
}
