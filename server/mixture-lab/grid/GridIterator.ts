/**
 * GridIterator - Enumeração preguiçosa do produto cartesiano de eixos
 *
 * Funciona como um odômetro: o primeiro next() devolve os valores iniciais
 * de todos os eixos; cada chamada seguinte avança o primeiro eixo (na ordem
 * de "vai-um") que ainda pode avançar e reinicia os anteriores.
 *
 * Uma GridIterator também é um eixo, podendo ser aninhada em outra grade.
 *
 * @version 1.0.0
 */

import { createConfigInvalidError, createGridExhaustedError } from "../utils/LabErrors";
import { gridLogger } from "../utils/LabLogger";
import {
  EnumerationDirection,
  EXHAUSTED,
  partitionCountSchema,
  type AxisSpec,
  type GridAxis,
  type GridSource,
  type GridValue,
} from "./types/grid.types";

export class GridIterator implements GridAxis<GridValue[]>, GridSource {
  private readonly axes: GridAxis[];
  private readonly direction: EnumerationDirection;
  private started = false;
  private exhausted = false;

  constructor(axes: readonly GridAxis[], direction: EnumerationDirection = EnumerationDirection.REVERSED) {
    if (axes.length === 0) {
      throw createConfigInvalidError("axes", "a grade precisa de pelo menos um eixo");
    }

    // Cada grade possui cópias próprias dos eixos
    this.axes = axes.map(axis => axis.clone());
    this.direction = direction;
  }

  /**
   * Monta uma grade a partir de uma especificação aninhada:
   * cada lista vira uma sub-grade com a mesma direção.
   */
  static of(specs: AxisSpec[], direction: EnumerationDirection = EnumerationDirection.REVERSED): GridIterator {
    const axes = specs.map((spec): GridAxis =>
      Array.isArray(spec) ? GridIterator.of(spec, direction) : spec
    );
    return new GridIterator(axes, direction);
  }

  getDirection(): EnumerationDirection {
    return this.direction;
  }

  getValue(): GridValue[] {
    return this.axes.map(axis => axis.getValue());
  }

  within(): boolean {
    return this.axes.some(axis => axis.within());
  }

  step(): GridValue[] {
    if (!this.advance()) {
      throw createGridExhaustedError(this.toString());
    }
    this.started = true;
    return this.getValue();
  }

  next(): IteratorResult<GridValue[], undefined> {
    if (this.exhausted) return EXHAUSTED;

    if (!this.started) {
      this.started = true;
      return { done: false, value: this.getValue() };
    }

    if (this.advance()) {
      return { done: false, value: this.getValue() };
    }

    this.exhausted = true;
    return EXHAUSTED;
  }

  [Symbol.iterator](): Iterator<GridValue[], undefined> {
    return this;
  }

  reset(): void {
    for (const axis of this.axes) {
      axis.reset();
    }
    this.started = false;
    this.exhausted = false;
  }

  size(): number {
    return this.axes.reduce((product, axis) => product * axis.size(), 1);
  }

  /**
   * Particiona o eixo de variação mais lenta que aceite divisão; os demais
   * eixos são copiados em cada partição. A união das partições reproduz a
   * grade original sem repetições. Divide um único eixo; as fatias de
   * eixos diferentes nunca são reagrupadas por posição.
   */
  split(n: number): GridIterator[] {
    const parsed = partitionCountSchema.safeParse(n);
    if (!parsed.success) {
      throw createConfigInvalidError("split", parsed.error.errors[0]?.message ?? "n inválido");
    }

    const slowestFirst = [...this.carryOrder()].reverse();

    for (const candidate of slowestFirst) {
      if (candidate.size() <= 1) continue;

      const parts = candidate.split(n);
      if (parts.length <= 1) continue;

      const index = this.axes.indexOf(candidate);
      gridLogger.debug(`Particionando eixo ${index} em ${parts.length} partes`, "split");

      return parts.map(part =>
        new GridIterator(this.axes.map((axis, i) => (i === index ? part : axis)), this.direction)
      );
    }

    return [this.clone()];
  }

  clone(): GridIterator {
    return new GridIterator(this.axes, this.direction);
  }

  toString(): string {
    return `GridIterator(${this.axes.map(axis => axis.toString()).join(", ")})`;
  }

  private carryOrder(): GridAxis[] {
    return this.direction === EnumerationDirection.FORWARD ? this.axes : [...this.axes].reverse();
  }

  /**
   * Avança o primeiro eixo que puder, reiniciando os anteriores.
   * Retorna false quando nenhum eixo pode avançar.
   */
  private advance(): boolean {
    for (const axis of this.carryOrder()) {
      if (axis.within()) {
        axis.step();
        return true;
      }
      axis.reset();
    }
    return false;
  }
}
