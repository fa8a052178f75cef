/**
 * LazySequence - Sequências preguiçosas com limite opcional de itens
 *
 * @version 1.0.0
 */

import { EXHAUSTED, type GridSource, type GridValue } from "../grid/types/grid.types";
import { createConfigInvalidError } from "../utils/LabErrors";

// ============================================================================
// BASE CLASSES
// ============================================================================

export abstract class LazySequence<T> implements Iterable<T> {
  abstract next(): IteratorResult<T, undefined>;

  [Symbol.iterator](): Iterator<T, undefined> {
    return { next: () => this.next() };
  }

  /**
   * Consome até `count` itens
   */
  take(count: number): T[] {
    const items: T[] = [];
    while (items.length < count) {
      const result = this.next();
      if (result.done) break;
      items.push(result.value);
    }
    return items;
  }
}

/**
 * Sequência que para após `maxCount` itens entregues.
 * Sem limite (null) por padrão.
 */
export abstract class BoundedLazySequence<T> extends LazySequence<T> {
  private maxCount: number | null = null;
  private count = 0;

  setMaxCount(maxCount: number | null): this {
    if (maxCount !== null && (!Number.isInteger(maxCount) || maxCount < 0)) {
      throw createConfigInvalidError("maxCount", "deve ser inteiro não negativo ou null");
    }
    this.maxCount = maxCount;
    return this;
  }

  getMaxCount(): number | null {
    return this.maxCount;
  }

  isBounded(): boolean {
    return this.maxCount !== null;
  }

  getCount(): number {
    return this.count;
  }

  resetCount(): void {
    this.count = 0;
  }

  next(): IteratorResult<T, undefined> {
    if (this.maxCount !== null && this.count >= this.maxCount) {
      return EXHAUSTED;
    }

    const result = this.pull();
    if (!result.done) this.count++;
    return result;
  }

  protected abstract pull(): IteratorResult<T, undefined>;
}

// ============================================================================
// PRODUCERS
// ============================================================================

export class ConstantSequence<T> extends BoundedLazySequence<T> {
  constructor(private readonly value: T) {
    super();
  }

  protected pull(): IteratorResult<T, undefined> {
    return { done: false, value: this.value };
  }
}

export class WrappedSequence<T> extends BoundedLazySequence<T> {
  private readonly iterator: Iterator<T>;

  constructor(source: Iterable<T>) {
    super();
    this.iterator = source[Symbol.iterator]();
  }

  protected pull(): IteratorResult<T, undefined> {
    const result = this.iterator.next();
    return result.done ? EXHAUSTED : { done: false, value: result.value };
  }
}

/**
 * Sequência alimentada por uma grade; cada combinação bruta passa por supply()
 */
export abstract class GridSequence<T> extends BoundedLazySequence<T> {
  protected readonly grid: GridSource;

  constructor(grid: GridSource) {
    super();
    this.grid = grid.clone();
  }

  protected pull(): IteratorResult<T, undefined> {
    const result = this.grid.next();
    if (result.done) return EXHAUSTED;
    return { done: false, value: this.supply(result.value) };
  }

  protected abstract supply(raw: GridValue[]): T;
}
