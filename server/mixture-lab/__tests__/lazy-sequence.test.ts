/**
 * Teste Unitário - Sequências preguiçosas
 *
 * @version 1.0.0
 */

import { describe, it, expect } from "vitest";
import { ConstrainedGridIterator } from "../grid/ConstrainedGridIterator";
import { GridIterator } from "../grid/GridIterator";
import { NumericRange } from "../grid/NumericRange";
import type { GridValue } from "../grid/types/grid.types";
import { ConstantSequence, GridSequence, WrappedSequence } from "../sequences/LazySequence";
import { LAB_ERROR_CODES } from "../utils/LabErrors";

class SumSequence extends GridSequence<number> {
  protected supply(raw: GridValue[]): number {
    return ConstrainedGridIterator.sumDeep(raw);
  }
}

// ============================================================================
// TESTS
// ============================================================================

describe("LazySequence - Sequências com limite opcional", () => {
  describe("BoundedLazySequence", () => {
    it("deve parar após maxCount itens", () => {
      const sequence = new ConstantSequence(7).setMaxCount(3);

      expect(sequence.take(10)).toEqual([7, 7, 7]);
      expect(sequence.getCount()).toBe(3);
      expect(sequence.next().done).toBe(true);
    });

    it("resetCount deve liberar novos itens", () => {
      const sequence = new ConstantSequence("a").setMaxCount(1);
      sequence.take(5);

      sequence.resetCount();

      expect(sequence.next()).toEqual({ done: false, value: "a" });
    });

    it("deve ser ilimitada por padrão", () => {
      const sequence = new ConstantSequence(1);

      expect(sequence.isBounded()).toBe(false);
      expect(sequence.getMaxCount()).toBeNull();
      expect(sequence.take(5)).toHaveLength(5);
    });

    it("maxCount zero deve terminar imediatamente", () => {
      const sequence = new ConstantSequence(1).setMaxCount(0);

      expect(sequence.next().done).toBe(true);
      expect(sequence.getCount()).toBe(0);
    });

    it("deve rejeitar maxCount inválido", () => {
      const sequence = new ConstantSequence(1);

      expect(() => sequence.setMaxCount(-1)).toThrow(
        expect.objectContaining({ code: LAB_ERROR_CODES.CONFIG_INVALID })
      );
      expect(() => sequence.setMaxCount(1.5)).toThrow(
        expect.objectContaining({ code: LAB_ERROR_CODES.CONFIG_INVALID })
      );
    });

    it("deve contar apenas itens entregues", () => {
      const sequence = new WrappedSequence([1, 2, 3]).setMaxCount(5);

      expect([...sequence]).toEqual([1, 2, 3]);
      expect(sequence.getCount()).toBe(3);
    });
  });

  describe("GridSequence", () => {
    it("deve aplicar supply a cada combinação da grade", () => {
      const grid = GridIterator.of([NumericRange.unit(0, 1), NumericRange.unit(0, 1)]);
      const sequence = new SumSequence(grid);

      expect([...sequence]).toEqual([0, 1, 1, 2]);
    });

    it("não deve consumir a grade recebida", () => {
      const grid = GridIterator.of([NumericRange.unit(0, 2)]);
      new SumSequence(grid).take(3);

      expect(grid.next()).toEqual({ done: false, value: [0] });
    });

    it("deve respeitar o limite sobre a grade", () => {
      const grid = GridIterator.of([NumericRange.unit(0, 9)]);
      const sequence = new SumSequence(grid).setMaxCount(4);

      expect([...sequence]).toEqual([0, 1, 2, 3]);
    });
  });
});
