/**
 * Crossovers - Troca de campos entre nós de dois grafos
 *
 * @version 1.0.0
 */

import { createConfigInvalidError } from "../utils/LabErrors";
import type { SeededRNG } from "../utils/SeededRNG";
import { readField, writeField, type GeneratorModel } from "./GeneratorModel";
import type { GmmField } from "./types/evolution.types";

export type Crossover = (first: GeneratorModel, second: GeneratorModel) => [GeneratorModel, GeneratorModel];

/**
 * Troca o campo inteiro entre um nó aleatório de cada grafo
 */
export function exchangeField(field: GmmField, rng: SeededRNG): Crossover {
  return (first, second) => {
    const a = rng.randomChoice(first.nodes);
    const b = rng.randomChoice(second.nodes);

    const valueA = readField(a, field);
    const valueB = readField(b, field);
    writeField(a, field, valueB);
    writeField(b, field, valueA);

    return [first, second];
  };
}

/**
 * Troca apenas o componente de índice sorteado do campo
 */
export function exchangeFieldAtIndex(field: GmmField, rng: SeededRNG): Crossover {
  return (first, second) => {
    const a = rng.randomChoice(first.nodes);
    const b = rng.randomChoice(second.nodes);

    const valuesA = [...readField(a, field)];
    const valuesB = [...readField(b, field)];
    const shared = Math.min(valuesA.length, valuesB.length);
    if (shared === 0) {
      throw createConfigInvalidError(field, "nós sem componentes para troca");
    }

    const index = rng.randomInt(0, shared - 1);
    [valuesA[index], valuesB[index]] = [valuesB[index], valuesA[index]];

    writeField(a, field, valuesA);
    writeField(b, field, valuesB);

    return [first, second];
  };
}
