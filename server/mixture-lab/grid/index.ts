/**
 * Grid Module - Enumeração preguiçosa de grades de parâmetros
 *
 * @version 1.0.0
 */

export * from "./types/grid.types";
export { NumericRange, DEFAULT_ROUND_DIGITS } from "./NumericRange";
export { GridIterator } from "./GridIterator";
export { ConstrainedGridIterator } from "./ConstrainedGridIterator";
