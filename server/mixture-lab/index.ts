/**
 * Mixture Lab - Enumeração de grades de misturas gaussianas, taxa de
 * sobreposição (OLR) e operadores evolutivos para busca de geradores
 *
 * @version 1.0.0
 */

export * from "./config/lab.config";
export * from "./utils";
export * from "./grid";
export * from "./overlap";
export * from "./sequences";
export * from "./evolution";
