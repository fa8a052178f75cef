/**
 * GmmSampleProducer - Produz misturas gaussianas e seus OLRs a partir de uma grade
 *
 * Cada combinação da grade é lida como uma mistura, no layout aninhado
 * [pesos, médias, covariâncias] ou num vetor plano, e acompanhada do OLR.
 *
 * @version 1.0.0
 */

import { createHash } from "crypto";
import type { GridSource, GridValue } from "../grid/types/grid.types";
import { computeOverlapRate, parametersFromFlat } from "../overlap/OverlapRateEngine";
import {
  mixtureTupleSchema,
  type MixtureParameters,
  type OverlapEngineOptions,
} from "../overlap/types/overlap.types";
import { createConfigInvalidError } from "../utils/LabErrors";
import { gridLogger } from "../utils/LabLogger";
import { GridSequence } from "./LazySequence";

// ============================================================================
// TYPES
// ============================================================================

export interface GmmSample {
  /** sha256 (16 hex) dos parâmetros */
  combinationId: string;
  parameters: MixtureParameters;
  overlapRate: number;
}

export type GmmGridLayout =
  | { kind: "nested" }
  | { kind: "flat"; components: number; dims: number };

export interface GmmSampleProducerOptions {
  layout?: GmmGridLayout;
  overlap?: OverlapEngineOptions;
}

// ============================================================================
// HELPERS
// ============================================================================

function flattenDeep(value: GridValue): number[] {
  if (typeof value === "number") return [value];
  return value.flatMap(flattenDeep);
}

/**
 * Interpreta uma combinação [pesos, médias, covariâncias]
 */
export function mixtureFromGridValue(raw: GridValue[]): MixtureParameters {
  const parsed = mixtureTupleSchema.safeParse(raw);
  if (!parsed.success) {
    throw createConfigInvalidError(
      "combination",
      "esperado [pesos, médias, covariâncias]: " + parsed.error.errors.map(e => e.message).join("; ")
    );
  }

  const [weights, means, covariances] = parsed.data;
  return { weights, means, covariances };
}

export function hashMixture(parameters: MixtureParameters): string {
  const hash = createHash("sha256");
  hash.update(JSON.stringify(parameters));
  return hash.digest("hex").substring(0, 16);
}

// ============================================================================
// PRODUCER
// ============================================================================

export class GmmSampleProducer extends GridSequence<GmmSample> {
  private readonly options: GmmSampleProducerOptions;

  constructor(grid: GridSource, options: GmmSampleProducerOptions = {}) {
    super(grid);
    this.options = options;
  }

  /**
   * Produtores independentes sobre partições disjuntas da grade.
   * O limite de itens não é herdado.
   */
  split(n: number): GmmSampleProducer[] {
    return this.grid.split(n).map(part => new GmmSampleProducer(part, this.options));
  }

  protected supply(raw: GridValue[]): GmmSample {
    const layout = this.options.layout ?? { kind: "nested" };
    const parameters = layout.kind === "flat"
      ? parametersFromFlat(layout.components, layout.dims, raw.flatMap(flattenDeep))
      : mixtureFromGridValue(raw);

    gridLogger.progress(this.getCount() + 1, null, "Misturas avaliadas", "producer");

    return {
      combinationId: hashMixture(parameters),
      parameters,
      overlapRate: computeOverlapRate(parameters, this.options.overlap),
    };
  }
}
