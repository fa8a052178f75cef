/**
 * Sequences Module
 *
 * @version 1.0.0
 */

export {
  BoundedLazySequence,
  ConstantSequence,
  GridSequence,
  LazySequence,
  WrappedSequence,
} from "./LazySequence";

export {
  GmmSampleProducer,
  hashMixture,
  mixtureFromGridValue,
  type GmmGridLayout,
  type GmmSample,
  type GmmSampleProducerOptions,
} from "./GmmSampleProducer";
