export { embedImage, embedMany, embedOne } from './embedding';
export { type MultimodalOptions, processMultimodal } from './multimodal';
export {
  type SerializedItemResult,
  type SerializedMultimodalResult,
  serializeMultimodalResult
} from './serialize';
export { computeStats, EMPTY_STATS } from './stats';
