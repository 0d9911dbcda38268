export { TextState, countWords, isQuestion } from "./text_state.js";
export {
  ChunkSequence,
  chunkTokens,
  mergeChunks,
  validateChunkOptions,
  type ChunkerOptions,
} from "./chunker.js";
export { classifyDomain } from "./classifier.js";
