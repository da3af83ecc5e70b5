export { parseConfig, loadConfigFile } from "./config.js";
export { initLogger, log } from "./logger.js";
export type { LoggerBackend } from "./logger.js";
export {
  CandidatePoolUnavailableError,
  EmbeddingProviderError,
  EmptyInputError,
  StoreReadError,
  StoreWriteError,
} from "./errors.js";
export { CachedEmbedder, OpenAiEmbeddingProvider, resolveEmbeddingProvider } from "./embedding.js";
export type { EmbeddingProvider } from "./embedding.js";
export { ExampleAccumulator } from "./accumulator.js";
export { cosineSimilarity, maxSimilarity, rankCandidates, SimilarityRetriever } from "./similarity.js";
export { SuggestionStore } from "./suggestion-store.js";
export { LabelStore } from "./label-store.js";
export { CandidateSource } from "./candidate-source.js";
export { FileStateBackend, MemoryStateBackend } from "./json-state.js";
export type { StateBackend } from "./json-state.js";
export { SuggestionEngine } from "./engine.js";
export type { GenerationOutcome, UncertainLabelOutcome } from "./engine.js";
export { LabelingSession, parseLabelKey } from "./labeling.js";
export { exportSqlite } from "./export-sqlite.js";
export type {
  AccumulatorStats,
  Candidate,
  ConsumptionMark,
  CuratorConfig,
  CycleReport,
  Label,
  LabelRecord,
  RecordResult,
  Suggestion,
  UncertainExample,
} from "./types.js";
export { LABELS, UNCERTAIN_LABEL } from "./types.js";
