export type Label = "GUEST" | "HOST" | "OTHER" | "MAYBE";
export type EmbeddingProviderType = "openai" | "local";
export type EmbeddingProviderPreference = EmbeddingProviderType | "auto";

/** Label tag written on every uncertain example record. */
export const UNCERTAIN_LABEL = "M" as const;

export const LABELS: readonly Label[] = ["GUEST", "HOST", "OTHER", "MAYBE"];

export interface CuratorConfig {
  dataDir: string;
  debug: boolean;
  // Suggestion engine
  triggerInterval: number;
  similarityThreshold: number;
  topK: number;
  // Embeddings
  embeddingProvider: EmbeddingProviderPreference;
  embeddingModel: string;
  embeddingMaxChars: number;
  openaiApiKey: string | undefined;
  openaiBaseUrl: string | undefined;
  /** OpenAI-compatible embeddings server (e.g. a local llama.cpp or LM Studio). */
  localEmbeddingUrl: string | undefined;
  localEmbeddingApiKey: string | undefined;
  // Labeling session
  autosaveEvery: number;
}

export interface UncertainExample {
  text: string;
  source: string;
  label: typeof UNCERTAIN_LABEL;
  timestamp: string;
}

export interface Candidate {
  phrase: string;
  source: string;
}

export interface Suggestion {
  phrase: string;
  source: string;
  similarity_score: number;
  suggested_by_engine: true;
  timestamp: string;
}

export interface LabelRecord {
  text: string;
  label: Label;
  source: string;
}

export interface ConsumptionMark {
  phrase: string;
  label: Label;
  consumedAt: string;
}

export interface RecordResult {
  /** Null when the text was blank and nothing was recorded. */
  example: UncertainExample | null;
  trigger: boolean;
  count: number;
  /** Set when the example could not be persisted; it is still held in memory. */
  warning?: string;
}

export interface AccumulatorStats {
  total: number;
  count: number;
  sources: Record<string, number>;
  recent: string[];
  nextTrigger: number;
}

export interface CycleReport {
  references: number;
  poolSize: number;
  eligible: number;
  scored: number;
  skipped: number;
  accepted: number;
  suggestions: Suggestion[];
}
