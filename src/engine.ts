import { log } from "./logger.js";
import { describeError } from "./errors.js";
import { ExampleAccumulator } from "./accumulator.js";
import { CandidateSource } from "./candidate-source.js";
import { CachedEmbedder, resolveEmbeddingProvider } from "./embedding.js";
import type { EmbeddingProvider } from "./embedding.js";
import { FileStateBackend } from "./json-state.js";
import type { StateBackend } from "./json-state.js";
import { LabelStore } from "./label-store.js";
import { SimilarityRetriever } from "./similarity.js";
import { SuggestionStore } from "./suggestion-store.js";
import type { CuratorConfig, CycleReport, RecordResult } from "./types.js";

export interface UncertainLabelOutcome {
  record: RecordResult;
  /** Present when this label triggered a cycle that completed. */
  cycle?: CycleReport;
  /** Present when a triggered cycle failed; the counter is left as is. */
  cycleError?: string;
  /** The cycle completed but its counter reset could not be saved. */
  warning?: string;
}

export interface GenerationOutcome {
  cycle: CycleReport;
  /** Set when the counter reset after the cycle could not be saved. */
  warning?: string;
}

export interface EngineParts {
  accumulator: ExampleAccumulator;
  candidates: CandidateSource;
  labels: LabelStore;
  suggestions: SuggestionStore;
  /** Null when no embedding provider is configured; cycles then add nothing. */
  embedder: CachedEmbedder | null;
  threshold: number;
  topK: number;
  now?: () => Date;
}

export class SuggestionEngine {
  readonly accumulator: ExampleAccumulator;
  readonly candidates: CandidateSource;
  readonly labels: LabelStore;
  readonly suggestions: SuggestionStore;
  private readonly embedder: CachedEmbedder | null;
  private readonly retriever: SimilarityRetriever | null;
  private readonly threshold: number;
  private readonly topK: number;
  private readonly now: () => Date;

  constructor(parts: EngineParts) {
    this.accumulator = parts.accumulator;
    this.candidates = parts.candidates;
    this.labels = parts.labels;
    this.suggestions = parts.suggestions;
    this.embedder = parts.embedder;
    this.retriever = parts.embedder ? new SimilarityRetriever(parts.embedder) : null;
    this.threshold = parts.threshold;
    this.topK = parts.topK;
    this.now = parts.now ?? (() => new Date());
  }

  /**
   * Build an engine over one data directory. `provider` overrides the
   * configured embedding backend (pass null to run without one).
   */
  static create(
    config: CuratorConfig,
    deps: { backend?: StateBackend; provider?: EmbeddingProvider | null; now?: () => Date } = {},
  ): SuggestionEngine {
    const backend = deps.backend ?? new FileStateBackend(config.dataDir);
    const now = deps.now ?? (() => new Date());
    const provider = deps.provider === undefined ? resolveEmbeddingProvider(config) : deps.provider;
    if (!provider) log.warn("no embedding provider configured; suggestions disabled");

    const labels = new LabelStore(backend);
    return new SuggestionEngine({
      accumulator: new ExampleAccumulator(backend, config.triggerInterval, now),
      candidates: new CandidateSource(backend),
      labels,
      suggestions: new SuggestionStore(backend, labels, now),
      embedder: provider ? new CachedEmbedder(provider) : null,
      threshold: config.similarityThreshold,
      topK: config.topK,
      now,
    });
  }

  /** Read every persisted store into memory; call once per session. */
  async load(): Promise<void> {
    await this.labels.load();
    await this.suggestions.load();
    await this.accumulator.load();
  }

  /**
   * Record a phrase the annotator marked as uncertain, and run a generation
   * cycle when the accumulator says one is due. Cycle failures are reported
   * in the outcome, never thrown, so the labeling loop keeps going.
   */
  async onUncertainLabel(text: string, source: string): Promise<UncertainLabelOutcome> {
    const record = await this.accumulator.record(text, source);
    if (!record.trigger) return { record };

    try {
      const { cycle, warning } = await this.generateNow();
      return warning ? { record, cycle, warning } : { record, cycle };
    } catch (err) {
      log.error(`generation cycle failed: ${describeError(err)}`);
      return { record, cycleError: describeError(err) };
    }
  }

  /**
   * Run a cycle now and start a fresh cadence once it completes. A failed
   * cycle throws and leaves the counter where it was.
   */
  async generateNow(): Promise<GenerationOutcome> {
    const cycle = await this.runCycle();
    const warning = await this.accumulator.resetCounter();
    return warning ? { cycle, warning } : { cycle };
  }

  /**
   * Score the candidate pool against every accumulated uncertain example and
   * store the suggestions that qualify. Throws only when the pool cannot be
   * read or the store cannot be written. Does not touch the counter; see
   * {@link generateNow}.
   */
  async runCycle(): Promise<CycleReport> {
    const references = this.accumulator.allExamples();
    if (!this.retriever || !this.embedder) {
      return { references: references.length, poolSize: 0, eligible: 0, scored: 0, skipped: 0, accepted: 0, suggestions: [] };
    }

    const pool = await this.candidates.load();
    this.embedder.clear();
    const result = await this.retriever.retrieve(references, pool, {
      threshold: this.threshold,
      topK: this.topK,
      isKnown: (phrase) => this.suggestions.isKnown(phrase),
      now: this.now,
    });
    const accepted = await this.suggestions.accept(result.suggestions, { minScore: this.threshold });

    log.info(
      `generation cycle: ${references.length} examples, ${pool.length} candidates, ${result.suggestions.length} matched, ${accepted} new`,
    );
    return {
      references: references.length,
      poolSize: pool.length,
      eligible: result.eligible,
      scored: result.scored,
      skipped: result.skipped,
      accepted,
      suggestions: result.suggestions,
    };
  }
}
