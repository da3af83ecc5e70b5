import { log } from "./logger.js";
import { normalizePhrase } from "./normalize.js";
import { ConsumptionMarkSchema, parseRecords, SuggestionSchema } from "./schemas.js";
import type { StateBackend } from "./json-state.js";
import type { LabelStore } from "./label-store.js";
import type { ConsumptionMark, Label, Suggestion } from "./types.js";

export const SUGGESTIONS_KEY = "suggestions.json";
export const CONSUMPTION_KEY = "state/suggestion_consumption.json";

/**
 * Engine-produced suggestions, append-only. Consumption (a human later
 * labeling a suggested phrase) is tracked beside the records rather than by
 * editing them.
 */
export class SuggestionStore {
  private suggestions: Suggestion[] = [];
  private readonly byPhrase = new Map<string, Suggestion>();
  private readonly consumed = new Map<string, ConsumptionMark>();

  constructor(
    private readonly backend: StateBackend,
    private readonly labels: LabelStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async load(): Promise<void> {
    this.suggestions = parseRecords(
      SuggestionSchema,
      await this.backend.read(SUGGESTIONS_KEY),
      this.backend.describe(SUGGESTIONS_KEY),
    );
    this.byPhrase.clear();
    for (const s of this.suggestions) {
      const key = normalizePhrase(s.phrase);
      if (!this.byPhrase.has(key)) this.byPhrase.set(key, s);
    }

    const marks = parseRecords(
      ConsumptionMarkSchema,
      await this.backend.read(CONSUMPTION_KEY),
      this.backend.describe(CONSUMPTION_KEY),
    );
    this.consumed.clear();
    for (const m of marks) this.consumed.set(normalizePhrase(m.phrase), m);
    log.debug(`suggestion store loaded: ${this.suggestions.length} suggestions, ${this.consumed.size} consumed`);
  }

  get size(): number {
    return this.suggestions.length;
  }

  /** Labeled in any category, or suggested before. */
  isKnown(phrase: string): boolean {
    return this.labels.has(phrase) || this.isSuggested(phrase);
  }

  isSuggested(phrase: string): boolean {
    return this.byPhrase.has(normalizePhrase(phrase));
  }

  get(phrase: string): Suggestion | undefined {
    return this.byPhrase.get(normalizePhrase(phrase));
  }

  list(): Suggestion[] {
    return [...this.suggestions];
  }

  /**
   * Persist the suggestions that are still unknown. Known phrases (labeled
   * meanwhile or suggested before), repeats within the batch and anything
   * scoring under `minScore` are dropped without error. Returns how many
   * records were added.
   */
  async accept(batch: readonly Suggestion[], opts: { minScore?: number } = {}): Promise<number> {
    const added: Suggestion[] = [];
    const batchKeys = new Set<string>();
    for (const s of batch) {
      const key = normalizePhrase(s.phrase);
      if (key.length === 0 || batchKeys.has(key) || this.isKnown(s.phrase)) continue;
      if (opts.minScore !== undefined && !(s.similarity_score >= opts.minScore)) {
        log.warn(`suggestion "${s.phrase}" below threshold (${s.similarity_score}); not stored`);
        continue;
      }
      batchKeys.add(key);
      added.push(s);
    }
    if (added.length === 0) return 0;

    const next = [...this.suggestions, ...added];
    await this.backend.write(SUGGESTIONS_KEY, next);
    this.suggestions = next;
    for (const s of added) this.byPhrase.set(normalizePhrase(s.phrase), s);
    log.debug(`stored ${added.length} new suggestion(s)`);
    return added.length;
  }

  /**
   * Note that a human labeled a suggested phrase. Returns false (and records
   * nothing) when the phrase was never suggested.
   */
  async markConsumed(phrase: string, label: Label): Promise<boolean> {
    const suggestion = this.get(phrase);
    if (!suggestion) return false;

    const mark: ConsumptionMark = {
      phrase: suggestion.phrase,
      label,
      consumedAt: this.now().toISOString(),
    };
    const key = normalizePhrase(phrase);
    const next = new Map(this.consumed);
    next.set(key, mark);
    await this.backend.write(CONSUMPTION_KEY, [...next.values()]);
    this.consumed.set(key, mark);
    return true;
  }

  consumption(phrase: string): ConsumptionMark | undefined {
    return this.consumed.get(normalizePhrase(phrase));
  }
}
