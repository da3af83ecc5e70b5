import { log } from "./logger.js";
import { normalizePhrase } from "./normalize.js";
import type { CachedEmbedder } from "./embedding.js";
import type { Candidate, Suggestion, UncertainExample } from "./types.js";

/**
 * Cosine similarity in [-1, 1]. Zero-norm, empty, or mismatched-length
 * vectors score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return Math.max(-1, Math.min(1, dot / denom));
}

/** Best match against any reference; null when there are no references. */
export function maxSimilarity(vector: readonly number[], references: readonly (readonly number[])[]): number | null {
  let best: number | null = null;
  for (const ref of references) {
    const s = cosineSimilarity(vector, ref);
    if (best === null || s > best) best = s;
  }
  return best;
}

export interface RankOptions {
  threshold: number;
  topK: number;
}

export interface EmbeddedCandidate {
  candidate: Candidate;
  vector: readonly number[];
}

export interface RankedCandidate {
  candidate: Candidate;
  score: number;
  /** Position in the input list; ties rank first-seen first. */
  index: number;
}

/**
 * Score each candidate by its maximum similarity to the references, keep
 * those at or above the threshold, and return the `topK` best in descending
 * score order.
 */
export function rankCandidates(
  items: readonly EmbeddedCandidate[],
  references: readonly (readonly number[])[],
  opts: RankOptions,
): RankedCandidate[] {
  if (references.length === 0 || opts.topK <= 0) return [];

  const ranked: RankedCandidate[] = [];
  items.forEach((item, index) => {
    const score = maxSimilarity(item.vector, references);
    if (score !== null && score >= opts.threshold) {
      ranked.push({ candidate: item.candidate, score, index });
    }
  });

  ranked.sort((a, b) => b.score - a.score || a.index - b.index);
  return ranked.slice(0, opts.topK);
}

export interface GenerateOptions extends RankOptions {
  /** Phrases already labeled or suggested are not eligible. */
  isKnown?: (phrase: string) => boolean;
  now?: () => Date;
}

export interface RetrievalResult {
  suggestions: Suggestion[];
  /** Pool entries left after dropping known phrases and duplicates. */
  eligible: number;
  /** Eligible candidates that produced a vector. */
  scored: number;
  /** Reference examples and candidates dropped because they could not be embedded. */
  skipped: number;
}

export class SimilarityRetriever {
  constructor(private readonly embedder: CachedEmbedder) {}

  async generate(
    references: readonly UncertainExample[],
    pool: readonly Candidate[],
    opts: GenerateOptions,
  ): Promise<Suggestion[]> {
    const result = await this.retrieve(references, pool, opts);
    return result.suggestions;
  }

  async retrieve(
    references: readonly UncertainExample[],
    pool: readonly Candidate[],
    opts: GenerateOptions,
  ): Promise<RetrievalResult> {
    const empty: RetrievalResult = { suggestions: [], eligible: 0, scored: 0, skipped: 0 };
    if (references.length === 0) {
      log.debug("no reference examples; nothing to generate");
      return empty;
    }

    const eligible = eligibleCandidates(pool, opts.isKnown);
    if (eligible.length === 0) {
      log.debug("no eligible candidates; nothing to generate");
      return empty;
    }

    let skipped = 0;
    const refVectors: number[][] = [];
    for (const example of references) {
      const vector = await this.embedder.tryEmbed(example.text);
      if (vector) {
        refVectors.push(vector);
      } else {
        skipped += 1;
      }
    }
    if (refVectors.length === 0) {
      log.warn("no reference example could be embedded; skipping cycle");
      return { ...empty, eligible: eligible.length, skipped };
    }

    const embedded: EmbeddedCandidate[] = [];
    for (const candidate of eligible) {
      const vector = await this.embedder.tryEmbed(candidate.phrase);
      if (vector) {
        embedded.push({ candidate, vector });
      } else {
        skipped += 1;
      }
    }

    const ranked = rankCandidates(embedded, refVectors, opts);
    const timestamp = (opts.now?.() ?? new Date()).toISOString();
    const suggestions = ranked.map(
      (r): Suggestion => ({
        phrase: r.candidate.phrase,
        source: r.candidate.source,
        similarity_score: r.score,
        suggested_by_engine: true,
        timestamp,
      }),
    );

    log.debug(
      `retrieval: refs=${refVectors.length} eligible=${eligible.length} scored=${embedded.length} kept=${suggestions.length} skipped=${skipped}`,
    );
    return { suggestions, eligible: eligible.length, scored: embedded.length, skipped };
  }
}

/** Drop known phrases and keep only the first occurrence of each normalized phrase. */
export function eligibleCandidates(
  pool: readonly Candidate[],
  isKnown?: (phrase: string) => boolean,
): Candidate[] {
  const seen = new Set<string>();
  const out: Candidate[] = [];
  for (const candidate of pool) {
    const key = normalizePhrase(candidate.phrase);
    if (key.length === 0 || seen.has(key)) continue;
    seen.add(key);
    if (isKnown?.(candidate.phrase)) continue;
    out.push(candidate);
  }
  return out;
}
