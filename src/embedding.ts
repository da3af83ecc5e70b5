import OpenAI from "openai";
import { log } from "./logger.js";
import { EmbeddingProviderError, EmptyInputError, describeError } from "./errors.js";
import type { CuratorConfig, EmbeddingProviderType } from "./types.js";

export interface EmbeddingProvider {
  /** Human-readable provider/model tag, used in logs. */
  readonly id: string;
  embed(text: string): Promise<number[]>;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;

  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly maxChars: number,
    type: EmbeddingProviderType,
  ) {
    this.id = `${type}:${model}`;
  }

  async embed(text: string): Promise<number[]> {
    let vector: number[] | undefined;
    try {
      const res = await this.client.embeddings.create({
        model: this.model,
        input: text.slice(0, this.maxChars),
      });
      vector = res.data[0]?.embedding;
    } catch (err) {
      throw new EmbeddingProviderError(`${this.id} request failed: ${describeError(err)}`, { cause: err });
    }
    if (!Array.isArray(vector) || vector.length === 0) {
      throw new EmbeddingProviderError(`${this.id} returned no embedding`);
    }
    return vector;
  }
}

/**
 * Pick the embedding backend from config. `auto` prefers OpenAI and falls
 * back to a local OpenAI-compatible server. Returns null when neither is
 * configured; callers treat that as "no suggestions this run".
 */
export function resolveEmbeddingProvider(config: CuratorConfig): EmbeddingProvider | null {
  const preferred = config.embeddingProvider;
  const providers: EmbeddingProviderType[] = preferred === "auto" ? ["openai", "local"] : [preferred];

  for (const p of providers) {
    if (p === "openai" && config.openaiApiKey) {
      // Failed embeddings are skipped per item, never retried.
      const client = new OpenAI({
        apiKey: config.openaiApiKey,
        maxRetries: 0,
        ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
      });
      return new OpenAiEmbeddingProvider(client, config.embeddingModel, config.embeddingMaxChars, "openai");
    }

    if (p === "local" && config.localEmbeddingUrl) {
      const base = config.localEmbeddingUrl.replace(/\/$/, "");
      const client = new OpenAI({
        apiKey: config.localEmbeddingApiKey ?? "local",
        baseURL: /\/v1$/i.test(base) ? base : `${base}/v1`,
        maxRetries: 0,
      });
      return new OpenAiEmbeddingProvider(client, config.embeddingModel, config.embeddingMaxChars, "local");
    }
  }

  return null;
}

/**
 * Memoizing front for an {@link EmbeddingProvider}. One instance spans a
 * generation cycle; {@link clear} drops the cache between cycles. Every
 * vector it hands out has the same dimension as the first one it saw.
 */
export class CachedEmbedder {
  private readonly cache = new Map<string, number[] | null>();
  private dimension: number | null = null;
  private providerCalls = 0;

  constructor(private readonly provider: EmbeddingProvider) {}

  get calls(): number {
    return this.providerCalls;
  }

  get expectedDimension(): number | null {
    return this.dimension;
  }

  async embed(text: string): Promise<number[]> {
    const key = text.trim();
    if (key.length === 0) throw new EmptyInputError();

    if (this.cache.has(key)) {
      const hit = this.cache.get(key);
      if (hit) return hit;
      throw new EmbeddingProviderError(`embedding already failed this cycle: "${key}"`);
    }

    this.providerCalls += 1;
    try {
      const vector = await this.provider.embed(key);
      this.validate(vector);
      this.cache.set(key, vector);
      return vector;
    } catch (err) {
      this.cache.set(key, null);
      if (err instanceof EmbeddingProviderError) throw err;
      throw new EmbeddingProviderError(`${this.provider.id}: ${describeError(err)}`, { cause: err });
    }
  }

  /** Best-effort variant: logs and returns null instead of throwing. */
  async tryEmbed(text: string): Promise<number[] | null> {
    try {
      return await this.embed(text);
    } catch (err) {
      if (err instanceof EmptyInputError) {
        log.debug("skipping empty text");
      } else {
        log.warn(`embedding skipped: ${describeError(err)}`);
      }
      return null;
    }
  }

  clear(): void {
    this.cache.clear();
  }

  private validate(vector: number[]): void {
    if (vector.length === 0 || !vector.every((n) => Number.isFinite(n))) {
      throw new EmbeddingProviderError(`${this.provider.id} returned a non-numeric vector`);
    }
    if (this.dimension === null) {
      this.dimension = vector.length;
    } else if (vector.length !== this.dimension) {
      throw new EmbeddingProviderError(
        `${this.provider.id} returned dimension ${vector.length}, expected ${this.dimension}`,
      );
    }
  }
}
