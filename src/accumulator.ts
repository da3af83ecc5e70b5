import { z } from "zod";
import { log } from "./logger.js";
import { describeError } from "./errors.js";
import { parseRecords, UncertainExampleSchema } from "./schemas.js";
import type { StateBackend } from "./json-state.js";
import { UNCERTAIN_LABEL } from "./types.js";
import type { AccumulatorStats, RecordResult, UncertainExample } from "./types.js";

export const EXAMPLES_KEY = "uncertain_examples.json";
export const COUNTER_KEY = "state/accumulator.json";

const CounterStateSchema = z.object({ count: z.number().int().nonnegative() });

/**
 * Collects uncertain ("maybe") examples and decides when a generation cycle
 * is due. The counter only moves forward until {@link resetCounter}; the
 * example list is append-only.
 */
export class ExampleAccumulator {
  private examples: UncertainExample[] = [];
  private count = 0;

  constructor(
    private readonly backend: StateBackend,
    readonly triggerInterval: number,
    private readonly now: () => Date = () => new Date(),
  ) {
    if (!Number.isInteger(triggerInterval) || triggerInterval <= 0) {
      throw new RangeError(`triggerInterval must be a positive integer, got ${triggerInterval}`);
    }
  }

  /**
   * Load persisted examples and counter. A missing counter (data written
   * before counters were kept) resumes the cadence from the example count.
   */
  async load(): Promise<void> {
    this.examples = parseRecords(
      UncertainExampleSchema,
      await this.backend.read(EXAMPLES_KEY),
      this.backend.describe(EXAMPLES_KEY),
    );

    const rawCounter = await this.backend.read(COUNTER_KEY);
    const counter = CounterStateSchema.safeParse(rawCounter);
    if (counter.success) {
      this.count = counter.data.count;
    } else {
      if (rawCounter !== undefined) log.warn(`ignoring malformed ${this.backend.describe(COUNTER_KEY)}`);
      this.count = this.examples.length % this.triggerInterval;
    }
    log.debug(`accumulator loaded: ${this.examples.length} examples, counter=${this.count}`);
  }

  get counter(): number {
    return this.count;
  }

  /**
   * Append an uncertain example and report whether a generation cycle is due.
   * A failed write is returned as `warning`; the example stays recorded in
   * memory and is written with the next successful save. Blank text is not
   * recorded and does not move the counter.
   */
  async record(text: string, source: string): Promise<RecordResult> {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      const warning = "blank uncertain example ignored";
      log.warn(warning);
      return { example: null, trigger: false, count: this.count, warning };
    }

    const example: UncertainExample = {
      text: trimmed,
      source: source.trim() || "unknown",
      label: UNCERTAIN_LABEL,
      timestamp: this.now().toISOString(),
    };
    this.examples.push(example);
    this.count += 1;
    const trigger = this.count % this.triggerInterval === 0;
    if (trigger) log.info(`trigger: ${this.count} uncertain examples since last cycle`);

    const warning = await this.persist();
    return warning ? { example, trigger, count: this.count, warning } : { example, trigger, count: this.count };
  }

  /** Full history, not just the current cycle's slice. */
  allExamples(): UncertainExample[] {
    return [...this.examples];
  }

  /** Called after a generation cycle completes. Keeps all examples. */
  async resetCounter(): Promise<string | undefined> {
    this.count = 0;
    try {
      await this.backend.write(COUNTER_KEY, { count: this.count });
      return undefined;
    } catch (err) {
      const warning = `could not persist counter reset: ${describeError(err)}`;
      log.warn(warning);
      return warning;
    }
  }

  stats(): AccumulatorStats {
    const sources: Record<string, number> = {};
    for (const ex of this.examples) {
      sources[ex.source] = (sources[ex.source] ?? 0) + 1;
    }
    return {
      total: this.examples.length,
      count: this.count,
      sources,
      recent: this.examples.slice(-5).map((ex) => ex.text),
      nextTrigger: this.triggerInterval - (this.count % this.triggerInterval),
    };
  }

  private async persist(): Promise<string | undefined> {
    try {
      await this.backend.write(EXAMPLES_KEY, this.examples);
      await this.backend.write(COUNTER_KEY, { count: this.count });
      return undefined;
    } catch (err) {
      const warning = `uncertain example kept in memory only: ${describeError(err)}`;
      log.warn(warning);
      return warning;
    }
  }
}
