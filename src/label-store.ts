import { log } from "./logger.js";
import { normalizePhrase } from "./normalize.js";
import { LabelRecordSchema, parseRecords } from "./schemas.js";
import type { StateBackend } from "./json-state.js";
import type { Label, LabelRecord } from "./types.js";

export const LABELS_KEY = "labels.json";

export type LabelCounts = Record<Label, number>;

function emptyCounts(): LabelCounts {
  return { GUEST: 0, HOST: 0, OTHER: 0, MAYBE: 0 };
}

/** Human labels, the training data the recognizer is built from. */
export class LabelStore {
  private records: LabelRecord[] = [];
  private readonly index = new Set<string>();
  private dirty = false;

  constructor(private readonly backend: StateBackend) {}

  async load(): Promise<void> {
    this.records = parseRecords(
      LabelRecordSchema,
      await this.backend.read(LABELS_KEY),
      this.backend.describe(LABELS_KEY),
    );
    this.index.clear();
    for (const r of this.records) this.index.add(normalizePhrase(r.text));
    this.dirty = false;
    log.debug(`label store loaded: ${this.records.length} labels`);
  }

  get size(): number {
    return this.records.length;
  }

  get hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  has(phrase: string): boolean {
    return this.index.has(normalizePhrase(phrase));
  }

  /** Held in memory until {@link save}. */
  add(record: LabelRecord): void {
    const text = record.text.trim();
    this.records.push({ text, label: record.label, source: record.source || "unknown" });
    this.index.add(normalizePhrase(text));
    this.dirty = true;
  }

  list(): LabelRecord[] {
    return [...this.records];
  }

  async save(): Promise<void> {
    await this.backend.write(LABELS_KEY, this.records);
    this.dirty = false;
  }

  counts(): { byLabel: LabelCounts; bySource: Record<string, LabelCounts> } {
    const byLabel = emptyCounts();
    const bySource: Record<string, LabelCounts> = {};
    for (const r of this.records) {
      byLabel[r.label] += 1;
      const forSource = bySource[r.source] ?? emptyCounts();
      forSource[r.label] += 1;
      bySource[r.source] = forSource;
    }
    return { byLabel, bySource };
  }
}
