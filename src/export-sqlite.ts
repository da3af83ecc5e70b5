import path from "node:path";
import Database from "better-sqlite3";
import type { LabelRecord, Suggestion, UncertainExample, ConsumptionMark } from "./types.js";

export const SQLITE_SCHEMA_VERSION = 1 as const;

export const SQLITE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS labels (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  text TEXT NOT NULL,
  label TEXT NOT NULL,
  source TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS suggestions (
  phrase TEXT PRIMARY KEY,
  source TEXT NOT NULL,
  similarity_score REAL NOT NULL,
  created_at TEXT NOT NULL,
  consumed_label TEXT,
  consumed_at TEXT
);

CREATE TABLE IF NOT EXISTS uncertain_examples (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  text TEXT NOT NULL,
  source TEXT NOT NULL,
  created_at TEXT NOT NULL
);
`;

export interface ExportSqliteInput {
  labels: readonly LabelRecord[];
  suggestions: readonly Suggestion[];
  examples: readonly UncertainExample[];
  consumption: (phrase: string) => ConsumptionMark | undefined;
}

export interface ExportSqliteOptions {
  outFile: string;
  appVersion: string;
  now?: () => Date;
}

/**
 * Snapshot the curation data into a SQLite file for the trainer. Tables are
 * cleared first, so re-exporting into the same file replaces its contents.
 */
export function exportSqlite(input: ExportSqliteInput, opts: ExportSqliteOptions): { labels: number; suggestions: number; examples: number } {
  const db = new Database(path.resolve(opts.outFile));
  try {
    db.exec("PRAGMA journal_mode=WAL;");
    db.exec(SQLITE_TABLES_SQL);

    const insertMeta = db.prepare("INSERT OR REPLACE INTO meta(key,value) VALUES (?,?)");
    const insertLabel = db.prepare("INSERT INTO labels(text, label, source) VALUES (?,?,?)");
    const insertSuggestion = db.prepare(
      "INSERT OR REPLACE INTO suggestions(phrase, source, similarity_score, created_at, consumed_label, consumed_at) VALUES (?,?,?,?,?,?)",
    );
    const insertExample = db.prepare("INSERT INTO uncertain_examples(text, source, created_at) VALUES (?,?,?)");

    const tx = db.transaction(() => {
      db.exec("DELETE FROM labels; DELETE FROM suggestions; DELETE FROM uncertain_examples;");
      insertMeta.run("schemaVersion", String(SQLITE_SCHEMA_VERSION));
      insertMeta.run("createdAt", (opts.now?.() ?? new Date()).toISOString());
      insertMeta.run("appVersion", opts.appVersion);

      for (const r of input.labels) insertLabel.run(r.text, r.label, r.source);
      for (const s of input.suggestions) {
        const mark = input.consumption(s.phrase);
        insertSuggestion.run(
          s.phrase,
          s.source,
          s.similarity_score,
          s.timestamp,
          mark?.label ?? null,
          mark?.consumedAt ?? null,
        );
      }
      for (const ex of input.examples) insertExample.run(ex.text, ex.source, ex.timestamp);
    });
    tx();

    return {
      labels: input.labels.length,
      suggestions: input.suggestions.length,
      examples: input.examples.length,
    };
  } finally {
    db.close();
  }
}
