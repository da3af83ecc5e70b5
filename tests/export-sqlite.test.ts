import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { exportSqlite, SQLITE_SCHEMA_VERSION } from "../src/export-sqlite.js";
import type { ExportSqliteInput } from "../src/export-sqlite.js";
import { FIXED_NOW, fixedClock } from "./helpers.js";

const input: ExportSqliteInput = {
  labels: [
    { text: "Jakub Kowalski", label: "MAYBE", source: "title" },
    { text: "Marek Wiśniewski", label: "HOST", source: "description" },
  ],
  suggestions: [
    {
      phrase: "Jakub Kowalski energetyka",
      source: "title",
      similarity_score: 0.8,
      suggested_by_engine: true,
      timestamp: "2026-02-20T10:00:00.000Z",
    },
    {
      phrase: "Tomasz Nowicki (gość)",
      source: "description",
      similarity_score: 0.7,
      suggested_by_engine: true,
      timestamp: "2026-02-20T10:00:00.000Z",
    },
  ],
  examples: [{ text: "Jakub Kowalski", source: "title", label: "M", timestamp: "2026-02-19T09:00:00.000Z" }],
  consumption: (phrase) =>
    phrase === "Jakub Kowalski energetyka"
      ? { phrase, label: "GUEST", consumedAt: "2026-02-21T08:00:00.000Z" }
      : undefined,
};

test("exportSqlite writes meta, labels, suggestions and examples", async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "phrase-curator-sqlite-"));
  try {
    const outFile = path.join(dir, "out.sqlite");
    const counts = exportSqlite(input, { outFile, appVersion: "9.9.9", now: fixedClock });
    assert.deepEqual(counts, { labels: 2, suggestions: 2, examples: 1 });

    const db = new Database(outFile, { readonly: true });
    try {
      assert.deepEqual(db.prepare("SELECT key, value FROM meta ORDER BY key").all(), [
        { key: "appVersion", value: "9.9.9" },
        { key: "createdAt", value: FIXED_NOW.toISOString() },
        { key: "schemaVersion", value: String(SQLITE_SCHEMA_VERSION) },
      ]);
      assert.deepEqual(db.prepare("SELECT text, label, source FROM labels ORDER BY id").all(), input.labels);
      assert.deepEqual(
        db.prepare("SELECT phrase, similarity_score, consumed_label, consumed_at FROM suggestions ORDER BY phrase").all(),
        [
          {
            phrase: "Jakub Kowalski energetyka",
            similarity_score: 0.8,
            consumed_label: "GUEST",
            consumed_at: "2026-02-21T08:00:00.000Z",
          },
          { phrase: "Tomasz Nowicki (gość)", similarity_score: 0.7, consumed_label: null, consumed_at: null },
        ],
      );
      assert.deepEqual(db.prepare("SELECT text, source, created_at FROM uncertain_examples").all(), [
        { text: "Jakub Kowalski", source: "title", created_at: "2026-02-19T09:00:00.000Z" },
      ]);
    } finally {
      db.close();
    }
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("exporting again into the same file replaces the rows", async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "phrase-curator-sqlite-"));
  try {
    const outFile = path.join(dir, "out.sqlite");
    exportSqlite(input, { outFile, appVersion: "1.0.0" });
    exportSqlite({ ...input, labels: input.labels.slice(0, 1) }, { outFile, appVersion: "1.0.1" });

    const db = new Database(outFile, { readonly: true });
    try {
      assert.deepEqual(db.prepare("SELECT COUNT(*) AS n FROM labels").get(), { n: 1 });
      assert.deepEqual(db.prepare("SELECT COUNT(*) AS n FROM suggestions").get(), { n: 2 });
      assert.deepEqual(db.prepare("SELECT value FROM meta WHERE key = 'appVersion'").get(), { value: "1.0.1" });
    } finally {
      db.close();
    }
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
