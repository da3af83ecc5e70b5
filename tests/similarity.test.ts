import test from "node:test";
import assert from "node:assert/strict";
import { CachedEmbedder } from "../src/embedding.js";
import { cosineSimilarity, eligibleCandidates, maxSimilarity, rankCandidates, SimilarityRetriever } from "../src/similarity.js";
import type { Candidate, UncertainExample } from "../src/types.js";
import { captureLogs, FakeEmbeddingProvider, FIXED_NOW, fixedClock } from "./helpers.js";

captureLogs();

function example(text: string): UncertainExample {
  return { text, source: "title", label: "M", timestamp: "2026-03-01T00:00:00.000Z" };
}

test("cosineSimilarity is 1 for a vector with itself and symmetric", () => {
  const vectors = [
    [1, 2, 3],
    [-0.5, 0.25, 4],
    [0.001, -7, 2],
  ];
  for (const a of vectors) {
    assert.ok(Math.abs(cosineSimilarity(a, a) - 1) < 1e-12);
    for (const b of vectors) {
      assert.equal(cosineSimilarity(a, b), cosineSimilarity(b, a));
      const s = cosineSimilarity(a, b);
      assert.ok(s >= -1 && s <= 1);
    }
  }
  assert.equal(cosineSimilarity([1, 0], [-1, 0]), -1);
});

test("cosineSimilarity is 0 for zero-norm, empty, or mismatched vectors", () => {
  assert.equal(cosineSimilarity([0, 0], [1, 2]), 0);
  assert.equal(cosineSimilarity([], []), 0);
  assert.equal(cosineSimilarity([1, 2, 3], [1, 2]), 0);
});

test("maxSimilarity takes the best reference and is null without references", () => {
  assert.equal(maxSimilarity([3, 4], [[0, 1], [1, 0]]), 0.8);
  assert.equal(maxSimilarity([3, 4], []), null);
});

test("rankCandidates keeps a score equal to the threshold and drops one just under it", () => {
  const items = [{ candidate: { phrase: "Adam Mickiewicz", source: "title" }, vector: [3, 4] }];
  const refs = [[1, 0]];

  const kept = rankCandidates(items, refs, { threshold: 0.6, topK: 8 });
  assert.equal(kept.length, 1);
  assert.equal(kept[0]?.score, 0.6);

  const dropped = rankCandidates(items, refs, { threshold: 0.6 + Number.EPSILON, topK: 8 });
  assert.deepEqual(dropped, []);
});

test("rankCandidates breaks score ties by pool order", () => {
  const items = [
    { candidate: { phrase: "first", source: "title" }, vector: [2, 0] },
    { candidate: { phrase: "weaker", source: "title" }, vector: [4, 3] },
    { candidate: { phrase: "second", source: "title" }, vector: [5, 0] },
  ];
  const ranked = rankCandidates(items, [[1, 0]], { threshold: 0, topK: 8 });
  assert.deepEqual(
    ranked.map((r) => r.candidate.phrase),
    ["first", "second", "weaker"],
  );
});

test("rankCandidates returns exactly the topK highest scores", () => {
  // score for [1, k] against [1, 0] falls as k grows
  const ks = [3, 0, 4, 1, 2];
  const items = ks.map((k) => ({ candidate: { phrase: `k${k}`, source: "title" }, vector: [1, k] }));
  const ranked = rankCandidates(items, [[1, 0]], { threshold: -1, topK: 3 });
  assert.deepEqual(
    ranked.map((r) => r.candidate.phrase),
    ["k0", "k1", "k2"],
  );
});

test("rankCandidates scores each candidate by its closest reference", () => {
  const items = [{ candidate: { phrase: "Maria Wójcik", source: "description" }, vector: [0, 1] }];
  const ranked = rankCandidates(items, [[1, 0], [0, 2]], { threshold: 0.9, topK: 8 });
  assert.equal(ranked.length, 1);
  assert.equal(ranked[0]?.score, 1);
});

test("generate: strong match is suggested and the weak one excluded", async () => {
  const provider = new FakeEmbeddingProvider({
    "Jakub Kowalski": [1, 0],
    "Jakub Kowalski energetyka": [0.87, Math.sqrt(1 - 0.87 * 0.87)],
    "Anna Nowak": [0.2, Math.sqrt(1 - 0.2 * 0.2)],
  });
  const retriever = new SimilarityRetriever(new CachedEmbedder(provider));
  const pool: Candidate[] = [
    { phrase: "Jakub Kowalski energetyka", source: "title" },
    { phrase: "Anna Nowak", source: "description" },
  ];

  const out = await retriever.generate([example("Jakub Kowalski")], pool, {
    threshold: 0.6,
    topK: 8,
    now: fixedClock,
  });

  assert.equal(out.length, 1);
  const [s] = out;
  assert.ok(s);
  assert.equal(s.phrase, "Jakub Kowalski energetyka");
  assert.equal(s.source, "title");
  assert.ok(Math.abs(s.similarity_score - 0.87) < 1e-9);
  assert.equal(s.suggested_by_engine, true);
  assert.equal(s.timestamp, FIXED_NOW.toISOString());
});

test("generate with no references returns nothing and embeds nothing", async () => {
  const provider = new FakeEmbeddingProvider({ "Anna Nowak": [1, 0] });
  const retriever = new SimilarityRetriever(new CachedEmbedder(provider));
  const out = await retriever.generate([], [{ phrase: "Anna Nowak", source: "title" }], { threshold: 0.6, topK: 8 });
  assert.deepEqual(out, []);
  assert.deepEqual(provider.requests, []);
});

test("generate with every candidate under the threshold is an empty success", async () => {
  const provider = new FakeEmbeddingProvider({ ref: [1, 0], far: [0, 1] });
  const retriever = new SimilarityRetriever(new CachedEmbedder(provider));
  const out = await retriever.generate([example("ref")], [{ phrase: "far", source: "title" }], {
    threshold: 0.6,
    topK: 8,
  });
  assert.deepEqual(out, []);
});

test("generate never returns a known phrase", async () => {
  const provider = new FakeEmbeddingProvider({
    "Jan Kowal": [1, 0],
    "Jan Kowal podcast": [1, 0.1],
    "Jan Kowal wywiad": [1, 0.2],
  });
  const retriever = new SimilarityRetriever(new CachedEmbedder(provider));
  const known = new Set(["jan kowal podcast"]);
  const isKnown = (p: string) => known.has(p.trim().toLowerCase());

  const out = await retriever.generate(
    [example("Jan Kowal")],
    [
      { phrase: "Jan Kowal podcast", source: "title" },
      { phrase: "Jan Kowal wywiad", source: "title" },
    ],
    { threshold: 0.6, topK: 8, isKnown },
  );

  assert.deepEqual(
    out.map((s) => s.phrase),
    ["Jan Kowal wywiad"],
  );
  for (const s of out) assert.equal(isKnown(s.phrase), false);
  assert.equal(provider.requests.includes("Jan Kowal podcast"), false);
});

test("generate is deterministic for identical inputs", async () => {
  const provider = new FakeEmbeddingProvider({
    a: [1, 0, 0],
    b: [0, 1, 0],
    c1: [0.9, 0.1, 0],
    c2: [0.1, 0.9, 0.1],
    c3: [0.7, 0.7, 0],
    c4: [0, 0, 1],
  });
  const retriever = new SimilarityRetriever(new CachedEmbedder(provider));
  const refs = [example("a"), example("b")];
  const pool = ["c1", "c2", "c3", "c4"].map((phrase) => ({ phrase, source: "tags" }));
  const opts = { threshold: 0.5, topK: 3, now: fixedClock };

  const first = await retriever.generate(refs, pool, opts);
  const second = await retriever.generate(refs, pool, opts);
  assert.equal(JSON.stringify(second), JSON.stringify(first));
  assert.deepEqual(
    first.map((s) => s.phrase),
    ["c1", "c2", "c3"],
  );
});

test("retrieve skips items that fail to embed and scores the rest", async () => {
  const provider = new FakeEmbeddingProvider({
    "Jan Nowak": [1, 0],
    "Jan Nowak gość": [1, 0.05],
  });
  const retriever = new SimilarityRetriever(new CachedEmbedder(provider));

  const result = await retriever.retrieve(
    [example("Jan Nowak"), example("bez wektora")],
    [
      { phrase: "Jan Nowak gość", source: "title" },
      { phrase: "też bez wektora", source: "title" },
    ],
    { threshold: 0.6, topK: 8 },
  );

  assert.equal(result.skipped, 2);
  assert.equal(result.eligible, 2);
  assert.equal(result.scored, 1);
  assert.deepEqual(
    result.suggestions.map((s) => s.phrase),
    ["Jan Nowak gość"],
  );
});

test("eligibleCandidates keeps the first spelling of a repeated phrase", () => {
  const out = eligibleCandidates([
    { phrase: "Jan Nowak", source: "title" },
    { phrase: "  jan   NOWAK ", source: "description" },
    { phrase: "Ewa Lis", source: "tags" },
  ]);
  assert.deepEqual(out, [
    { phrase: "Jan Nowak", source: "title" },
    { phrase: "Ewa Lis", source: "tags" },
  ]);
});
