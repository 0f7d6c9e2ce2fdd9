import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Database as DatabaseType } from "better-sqlite3";
import { z } from "zod";
import { ScoreManager } from "../score-manager.js";
import { CompositeAggregator } from "../ensemble/aggregator.js";
import { ResponseCache, ViewCache } from "../cache.js";
import { ProgressTracker } from "../progress.js";
import { PersistenceError, isScoringError, type PersistenceStep } from "../errors.js";
import { ArticleRepository, SqliteScoreStore, openDatabase } from "../../db/database.js";
import type { EnsembleMetadata } from "../ensemble/types.js";
import type {
  CompositeConfig,
  ExecuteResult,
  ModelScore,
  ScoreStore,
  StoreTransaction,
} from "../types.js";

const LEFT = "acme/left";
const CENTER = "acme/center";
const RIGHT = "acme/right";

const cfg: CompositeConfig = {
  formula: "average",
  weights: {},
  minScore: -1,
  maxScore: 1,
  defaultMissing: 0,
  handleInvalid: "default",
  confidenceMethod: "count_valid",
  minConfidence: 0,
  maxConfidence: 1,
  models: [
    { modelName: LEFT, perspective: "left" },
    { modelName: CENTER, perspective: "center" },
    { modelName: RIGHT, perspective: "right" },
  ],
};

function score(articleId: number, model: string, value: number, confidence = 0.9): ModelScore {
  return {
    articleId,
    model,
    score: value,
    metadata: JSON.stringify({ confidence }),
    createdAt: new Date("2026-02-01T00:00:00Z"),
  };
}

const threeScores = (articleId: number) => [
  score(articleId, LEFT, -0.6),
  score(articleId, CENTER, 0.3),
  score(articleId, RIGHT, 0.6),
];

async function catchError(p: Promise<unknown>): Promise<unknown> {
  try {
    await p;
  } catch (e) {
    return e;
  }
  throw new Error("expected promise to reject");
}

/** Store stand-in that records calls and fails at a chosen step. */
class FakeStore implements ScoreStore {
  events: string[] = [];

  constructor(
    private readonly failAt: PersistenceStep | null = null,
    private readonly updateChanges = 1,
    private readonly delayMs = 0,
  ) {}

  async begin(): Promise<StoreTransaction> {
    this.events.push("begin");
    if (this.failAt === "begin") throw new Error("database is locked");
    const events = this.events;
    const { failAt, updateChanges, delayMs } = this;
    return {
      async execute(sql: string): Promise<ExecuteResult> {
        const kind = sql.startsWith("INSERT") ? "insert" : "update";
        events.push(kind);
        if (delayMs > 0) await new Promise((r) => setTimeout(r, delayMs));
        if (failAt === kind) throw new Error(`${kind} exploded`);
        return { changes: kind === "update" ? updateChanges : 1 };
      },
      async commit(): Promise<void> {
        events.push("commit");
        if (failAt === "commit") throw new Error("disk I/O error");
      },
      async rollback(): Promise<void> {
        events.push("rollback");
      },
    };
  }
}

const ArticleScoreRow = z.object({
  composite_score: z.number().nullable(),
  confidence: z.number().nullable(),
  score_source: z.string().nullable(),
});

describe("ScoreManager with SQLite", () => {
  let db: DatabaseType;
  let store: SqliteScoreStore;
  let articles: ArticleRepository;
  let progress: ProgressTracker;
  let responseCache: ResponseCache;
  let views: ViewCache<unknown>;
  let manager: ScoreManager;

  beforeEach(() => {
    db = openDatabase(":memory:");
    store = new SqliteScoreStore(db);
    articles = new ArticleRepository(store);
    progress = new ProgressTracker();
    responseCache = new ResponseCache();
    views = new ViewCache<unknown>(60_000);
    manager = new ScoreManager({
      store,
      calculator: new CompositeAggregator(),
      progress,
      responseCache,
      views,
      now: () => new Date("2026-02-02T10:00:00Z"),
    });
  });

  afterEach(() => {
    db.close();
  });

  function articleRow(id: number) {
    return ArticleScoreRow.parse(
      db.prepare("SELECT composite_score, confidence, score_source FROM articles WHERE id = ?").get(id),
    );
  }

  it("stores the ensemble row, updates the article and reports success", async () => {
    const id = await articles.insertArticle({ title: "Budget vote", content: "Body" });

    const result = await manager.updateArticleScore(id, threeScores(id), cfg);

    expect(result.score).toBeCloseTo(0.1, 10);
    expect(result.confidence).toBe(1);

    const row = articleRow(id);
    expect(row.composite_score).toBeCloseTo(0.1, 10);
    expect(row.confidence).toBe(1);
    expect(row.score_source).toBe("llm");

    const stored = await articles.fetchModelScores(id);
    expect(stored).toHaveLength(1);
    expect(stored[0].model).toBe("ensemble");
    expect(stored[0].createdAt.toISOString()).toBe("2026-02-02T10:00:00.000Z");
    const meta = JSON.parse(stored[0].metadata);
    expect(meta.confidence).toBe(1);
    expect(meta.final_aggregation.formula).toBe("average");
    expect(meta.final_aggregation.weighted_mean).toBeCloseTo(0.1, 10);
    expect(meta.final_aggregation.ensemble).toBeNull();
    expect(meta.timestamp).toBe("2026-02-02T10:00:00.000Z");

    expect(progress.getProgress(id)).toMatchObject({
      step: "Complete",
      percent: 100,
      status: "Success",
      finalScore: result.score,
    });
    expect(manager.getProgress(id)?.status).toBe("Success");
  });

  it("carries ensemble sub-results into the stored metadata", async () => {
    const id = await articles.insertArticle({ content: "Body" });
    const ensembleMetadata: EnsembleMetadata = {
      confidence: 0.9,
      all_sub_results: [
        { model: LEFT, prompt_variant: "default", score: -0.6, explanation: "x", confidence: 0.9, raw_response: "{}" },
      ],
      per_model_results: {},
      per_model_aggregation: {
        [LEFT]: { mean: -0.6, weighted_mean: -0.6, variance: 0, count: 1, sum_confidence: 0.9 },
      },
      final_aggregation: { weighted_mean: -0.6, variance: 0, uncertainty_flag: false, total_weight: 0.9 },
      timestamp: "2026-02-02T09:59:00.000Z",
    };

    await manager.updateArticleScore(id, threeScores(id), cfg, { ensembleMetadata });

    const [row] = await articles.fetchModelScores(id);
    const meta = JSON.parse(row.metadata);
    expect(meta.all_sub_results).toHaveLength(1);
    expect(meta.per_model_aggregation[LEFT].sum_confidence).toBe(0.9);
    expect(meta.final_aggregation.ensemble.total_weight).toBe(0.9);
  });

  it("invalidates cached views and provider responses after commit", async () => {
    const id = await articles.insertArticle({ content: "Body" });
    views.set(`article:${id}`, {});
    views.set(`ensemble:${id}`, {});
    views.set(`bias:${id}`, {});
    views.set("bias:999", {});
    responseCache.set("hash-1", LEFT, score(id, LEFT, -0.6));
    responseCache.set("hash-2", LEFT, score(id, LEFT, -0.6));

    await manager.updateArticleScore(id, threeScores(id), cfg, { contentHash: "hash-1" });

    expect(views.get(`article:${id}`)).toBeUndefined();
    expect(views.get(`ensemble:${id}`)).toBeUndefined();
    expect(views.get(`bias:${id}`)).toBeUndefined();
    expect(views.get("bias:999")).toBeDefined();
    expect(responseCache.get("hash-1", LEFT)).toBeUndefined();
    expect(responseCache.get("hash-2", LEFT)).toBeDefined();
  });

  it("rolls back when the article row does not exist", async () => {
    views.set("bias:404", {});

    const err = await catchError(manager.updateArticleScore(404, threeScores(404), cfg));

    expect(err).toBeInstanceOf(PersistenceError);
    expect(err instanceof PersistenceError && err.step).toBe("insert");
    expect(err instanceof Error && err.message).toBe("insert failed: FOREIGN KEY constraint failed");
    expect(db.prepare("SELECT COUNT(*) AS n FROM llm_scores").pluck().get()).toBe(0);
    expect(views.get("bias:404")).toBeDefined();
    expect(progress.getProgress(404)).toMatchObject({ step: "Storing", percent: 60, status: "Error" });
  });

  it("replaces the article's model rows in the same transaction", async () => {
    const id = await articles.insertArticle({ content: "Body" });
    await manager.updateArticleScore(id, threeScores(id), cfg, { replaceModelScores: true });
    const fresh = [score(id, LEFT, -0.2), score(id, CENTER, 0.1), score(id, RIGHT, 0.4)];

    await manager.updateArticleScore(id, fresh, cfg, { replaceModelScores: true });

    const stored = await articles.fetchModelScores(id);
    expect(stored.map((s) => [s.model, s.score])).toEqual([
      [LEFT, -0.2],
      [CENTER, 0.1],
      [RIGHT, 0.4],
      ["ensemble", expect.closeTo(0.1, 10)],
    ]);
  });

  it("keeps earlier model rows when aggregation fails", async () => {
    const id = await articles.insertArticle({ content: "Body" });
    await manager.updateArticleScore(id, threeScores(id), cfg, { replaceModelScores: true });

    const err = await catchError(
      manager.updateArticleScore(id, [score(id, LEFT, 0), score(id, RIGHT, 0)], cfg, { replaceModelScores: true }),
    );

    expect(isScoringError(err, "AllPerspectivesInvalid")).toBe(true);
    expect((await articles.fetchModelScores(id)).map((s) => s.model)).toEqual([LEFT, CENTER, RIGHT, "ensemble"]);
  });

  it("rolls back when cancelled inside the transaction", async () => {
    const id = await articles.insertArticle({ content: "Body" });
    const controller = new AbortController();
    const aborting: ScoreStore = {
      begin: async () => {
        const tx = await store.begin();
        return {
          execute: async (sql, params) => {
            const res = await tx.execute(sql, params);
            controller.abort();
            return res;
          },
          commit: () => tx.commit(),
          rollback: () => tx.rollback(),
        };
      },
    };
    const cancelling = new ScoreManager({ store: aborting, calculator: new CompositeAggregator(), progress });

    const err = await catchError(
      cancelling.updateArticleScore(id, threeScores(id), cfg, { signal: controller.signal, replaceModelScores: true }),
    );

    expect(isScoringError(err, "Cancelled")).toBe(true);
    expect(articleRow(id).composite_score).toBeNull();
    expect(await articles.fetchModelScores(id)).toEqual([]);
    expect(progress.getProgress(id)).toMatchObject({ step: "Storing", status: "Error", error: "operation cancelled" });
  });
});

describe("ScoreManager failure handling", () => {
  let progress: ProgressTracker;

  beforeEach(() => {
    progress = new ProgressTracker();
  });

  function managerWith(store: ScoreStore, views?: ViewCache<unknown>) {
    return new ScoreManager({ store, calculator: new CompositeAggregator(), progress, views });
  }

  it("rejects missing dependencies", async () => {
    const store = new FakeStore();
    const noCalculator = new ScoreManager({ store, calculator: null, progress });
    const noStore = new ScoreManager({ store: null, calculator: new CompositeAggregator(), progress });

    expect(isScoringError(await catchError(noCalculator.updateArticleScore(1, threeScores(1), cfg)), "InvalidConfig")).toBe(true);
    expect(isScoringError(await catchError(noStore.updateArticleScore(1, threeScores(1), cfg)), "InvalidConfig")).toBe(true);
    expect(isScoringError(await catchError(managerWith(store).updateArticleScore(1, threeScores(1), null)), "InvalidConfig")).toBe(true);
    expect(store.events).toEqual([]);
    expect(progress.getProgress(1)).toBeUndefined();
  });

  it("reports zero confidence without opening a transaction", async () => {
    const store = new FakeStore();
    const scores = [score(1, LEFT, -0.6, 0), score(1, RIGHT, 0.6, 0)];

    const err = await catchError(managerWith(store).updateArticleScore(1, scores, cfg));

    expect(isScoringError(err, "AllScoresZeroConfidence")).toBe(true);
    expect(store.events).toEqual([]);
    expect(progress.getProgress(1)).toMatchObject({
      step: "Calculating",
      percent: 20,
      status: "Error",
      error: "all scores have zero confidence",
    });
  });

  it("reports invalid perspectives without touching storage", async () => {
    const store = new FakeStore();
    const scores = [score(1, LEFT, 0), score(1, RIGHT, 0)];

    const err = await catchError(managerWith(store).updateArticleScore(1, scores, cfg));

    expect(isScoringError(err, "AllPerspectivesInvalid")).toBe(true);
    expect(store.events).toEqual([]);
    expect(progress.getProgress(1)?.status).toBe("Error");
  });

  it.each([
    { failAt: "begin", events: ["begin"], step: "Storing", percent: 60, message: "begin failed: database is locked" },
    { failAt: "insert", events: ["begin", "insert", "rollback"], step: "Storing", percent: 60, message: "insert failed: insert exploded" },
    { failAt: "update", events: ["begin", "insert", "update", "rollback"], step: "Updating", percent: 80, message: "update failed: update exploded" },
    { failAt: "commit", events: ["begin", "insert", "update", "commit", "rollback"], step: "Updating", percent: 80, message: "commit failed: disk I/O error" },
  ] as const)("reports a $failAt failure and rolls back", async ({ failAt, events, step, percent, message }) => {
    const store = new FakeStore(failAt);
    const views = new ViewCache<unknown>(60_000);
    views.set("bias:1", {});

    const err = await catchError(managerWith(store, views).updateArticleScore(1, threeScores(1), cfg));

    expect(err).toBeInstanceOf(PersistenceError);
    expect(err instanceof PersistenceError && err.step).toBe(failAt);
    expect(store.events).toEqual(events);
    expect(views.get("bias:1")).toBeDefined();
    expect(progress.getProgress(1)).toMatchObject({ step, percent, status: "Error", error: message });
  });

  it("treats an update that touches no rows as an update failure", async () => {
    const store = new FakeStore(null, 0);

    const err = await catchError(managerWith(store).updateArticleScore(9, threeScores(9), cfg));

    expect(err instanceof PersistenceError && err.step).toBe("update");
    expect(err instanceof Error && err.message).toBe("update failed: article 9 not found");
    expect(store.events).toEqual(["begin", "insert", "update", "rollback"]);
  });

  it("does nothing once cancelled before starting", async () => {
    const store = new FakeStore();
    const controller = new AbortController();
    controller.abort();

    const err = await catchError(
      managerWith(store).updateArticleScore(1, threeScores(1), cfg, { signal: controller.signal }),
    );

    expect(isScoringError(err, "Cancelled")).toBe(true);
    expect(store.events).toEqual([]);
    expect(progress.getProgress(1)).toMatchObject({ step: "Start", status: "Error" });
  });

  it("serialises concurrent updates of one article", async () => {
    const store = new FakeStore(null, 1, 5);
    const manager = managerWith(store);

    await Promise.all([
      manager.updateArticleScore(1, threeScores(1), cfg),
      manager.updateArticleScore(1, threeScores(1), cfg),
    ]);

    expect(store.events).toEqual(["begin", "insert", "update", "commit", "begin", "insert", "update", "commit"]);
    expect(progress.getProgress(1)?.status).toBe("Success");
  });
});
