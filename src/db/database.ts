import Database, { type Database as DatabaseType } from "better-sqlite3";
import fs from "fs";
import path from "path";
import { z } from "zod";
import { ARTICLES_SCHEMA_SQL, LLM_SCORES_SCHEMA_SQL } from "./schema.js";
import type { ExecuteResult, ModelScore, ScoreStore, SqlParam, StoreTransaction } from "../scoring/types.js";
import { logDb } from "../logging.js";

/** Open (or create) the scores database and run the schema migration. */
export function openDatabase(dbPath: string): DatabaseType {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }
  const db = new Database(dbPath);

  // WAL: readers do not block the single writer
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  db.exec(ARTICLES_SCHEMA_SQL);
  db.exec(LLM_SCORES_SCHEMA_SQL);

  logDb.info({ path: dbPath }, "Database ready");
  return db;
}

// ── Transactions ─────────────────────────────────────────────────────────

/**
 * Relational store over one better-sqlite3 connection. A transaction holds
 * the connection until it commits or rolls back; other transactions and
 * reads queue behind it, so nothing outside sees its uncommitted rows.
 */
export class SqliteScoreStore implements ScoreStore {
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly db: DatabaseType) {}

  private acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => held);
    return previous.then(() => release);
  }

  async begin(): Promise<StoreTransaction> {
    const release = await this.acquire();
    try {
      this.db.exec("BEGIN IMMEDIATE");
    } catch (e: unknown) {
      release();
      throw e;
    }

    const db = this.db;
    let finished = false;
    const finish = (sql: "COMMIT" | "ROLLBACK"): void => {
      if (finished) {
        // Rolling back a transaction that already ended is a no-op
        if (sql === "ROLLBACK") return;
        throw new Error("transaction already finished, cannot COMMIT");
      }
      try {
        db.exec(sql);
      } finally {
        // A failed COMMIT leaves the transaction open; roll it back before handing the connection on
        if (db.inTransaction) db.exec("ROLLBACK");
        finished = true;
        release();
      }
    };

    return {
      async execute(sql: string, params: readonly SqlParam[] = []): Promise<ExecuteResult> {
        if (finished) throw new Error("transaction already finished");
        const info = db.prepare(sql).run(...params);
        return { changes: info.changes, lastInsertRowid: info.lastInsertRowid };
      },
      async commit(): Promise<void> {
        finish("COMMIT");
      },
      async rollback(): Promise<void> {
        finish("ROLLBACK");
      },
    };
  }

  /** Run a read once no transaction holds the connection. */
  async read<T>(fn: (db: DatabaseType) => T): Promise<T> {
    const release = await this.acquire();
    try {
      return fn(this.db);
    } finally {
      release();
    }
  }
}

// ── Articles & scores ────────────────────────────────────────────────────

const ArticleRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  content: z.string(),
  created_at: z.string(),
  composite_score: z.number().nullable(),
  confidence: z.number().nullable(),
  score_source: z.string().nullable(),
});

export type Article = z.infer<typeof ArticleRowSchema>;

const ScoreRowSchema = z.object({
  id: z.number().int(),
  article_id: z.number().int(),
  model: z.string(),
  score: z.number(),
  metadata: z.string(),
  created_at: z.string(),
});

function toModelScore(row: z.infer<typeof ScoreRowSchema>): ModelScore {
  return {
    id: row.id,
    articleId: row.article_id,
    model: row.model,
    score: row.score,
    metadata: row.metadata,
    createdAt: new Date(row.created_at),
  };
}

export class ArticleRepository {
  constructor(private readonly store: SqliteScoreStore) {}

  async getArticle(id: number): Promise<Article | null> {
    const row = await this.store.read((db) => db.prepare("SELECT * FROM articles WHERE id = ?").get(id));
    if (row === undefined) return null;
    return ArticleRowSchema.parse(row);
  }

  async fetchModelScores(articleId: number): Promise<ModelScore[]> {
    const rows = await this.store.read((db) =>
      db.prepare("SELECT * FROM llm_scores WHERE article_id = ? ORDER BY created_at, id").all(articleId),
    );
    return z.array(ScoreRowSchema).parse(rows).map(toModelScore);
  }

  async listUnscoredArticles(limit = 100): Promise<Article[]> {
    const rows = await this.store.read((db) =>
      db.prepare("SELECT * FROM articles WHERE composite_score IS NULL ORDER BY id LIMIT ?").all(limit),
    );
    return z.array(ArticleRowSchema).parse(rows);
  }

  async insertArticle(article: { title?: string; content: string }): Promise<number> {
    const tx = await this.store.begin();
    try {
      const info = await tx.execute("INSERT INTO articles (title, content) VALUES (?, ?)", [
        article.title ?? "",
        article.content,
      ]);
      await tx.commit();
      return Number(info.lastInsertRowid);
    } catch (e: unknown) {
      await tx.rollback();
      throw e;
    }
  }
}
