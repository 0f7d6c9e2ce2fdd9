export const ARTICLES_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS articles (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL DEFAULT '',
    content TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    composite_score REAL,          -- NULL until scored
    confidence REAL,
    score_source TEXT              -- 'llm' once an ensemble score is committed
  );
  CREATE INDEX IF NOT EXISTS idx_articles_unscored ON articles(composite_score) WHERE composite_score IS NULL;
`;

export const LLM_SCORES_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS llm_scores (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    article_id INTEGER NOT NULL REFERENCES articles(id) ON DELETE CASCADE,
    model TEXT NOT NULL,
    score REAL NOT NULL,
    metadata TEXT NOT NULL DEFAULT '{}',  -- JSON, carries at least "confidence"
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_llm_scores_article ON llm_scores(article_id);
  CREATE INDEX IF NOT EXISTS idx_llm_scores_model ON llm_scores(article_id, model);
`;
