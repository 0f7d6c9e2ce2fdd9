#!/usr/bin/env node
import { loadConfigFromEnvFile } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { ArticleRepository, SqliteScoreStore, openDatabase } from "./db/database.js";
import { logger, pruneOldLogs } from "./logging.js";
import { ResponseCache, ViewCache } from "./scoring/cache.js";
import { configuredModels, loadCompositeConfig } from "./scoring/config.js";
import { CompositeAggregator } from "./scoring/ensemble/aggregator.js";
import { EnsembleCoordinator } from "./scoring/ensemble/coordinator.js";
import { errorMessage, isScoringError } from "./scoring/errors.js";
import { ProviderClient } from "./scoring/models/client.js";
import { ProgressTracker } from "./scoring/progress.js";
import { ScoreManager } from "./scoring/score-manager.js";
import { ScoringService, type ArticleBias } from "./scoring/service.js";

type Command = { kind: "article"; articleId: number } | { kind: "unscored" };

function parseCommand(argv: string[]): Command | null {
  const idx = argv.indexOf("--article");
  if (idx !== -1) {
    const articleId = parseInt(argv[idx + 1] ?? "", 10);
    if (!Number.isInteger(articleId) || articleId <= 0) return null;
    return { kind: "article", articleId };
  }
  if (argv.includes("--unscored")) return { kind: "unscored" };
  return null;
}

async function main() {
  const command = parseCommand(process.argv.slice(2));
  if (!command) {
    process.stderr.write("usage: bias-ensemble --article <id> | --unscored\n");
    process.exitCode = 2;
    return;
  }

  const config = loadConfigFromEnvFile();
  const validation = validateConfig(config);
  for (const warning of validation.warnings) logger.warn(warning);
  if (validation.errors.length > 0) {
    for (const error of validation.errors) logger.error(error);
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  pruneOldLogs();
  const compositeConfig = loadCompositeConfig(config.scoring.compositeConfigPath);

  const db = openDatabase(config.db.path);
  const store = new SqliteScoreStore(db);
  const articles = new ArticleRepository(store);
  const responseCache = new ResponseCache();
  const views = new ViewCache<ArticleBias>(config.scoring.biasViewTtlMs);
  const progress = new ProgressTracker({ cleanupIntervalMs: config.progress.cleanupIntervalMs });

  const client = new ProviderClient(config.llm);
  const ensemble = new EnsembleCoordinator(
    client,
    { ...config.ensemble, models: configuredModels(compositeConfig) },
    responseCache,
  );
  const scoreManager = new ScoreManager({
    store,
    calculator: new CompositeAggregator(),
    progress,
    responseCache,
    views,
  });
  const service = new ScoringService({ articles, ensemble, scoreManager, progress, compositeConfig, views });

  const abort = new AbortController();
  const onSignal = (sig: NodeJS.Signals) => {
    logger.warn({ signal: sig }, "Shutdown requested, cancelling in-flight scoring");
    abort.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  progress.start();
  try {
    if (command.kind === "article") {
      const result = await service.reanalyzeArticle(command.articleId, abort.signal);
      logger.info({ articleId: command.articleId, ...result }, "Article scored");
    } else {
      const result = await service.processUnscoredArticles(abort.signal);
      logger.info(result, "Batch complete");
      if (result.failed > 0) process.exitCode = 1;
    }
  } catch (e: unknown) {
    if (isScoringError(e, "Cancelled")) {
      logger.warn("Scoring cancelled");
      process.exitCode = 130;
    } else {
      throw e;
    }
  } finally {
    progress.stop();
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    db.close();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err: errorMessage(err) }, "Fatal error");
  process.exitCode = 1;
});
