import pino, { type Logger } from "pino";
import path from "path";
import { fileURLToPath } from "url";
import fs from "fs";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const logsDir = path.join(__dirname, "../data/logs");
const level = process.env.LOG_LEVEL ?? "info";

// One log file per day: scorer-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `scorer-${date}.log`);
}

function buildLogger(): Logger {
  // Test runs set LOG_LEVEL=silent: no worker-thread transports, no log files
  if (level === "silent") {
    return pino({ level, base: { service: "bias-ensemble" } });
  }

  if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true });

  // Multi-destination: stderr (human-readable) + file (JSON for parsing)
  const transport = pino.transport({
    targets: [
      {
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
        level,
      },
      {
        target: "pino/file",
        options: {
          destination: logFilePath(),
          mkdir: true,
        },
        level: "debug", // file gets everything
      },
    ],
  });

  return pino(
    {
      level: "debug", // targets filter individually
      base: { service: "bias-ensemble" },
    },
    transport,
  );
}

export const logger = buildLogger();

// Typed child loggers for subsystems
export const logScoring = logger.child({ subsystem: "scoring" });
export const logProvider = logger.child({ subsystem: "provider" });
export const logEnsemble = logger.child({ subsystem: "ensemble" });
export const logProgress = logger.child({ subsystem: "progress" });
export const logDb = logger.child({ subsystem: "database" });

// Clean up old log files (keep last N days)
export function pruneOldLogs(keepDays: number = 30): void {
  if (!fs.existsSync(logsDir)) return;
  try {
    const files = fs.readdirSync(logsDir).filter((f) => f.startsWith("scorer-") && f.endsWith(".log"));
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - keepDays);
    const cutoffStr = cutoff.toISOString().slice(0, 10);

    for (const file of files) {
      const dateMatch = file.match(/scorer-(\d{4}-\d{2}-\d{2})\.log/);
      if (dateMatch && dateMatch[1] < cutoffStr) {
        fs.unlinkSync(path.join(logsDir, file));
        logger.info({ file }, "Pruned old log file");
      }
    }
  } catch (e) {
    logger.warn({ err: e }, "Failed to prune old logs");
  }
}
