import pino from "pino";
import path from "node:path";
import fs from "node:fs";
import type { Request, Response, NextFunction } from "express";
import { config } from "./config.js";

const logsDir = config.workspace.logsDir;
const silent = config.logging.level === "silent";

// Rotate log file daily. Filename: hedge-desk-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `hedge-desk-${date}.log`);
}

function createLogger(): pino.Logger {
  if (silent) {
    return pino({ level: "silent" });
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
        level: config.logging.level,
      },
      {
        target: "pino/file",
        options: {
          destination: logFilePath(),
          mkdir: true,
        },
        level: "debug",
      },
    ],
  });

  return pino(
    {
      level: "debug", // base level; targets filter individually
      base: { service: "hedge-desk" },
    },
    transport,
  );
}

export const logger = createLogger();

// Typed child loggers for subsystems
export const logRest = logger.child({ subsystem: "rest" });
export const logPipeline = logger.child({ subsystem: "pipeline" });
export const logFund = logger.child({ subsystem: "fund" });
export const logTrades = logger.child({ subsystem: "trades" });
export const logDb = logger.child({ subsystem: "database" });
export const logAgents = logger.child({ subsystem: "agents" });
export const logMarket = logger.child({ subsystem: "market" });

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on("finish", () => {
    const duration = Date.now() - start;
    logRest.info(
      {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: duration,
      },
      `${req.method} ${req.path} → ${res.statusCode} (${duration}ms)`,
    );
  });
  next();
}

// Clean up old log files (keep last N days)
export function pruneOldLogs(keepDays: number = 30): void {
  if (!fs.existsSync(logsDir)) return;
  try {
    const files = fs.readdirSync(logsDir).filter((f) => f.startsWith("hedge-desk-") && f.endsWith(".log"));
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - keepDays);
    const cutoffStr = cutoff.toISOString().slice(0, 10);

    for (const file of files) {
      const dateMatch = file.match(/hedge-desk-(\d{4}-\d{2}-\d{2})\.log/);
      if (dateMatch && dateMatch[1] < cutoffStr) {
        fs.unlinkSync(path.join(logsDir, file));
        logger.info({ file }, "Pruned old log file");
      }
    }
  } catch (e) {
    logger.warn({ err: e }, "Failed to prune old logs");
  }
}
