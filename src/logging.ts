import pino from "pino";
import path from "path";
import { fileURLToPath } from "url";
import fs from "fs";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const logsDir = path.join(__dirname, "../data/logs");
if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true });

// Rotate log file daily, filename flow-gate-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `flow-gate-${date}.log`);
}

// Multi-destination: stderr (human-readable) + file (JSON for audit replay)
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
      level: process.env.LOG_LEVEL ?? "info",
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

export const logger = pino(
  {
    level: "debug", // base level; targets filter individually
    base: { service: "flow-gate" },
  },
  transport,
);

export type Logger = typeof logger;

// Typed child loggers for subsystems
export const logFlow = logger.child({ subsystem: "flow" });
export const logRisk = logger.child({ subsystem: "risk" });
export const logGate = logger.child({ subsystem: "gate" });
export const logOracle = logger.child({ subsystem: "oracle" });
export const logExec = logger.child({ subsystem: "execution" });
export const logExits = logger.child({ subsystem: "exits" });
export const logBroker = logger.child({ subsystem: "broker" });
export const logMarket = logger.child({ subsystem: "market" });
export const logDb = logger.child({ subsystem: "database" });
export const logNotify = logger.child({ subsystem: "notify" });
export const logReversal = logger.child({ subsystem: "reversal" });
export const logScheduler = logger.child({ subsystem: "scheduler" });

// Clean up old log files (keep last N days)
export function pruneOldLogs(keepDays: number = 30): void {
  try {
    const files = fs.readdirSync(logsDir).filter((f) => f.startsWith("flow-gate-") && f.endsWith(".log"));
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - keepDays);
    const cutoffStr = cutoff.toISOString().slice(0, 10);

    for (const file of files) {
      const dateMatch = file.match(/flow-gate-(\d{4}-\d{2}-\d{2})\.log/);
      if (dateMatch?.[1] && dateMatch[1] < cutoffStr) {
        fs.unlinkSync(path.join(logsDir, file));
        logger.info({ file }, "Pruned old log file");
      }
    }
  } catch (e) {
    logger.warn({ err: e }, "Failed to prune old logs");
  }
}
