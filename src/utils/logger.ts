import { mkdirSync, existsSync, appendFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_LOG_DIR = join(__dirname, "../../logs");

type LogLevel = "info" | "warn" | "error" | "debug";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

function logDir(): string {
  return process.env.LOG_DIR || DEFAULT_LOG_DIR;
}

// Error instances serialize to {} under JSON.stringify
function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  return data;
}

function formatEntry(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.data !== undefined) {
    return `${base} ${JSON.stringify(serializeData(entry.data))}`;
  }
  return base;
}

function log(level: LogLevel, message: string, data?: unknown): void {
  if (level === "debug" && !process.env.DEBUG) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    data,
  };

  const formatted = formatEntry(entry);

  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }

  if (process.env.LOG_TO_FILE === "false") return;

  try {
    const dir = logDir();
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const date = entry.timestamp.slice(0, 10);
    appendFileSync(join(dir, `etl-${date}.log`), formatted + "\n");
  } catch (err) {
    // Console output already happened
    console.warn(`Could not write log file: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export const logger = {
  info: (msg: string, data?: unknown) => log("info", msg, data),
  warn: (msg: string, data?: unknown) => log("warn", msg, data),
  error: (msg: string, data?: unknown) => log("error", msg, data),
  debug: (msg: string, data?: unknown) => log("debug", msg, data),
};
