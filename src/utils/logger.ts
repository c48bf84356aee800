import chalk from "chalk";
import { loadConfig, type LogLevel } from "../configs/environment";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

const renderMeta = (meta: unknown): string => {
  if (meta instanceof Error) {
    return meta.message;
  }
  if (typeof meta === "string") {
    return meta;
  }
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
};

export const formatLogLine = (
  level: LogLevel,
  message: string,
  meta: unknown[],
  timestamp: string = new Date().toISOString()
): string => {
  const tag = LEVEL_COLOR[level](level.toUpperCase().padEnd(5));
  const extra = meta.map(renderMeta).join(" ");
  const base = `${chalk.gray(`[${timestamp}]`)} ${tag} ${message}`;
  return extra ? `${base} ${extra}` : base;
};

const createLogger = () => {
  const threshold = LEVEL_PRIORITY[loadConfig().logging.level];
  const write =
    (level: LogLevel, sink: (line: string) => void) =>
    (message: string, ...meta: unknown[]) => {
      if (LEVEL_PRIORITY[level] < threshold) return;
      sink(formatLogLine(level, message, meta));
    };

  return {
    debug: write("debug", console.debug),
    info: write("info", console.info),
    warn: write("warn", console.warn),
    error: write("error", console.error),
  };
};

export const logger = createLogger();
