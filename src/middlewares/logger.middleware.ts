import morgan from "morgan";
import chalk from "chalk";

const METHOD_COLORS: Record<string, (text: string) => string> = {
  GET: chalk.green,
  POST: chalk.yellow,
  PUT: chalk.blue,
  DELETE: chalk.red,
  PATCH: chalk.magenta,
};

morgan.token("timestamp", () => chalk.gray(new Date().toISOString()));

morgan.token("colored-method", (req) => {
  const method = req.method ?? "";
  return (METHOD_COLORS[method] ?? chalk.white)(method);
});

morgan.token("colored-status", (_req, res) => {
  const status = res.statusCode;
  if (status >= 500) return chalk.red(status);
  if (status >= 400) return chalk.yellow(status);
  if (status >= 300) return chalk.cyan(status);
  return chalk.green(status);
});

morgan.token("colored-url", (req) => chalk.cyan(req.url ?? ""));

export const requestLogger = morgan(
  chalk.gray("[") +
    ":timestamp" +
    chalk.gray("]") +
    chalk.white(" REQUEST ") +
    ":colored-method " +
    ":colored-url " +
    ":colored-status" +
    chalk.magenta(" :response-time ms") +
    chalk.white(" length=") +
    chalk.cyan(":res[content-length]"),
  {
    // health probes would drown out plan traffic
    skip: (req) => (req.url ?? "").startsWith("/health"),
  }
);
