import morgan from "morgan";
import chalk from "chalk";
import { logger } from "../utils/logger";

morgan.token("colored-method", (req) => {
  const method = req.method ?? "";
  switch (method) {
    case "GET":
      return chalk.green(method);
    case "POST":
      return chalk.yellow(method);
    case "DELETE":
      return chalk.red(method);
    default:
      return chalk.white(method);
  }
});

morgan.token("colored-status", (_req, res) => {
  const status = res.statusCode;
  if (status >= 500) return chalk.red(status);
  if (status >= 400) return chalk.yellow(status);
  if (status >= 300) return chalk.cyan(status);
  return chalk.green(status);
});

morgan.token("colored-url", (req) => chalk.cyan(req.url));

// request lines go through winston so they share its transports and level
export const requestLogger = morgan(
  chalk.white("INCOMING_REQUEST: ") +
    chalk.white("method=") +
    ":colored-method" +
    chalk.white(", uri=") +
    ":colored-url" +
    chalk.white(", status=") +
    ":colored-status" +
    chalk.white(", response-time=") +
    chalk.magenta(":response-time ms") +
    chalk.white(", content-length=") +
    chalk.cyan(":res[content-length]"),
  {
    stream: { write: (line: string) => logger.http(line.trim()) },
  }
);
