import chalk from "chalk";
import morgan from "morgan";

const METHOD_COLORS: Record<string, chalk.Chalk> = {
  GET: chalk.green,
  POST: chalk.yellow,
  PATCH: chalk.magenta,
  PUT: chalk.blue,
  DELETE: chalk.red,
};

const statusColor = (status: number): chalk.Chalk => {
  if (status >= 500) return chalk.red;
  if (status >= 400) return chalk.yellow;
  if (status >= 300) return chalk.cyan;
  return chalk.green;
};

morgan.token("stamp", () => chalk.gray(`[${new Date().toISOString()}]`));

morgan.token("method-tag", (req) => {
  const method = req.method ?? "";
  return (METHOD_COLORS[method] ?? chalk.white)(method.padEnd(6));
});

morgan.token("status-tag", (_req, res) => {
  const status = res.statusCode;
  return statusColor(status)(String(status));
});

morgan.token("path", (req) => chalk.cyan(req.url ?? ""));

/** Access log; one line per request once the response is sent. Off under tests. */
export const requestLogger = morgan(
  [
    ":stamp",
    ":method-tag",
    ":path",
    ":status-tag",
    chalk.magenta(":response-time ms"),
    chalk.gray("(:res[content-length] bytes)"),
  ].join(" "),
  { skip: () => process.env.NODE_ENV === "test" }
);
