import yargs from "yargs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { parseLogLevel, type LogLevel } from "./logger.js";

export interface ServerConfig {
  tasks: string;
  companies: string;
  widgets: string;
  logLevel: LogLevel;
  /** Serve streamable HTTP on `host:port` instead of stdio. */
  http: boolean;
  host: string;
  port: number;
  /** Usage text when `--help` was given; the caller prints it and exits. */
  help?: string;
}

const packageRoot = fileURLToPath(new URL("..", import.meta.url));

function expectLogLevel(value: unknown): LogLevel {
  const level = parseLogLevel(value);
  if (level) return level;
  throw new TypeError("logLevel must be one of fatal, error, warn, info, debug, trace, or silent");
}

function expectPort(value: unknown): number {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 65535) return value;
  throw new TypeError("port must be an integer between 0 and 65535");
}

/**
 * Parses command-line options. `args` is argv without the node binary and
 * script path (what `hideBin` returns).
 */
export async function parseConfig(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd = process.cwd()
): Promise<ServerConfig> {
  const parser = yargs([...args])
    .parserConfiguration({ "duplicate-arguments-array": false })
    // built-ins print to stdout, which carries the stdio protocol
    .help(false)
    .version(false)
    .option("tasks", { type: "string", default: resolve(cwd, "tasks.json"), describe: "task list file" })
    .option("companies", {
      type: "string",
      default: resolve(packageRoot, "data", "companies.json"),
      describe: "company directory file (read-only)"
    })
    .option("widgets", { type: "string", default: resolve(packageRoot, "widgets"), describe: "widget markup directory" })
    .option("logLevel", { type: "string", default: env.LOG_LEVEL ?? "info", describe: "pino log level" })
    .option("http", { type: "boolean", default: false, describe: "serve streamable HTTP instead of stdio" })
    .option("host", { type: "string", default: "0.0.0.0", describe: "HTTP bind address" })
    .option("port", { type: "number", default: 8000, describe: "HTTP port" })
    .option("help", { type: "boolean", alias: "h", default: false, describe: "show usage" })
    .strict()
    .exitProcess(false)
    .fail(false);

  const parsed = await parser.parse();

  return {
    tasks: resolve(cwd, parsed.tasks),
    companies: resolve(cwd, parsed.companies),
    widgets: resolve(cwd, parsed.widgets),
    logLevel: expectLogLevel(parsed.logLevel),
    http: parsed.http,
    host: parsed.host,
    port: expectPort(parsed.port),
    ...(parsed.help ? { help: await parser.getHelp() } : {})
  };
}
