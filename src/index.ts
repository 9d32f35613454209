#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { hideBin } from "yargs/helpers";

import { parseConfig, type ServerConfig } from "./config.js";
import { openCompanyDirectory } from "./companies.js";
import { startHttpServer } from "./http.js";
import { createLogger } from "./logger.js";
import { createServer } from "./server.js";
import { openTaskStore } from "./tasks.js";

let config: ServerConfig;
try {
  config = await parseConfig(hideBin(process.argv));
} catch (err) {
  createLogger().fatal({ err }, "invalid command-line options");
  process.exit(1);
}

if (config.help) {
  console.error(config.help);
  process.exit(0);
}

const logger = createLogger({ level: config.logLevel });

const tasks = await openTaskStore({ filePath: config.tasks, logger });
const companies = await openCompanyDirectory({ filePath: config.companies, logger });
const deps = { tasks, companies, logger, widgetsDir: config.widgets };

if (config.http) {
  await startHttpServer(deps, { host: config.host, port: config.port });
} else {
  const server = createServer(deps);
  await server.connect(new StdioServerTransport());
}

logger.info(
  {
    transport: config.http ? "http" : "stdio",
    tasks: config.tasks,
    companies: config.companies,
    widgets: config.widgets,
    companyCount: companies.size()
  },
  "taskpilot MCP up"
);
