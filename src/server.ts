import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z, type ZodRawShape } from "zod";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import {
  COMPANY_WIDGET_URI,
  handleAddTask,
  handleCompleteTask,
  handleDeleteTask,
  handleGetCompany,
  handleListCompanies,
  handleListTasks,
  handleSearchCompanies,
  type ToolContext,
  type ToolReply
} from "./handlers.js";
import type { Logger } from "./logger.js";

export const SERVER_NAME = "taskpilot";
export const SERVER_VERSION = "0.1.0";

export const WIDGET_MIME_TYPE = "text/html+skybridge";

export interface ServerDeps extends ToolContext {
  logger: Logger;
  widgetsDir: string;
}

function toResult(reply: ToolReply): CallToolResult {
  return {
    content: [{ type: "text", text: reply.text }],
    structuredContent: reply.structured,
    _meta: reply.meta
  };
}

const widgetToolMeta = {
  "openai/outputTemplate": COMPANY_WIDGET_URI,
  "openai/widgetAccessible": true,
  "openai/toolInvocation/invoking": "Loading companies",
  "openai/toolInvocation/invoked": "Companies loaded"
};

export function createServer(deps: ServerDeps): McpServer {
  const { logger } = deps;
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  const traced = <A>(tool: string, fn: (args: A) => ToolReply | Promise<ToolReply>) =>
    async (args: A): Promise<CallToolResult> => {
      const reply = await fn(args);
      logger.debug({ tool, args, meta: reply.meta }, "tool call");
      return toResult(reply);
    };

  /** ----------------------- Resources ----------------------- **/

  server.registerResource(
    "company-list-widget",
    COMPANY_WIDGET_URI,
    { title: "Company list widget", description: "Markup rendering company listings", mimeType: WIDGET_MIME_TYPE },
    async (uri) => {
      const text = await readFile(resolve(deps.widgetsDir, "company-list.html"), "utf8");
      return { contents: [{ uri: uri.href, mimeType: WIDGET_MIME_TYPE, text }] };
    }
  );

  /** ----------------------- Task tools ----------------------- **/

  const addTaskInput = {
    text: z.string().describe("The task description text")
  } satisfies ZodRawShape;

  server.registerTool("add_task",
    {
      title: "Add a task",
      description: "Add a new task to the task list",
      inputSchema: addTaskInput
    },
    traced("add_task", (args: { text: string }) => handleAddTask(deps, args))
  );

  server.registerTool("list_tasks",
    {
      title: "List tasks",
      description: "Retrieve all tasks with pending and completed counts",
      inputSchema: {},
      annotations: { readOnlyHint: true }
    },
    traced("list_tasks", () => handleListTasks(deps))
  );

  const taskIdInput = {
    task_id: z.number().int().describe("The ID of the task")
  } satisfies ZodRawShape;

  server.registerTool("complete_task",
    {
      title: "Complete a task",
      description: "Mark a task as completed",
      inputSchema: taskIdInput
    },
    traced("complete_task", (args: { task_id: number }) => handleCompleteTask(deps, args))
  );

  server.registerTool("delete_task",
    {
      title: "Delete a task",
      description: "Delete a task from the task list",
      inputSchema: taskIdInput,
      annotations: { destructiveHint: true }
    },
    traced("delete_task", (args: { task_id: number }) => handleDeleteTask(deps, args))
  );

  /** ----------------------- Company tools ----------------------- **/

  const listCompaniesInput = {
    industry: z.string().optional().describe("Industry, matched case-insensitively"),
    funding_stage: z.string().optional().describe("Last funding round, e.g. 'Series A'"),
    hq: z.string().optional().describe("Part of the headquarters location"),
    year: z.number().int().optional().describe("Year founded"),
    search: z.string().optional().describe("Text to look for in name, tagline or description")
  } satisfies ZodRawShape;

  server.registerTool("list_companies",
    {
      title: "List startup companies",
      description: "List companies, optionally filtered by industry, funding stage, HQ, founding year or text",
      inputSchema: listCompaniesInput,
      annotations: { readOnlyHint: true },
      _meta: widgetToolMeta
    },
    traced("list_companies", (filters: {
      industry?: string; funding_stage?: string; hq?: string; year?: number; search?: string;
    }) => handleListCompanies(deps, filters))
  );

  const getCompanyInput = {
    company_id: z.number().int().describe("The ID of the company")
  } satisfies ZodRawShape;

  server.registerTool("get_company",
    {
      title: "Get company details",
      description: "Full record for one company with formatted funding figures",
      inputSchema: getCompanyInput,
      annotations: { readOnlyHint: true }
    },
    traced("get_company", (args: { company_id: number }) => handleGetCompany(deps, args))
  );

  const searchCompaniesInput = {
    query: z.string().describe("Text to look for in name, tagline, description or industry")
  } satisfies ZodRawShape;

  server.registerTool("search_companies",
    {
      title: "Search startup companies",
      description: "Search companies by name, tagline, description or industry",
      inputSchema: searchCompaniesInput,
      annotations: { readOnlyHint: true },
      _meta: widgetToolMeta
    },
    traced("search_companies", (args: { query: string }) => handleSearchCompanies(deps, args))
  );

  return server;
}
