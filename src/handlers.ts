import type { CompanyDirectory } from "./companies.js";
import { formatCurrency, formatFundingHistory, describeCompany } from "./format.js";
import type { TaskStore } from "./tasks.js";
import type { CompanyFilters } from "./types.js";
import { nowISO } from "./utils.js";

export const COMPANY_WIDGET_URI = "ui://widget/company-list.html";

export interface ToolReply {
  text: string;
  structured: Record<string, unknown>;
  meta: Record<string, unknown>;
}

export interface ToolContext {
  tasks: TaskStore;
  companies: CompanyDirectory;
  now?: () => string;
}

function taskNotFound(operation: string, task_id: number): ToolReply {
  return {
    text: `Error: Task with ID ${task_id} not found`,
    structured: { error: "Task not found", task_id },
    meta: { operation, success: false }
  };
}

/** ----------------------- Tasks ----------------------- **/

export async function handleAddTask(ctx: ToolContext, { text }: { text: string }): Promise<ToolReply> {
  const task = await ctx.tasks.add(text);
  const tasks = ctx.tasks.list();
  return {
    text: `Added task: '${text}'. Total tasks: ${tasks.length}`,
    structured: { tasks, total: tasks.length, latest_task: task },
    meta: { operation: "add_task", task_id: task.id }
  };
}

export function handleListTasks(ctx: ToolContext): ToolReply {
  const tasks = ctx.tasks.list();
  const { total, pending, completed } = ctx.tasks.counts();
  const text = total === 0
    ? "No tasks found. Add your first task to get started!"
    : `Found ${total} task(s): ${pending} pending, ${completed} completed`;
  return {
    text,
    structured: { tasks, total, pending, completed },
    meta: { operation: "list_tasks", timestamp: (ctx.now ?? nowISO)() }
  };
}

export async function handleCompleteTask(ctx: ToolContext, { task_id }: { task_id: number }): Promise<ToolReply> {
  const task = await ctx.tasks.complete(task_id);
  if (!task) return taskNotFound("complete_task", task_id);
  const tasks = ctx.tasks.list();
  return {
    text: `Task ${task_id} marked as completed`,
    structured: { tasks, total: tasks.length, task_id },
    meta: { operation: "complete_task", success: true, task_id }
  };
}

export async function handleDeleteTask(ctx: ToolContext, { task_id }: { task_id: number }): Promise<ToolReply> {
  const removed = await ctx.tasks.remove(task_id);
  if (!removed) return taskNotFound("delete_task", task_id);
  const tasks = ctx.tasks.list();
  return {
    text: `Task ${task_id} deleted successfully`,
    structured: { tasks, total: tasks.length },
    meta: { operation: "delete_task", success: true, task_id }
  };
}

/** ----------------------- Companies ----------------------- **/

function pluralCompanies(n: number) {
  return n === 1 ? "company" : "companies";
}

export function describeFilters(filters: CompanyFilters): string {
  const parts: string[] = [];
  if (filters.industry !== undefined) parts.push(`industry: ${filters.industry}`);
  if (filters.funding_stage !== undefined) parts.push(`funding stage: ${filters.funding_stage}`);
  if (filters.hq !== undefined) parts.push(`HQ: ${filters.hq}`);
  if (filters.year !== undefined) parts.push(`founded: ${filters.year}`);
  if (filters.search !== undefined) parts.push(`search: '${filters.search}'`);
  return parts.length ? ` matching ${parts.join(", ")}` : "";
}

export function handleListCompanies(ctx: ToolContext, filters: CompanyFilters): ToolReply {
  const companies = ctx.companies.list(filters);
  const suffix = describeFilters(filters);
  const text = companies.length === 0
    ? `No companies found${suffix}`
    : `Found ${companies.length} ${pluralCompanies(companies.length)}${suffix}`;
  return {
    text,
    structured: {
      companies,
      total: companies.length,
      industries: [...ctx.companies.industries],
      funding_stages: [...ctx.companies.fundingStages]
    },
    meta: {
      operation: "list_companies",
      filters,
      "openai/outputTemplate": COMPANY_WIDGET_URI
    }
  };
}

export function handleGetCompany(ctx: ToolContext, { company_id }: { company_id: number }): ToolReply {
  const company = ctx.companies.get(company_id);
  if (!company) {
    return {
      text: `Error: Company with ID ${company_id} not found`,
      structured: { error: "Company not found", company_id },
      meta: { operation: "get_company", success: false, company_id }
    };
  }
  return {
    text: describeCompany(company),
    structured: {
      company,
      formatted: {
        funding_history: formatFundingHistory(company.funding_history),
        last_round_size: formatCurrency(company.last_round_size),
        valuation: formatCurrency(company.valuation)
      }
    },
    meta: { operation: "get_company", success: true, company_id }
  };
}

export function handleSearchCompanies(ctx: ToolContext, { query }: { query: string }): ToolReply {
  const companies = ctx.companies.search(query);
  const text = companies.length === 0
    ? `No companies found matching '${query}'`
    : `Found ${companies.length} ${pluralCompanies(companies.length)} matching '${query}'`;
  return {
    text,
    structured: {
      companies,
      total: companies.length,
      query,
      industries: [...ctx.companies.industries],
      funding_stages: [...ctx.companies.fundingStages]
    },
    meta: {
      operation: "search_companies",
      query,
      "openai/outputTemplate": COMPANY_WIDGET_URI
    }
  };
}
