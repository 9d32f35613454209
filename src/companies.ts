import { z } from "zod";

import type { Logger } from "./logger.js";
import type { Company, CompanyDirectoryData, CompanyFilters } from "./types.js";
import { equalsIgnoreCase, includesIgnoreCase, readJSONFile } from "./utils.js";

/** `null` in the data file means the same as a missing field. */
function absent<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const companySchema: z.ZodType<Company, z.ZodTypeDef, unknown> = z.object({
  id: z.number().int(),
  name: absent(z.string()),
  tagline: absent(z.string()),
  description: absent(z.string()),
  industry: absent(z.string()),
  hq: absent(z.string()),
  year_founded: absent(z.number().int()),
  employees: absent(z.union([z.string(), z.number()])),
  last_round: absent(z.string()),
  last_round_size: absent(z.number()),
  valuation: absent(z.number()),
  funding_history: absent(z.array(z.string()))
});

// Companies are checked one by one so a bad record does not empty the directory.
const directorySchema = z.object({
  companies: z.array(z.unknown()).nullish().transform((v) => v ?? []),
  industries: z.array(z.string()).nullish().transform((v) => v ?? []),
  funding_stages: z.array(z.string()).nullish().transform((v) => v ?? [])
});

function recordId(entry: unknown): unknown {
  return typeof entry === "object" && entry !== null && "id" in entry ? entry.id : undefined;
}

export interface CompanyDirectory {
  path: string;
  industries: readonly string[];
  fundingStages: readonly string[];

  list(filters?: CompanyFilters): Company[];
  search(query: string): Company[];
  get(id: number): Company | null;
  size(): number;
}

export interface CompanyDirectoryDeps {
  filePath: string;
  logger: Logger;
}

export async function loadCompanyData(filePath: string, logger: Logger): Promise<CompanyDirectoryData> {
  const empty: CompanyDirectoryData = { companies: [], industries: [], funding_stages: [] };
  let raw: unknown;
  try {
    raw = await readJSONFile(filePath);
  } catch (err) {
    logger.warn({ file: filePath, err }, "company file unreadable; directory is empty");
    return empty;
  }
  if (raw === undefined) {
    logger.warn({ file: filePath }, "company file not found; directory is empty");
    return empty;
  }
  const parsed = directorySchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(
      { file: filePath, issues: parsed.error.issues },
      "company file is malformed; directory is empty"
    );
    return empty;
  }
  const companies: Company[] = [];
  parsed.data.companies.forEach((entry, index) => {
    const company = companySchema.safeParse(entry);
    if (company.success) {
      companies.push(company.data);
      return;
    }
    logger.warn(
      { file: filePath, index, id: recordId(entry), issues: company.error.issues },
      "company record skipped"
    );
  });

  return {
    companies,
    industries: parsed.data.industries,
    funding_stages: parsed.data.funding_stages
  };
}

export function matchesFilters(c: Company, f: CompanyFilters): boolean {
  if (f.industry !== undefined && !equalsIgnoreCase(c.industry, f.industry)) return false;
  if (f.funding_stage !== undefined && !equalsIgnoreCase(c.last_round, f.funding_stage)) return false;
  if (f.hq !== undefined && !includesIgnoreCase(c.hq, f.hq)) return false;
  if (f.year !== undefined && c.year_founded !== f.year) return false;
  if (f.search !== undefined) {
    const q = f.search;
    const hit = includesIgnoreCase(c.name, q)
      || includesIgnoreCase(c.tagline, q)
      || includesIgnoreCase(c.description, q);
    if (!hit) return false;
  }
  return true;
}

export function matchesQuery(c: Company, query: string): boolean {
  return includesIgnoreCase(c.name, query)
    || includesIgnoreCase(c.tagline, query)
    || includesIgnoreCase(c.description, query)
    || includesIgnoreCase(c.industry, query);
}

/** Builds a directory over already-loaded data. Nothing here mutates `data`. */
export function createCompanyDirectory(data: CompanyDirectoryData, path = "<memory>"): CompanyDirectory {
  const companies: readonly Company[] = data.companies;
  const byId = new Map<number, Company>();
  for (const c of companies) {
    if (!byId.has(c.id)) byId.set(c.id, c);
  }

  return {
    path,
    industries: data.industries,
    fundingStages: data.funding_stages,

    list: (filters = {}) => companies.filter((c) => matchesFilters(c, filters)),
    search: (query) => companies.filter((c) => matchesQuery(c, query)),
    get: (id) => byId.get(id) ?? null,
    size: () => companies.length
  };
}

export async function openCompanyDirectory({ filePath, logger }: CompanyDirectoryDeps): Promise<CompanyDirectory> {
  const data = await loadCompanyData(filePath, logger);
  logger.debug({ file: filePath, companies: data.companies.length }, "company directory loaded");
  return createCompanyDirectory(data, filePath);
}
