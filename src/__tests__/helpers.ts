import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { createLogger, type Logger } from "../logger.js";
import type { CompanyDirectoryData } from "../types.js";

export interface LogRecord {
  level: number;
  msg: string;
  [k: string]: unknown;
}

/** A debug-level logger whose records land in `records` instead of stderr. */
export function captureLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({
    level: "debug",
    destination: { write: (line: string) => { records.push(JSON.parse(line)); } }
  });
  return { logger, records };
}

export async function tempFile(prefix: string, name = "tasks.json") {
  const dir = await mkdtemp(join(tmpdir(), `taskpilot-${prefix}-`));
  return join(dir, name);
}

export const fixedClock = () => "2026-01-01T00:00:00.000Z";

export const sampleDirectory: CompanyDirectoryData = {
  industries: ["AI/ML", "Healthcare", "Fintech"],
  funding_stages: ["Seed", "Series A", "Series B"],
  companies: [
    {
      id: 1,
      name: "Acme AI",
      tagline: "Agents for back offices",
      description: "Automates invoice handling with language models.",
      industry: "AI/ML",
      hq: "San Francisco, CA",
      year_founded: 2020,
      employees: "51-200",
      last_round: "Series A",
      last_round_size: 45_000_000,
      valuation: 1_500_000_000,
      funding_history: ["Seed", "Series A"]
    },
    {
      id: 2,
      name: "GeneWorks",
      tagline: "Faster assays",
      description: "Biotech tooling for small labs.",
      industry: "Healthcare",
      hq: "New York, NY",
      year_founded: 2019,
      last_round: "Series B",
      last_round_size: 3_200_000,
      valuation: 80_000_000,
      funding_history: ["Seed", "Series A", "Series B"]
    },
    {
      id: 3,
      name: "Loam",
      tagline: "Soil carbon measurement",
      description: "Remote sensing for farms.",
      industry: "ai/ml",
      hq: "Austin, TX",
      year_founded: 2021,
      last_round: "seed",
      last_round_size: 500,
      funding_history: []
    },
    { id: 4 }
  ]
};
