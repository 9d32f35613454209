import type { Company } from "./types.js";

export const UNKNOWN = "Unknown";

export function formatCurrency(amount: number | undefined): string {
  if (amount === undefined) return UNKNOWN;
  if (amount >= 1_000_000_000) {
    return `$${(amount / 1_000_000_000).toFixed(1)}B`;
  }
  if (amount >= 1_000_000) {
    if (amount % 1_000_000 === 0) return `$${amount / 1_000_000}M`;
    return `$${(amount / 1_000_000).toFixed(1)}M`;
  }
  if (amount >= 1_000) {
    return `$${Math.floor(amount / 1_000)}K`;
  }
  return `$${amount}`;
}

export function formatFundingHistory(stages: readonly string[] | undefined): string {
  return (stages ?? []).join(" → ");
}

function orUnknown(value: string | number | undefined): string {
  if (value === undefined || value === "") return UNKNOWN;
  return String(value);
}

/** Human-readable block shown for get_company. */
export function describeCompany(c: Company): string {
  const history = formatFundingHistory(c.funding_history);
  const lastRound = c.last_round
    ? `${c.last_round} (${formatCurrency(c.last_round_size)})`
    : UNKNOWN;

  return [
    `${orUnknown(c.name)} (ID ${c.id})`,
    orUnknown(c.tagline),
    "",
    `Industry: ${orUnknown(c.industry)}`,
    `HQ: ${orUnknown(c.hq)}`,
    `Founded: ${orUnknown(c.year_founded)}`,
    `Employees: ${orUnknown(c.employees)}`,
    `Last round: ${lastRound}`,
    `Valuation: ${formatCurrency(c.valuation)}`,
    `Funding history: ${history || UNKNOWN}`,
    "",
    orUnknown(c.description)
  ].join("\n");
}
