import { readFile } from "node:fs/promises";

export function nowISO() { return new Date().toISOString(); }

export function isMissingFile(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Reads and parses a JSON file; returns `undefined` when the file does not exist. */
export async function readJSONFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
  return JSON.parse(raw);
}

export function includesIgnoreCase(haystack: string | undefined, needle: string) {
  return (haystack ?? "").toLowerCase().includes(needle.toLowerCase());
}

export function equalsIgnoreCase(a: string | undefined, b: string) {
  return (a ?? "").toLowerCase() === b.toLowerCase();
}
