import { writeFile, mkdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import Papa from "papaparse";
import type { ExportFormat, SearchRecord } from "./types";
import { displayTime, fileStamp } from "./utils";

export function formatListing(name: string, records: readonly SearchRecord[], generatedAt = new Date()): string {
  const lines = [
    `OSINT Investigation Results for: ${name.trim()}`,
    `Generated on: ${displayTime(generatedAt)}`,
    "=".repeat(60),
    "",
  ];

  let currentCategory: string | null = null;
  for (const record of records) {
    if (record.category !== currentCategory) {
      currentCategory = record.category;
      lines.push("", `[${currentCategory}]`, "-".repeat(40));
    }
    lines.push(`${record.platform}: ${record.url}`);
  }

  return lines.join("\n") + "\n";
}

export function makeFilename(date: Date, ext: ExportFormat): string {
  return `osint_results_${fileStamp(date)}.${ext}`;
}

export function toCsv(records: readonly SearchRecord[]): string {
  return Papa.unparse(
    records.map((r) => ({
      category: r.category,
      platform: r.platform,
      url: r.error ? "" : r.url,
      error: r.error ?? "",
      generatedAt: r.generatedAt,
    })),
    { quotes: true, header: true }
  );
}

function render(name: string, records: readonly SearchRecord[], format: ExportFormat, date: Date): string {
  switch (format) {
    case "json":
      return JSON.stringify({ name: name.trim(), generatedAt: date.toISOString(), records }, null, 2);
    case "csv":
      return toCsv(records);
    case "txt":
      return formatListing(name, records, date);
  }
}

/** Writes the results into `dir` and returns the absolute path of the new file. */
export async function exportResults(
  name: string,
  records: readonly SearchRecord[],
  format: ExportFormat,
  dir: string,
  date = new Date()
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = resolve(join(dir, makeFilename(date, format)));
  await writeFile(path, render(name, records, format, date), "utf-8");
  return path;
}
