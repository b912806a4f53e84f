/**
 * Report list input (CSV with name, url, description columns)
 */

import * as fs from "fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { ReportRequest } from "./types";

const REQUIRED_COLUMNS = ["name", "url"];

const RowsSchema = z.array(z.record(z.string(), z.string()));

export function parseReportRequests(content: string): ReportRequest[] {
  let header: string[] = [];

  const parsed: unknown = parse(content, {
    bom: true,
    trim: true,
    skip_empty_lines: true,
    columns: (columns: string[]) => {
      header = columns.map((c) => c.trim().toLowerCase());
      return header;
    },
  });

  const missing = REQUIRED_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length > 0) {
    throw new Error(`Input file is missing required column(s): ${missing.join(", ")}`);
  }

  return RowsSchema.parse(parsed).map((row, i) => ({
    name: row.name || `Report ${i + 1}`,
    url: row.url ?? "",
    existingDescription: row.description ?? "",
  }));
}

/**
 * Load report requests from a CSV file, preserving row order
 */
export function loadReportRequests(csvPath: string): ReportRequest[] {
  return parseReportRequests(fs.readFileSync(csvPath, "utf8"));
}
