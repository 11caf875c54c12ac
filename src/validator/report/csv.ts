import Papa from "papaparse";
import type { ValidationReport } from "./report";

const PREVIEW_LIMIT = 200;

export const ERROR_CSV_FIELDS = [
  "Row Number",
  "Error Type",
  "Description",
  "Row Content Preview",
];

/** Flat CSV of the error list, one line per error, `\n` line endings. */
export function formatErrorsCsv(report: ValidationReport): string {
  const data = report.errors.map((e) => [
    e.row,
    e.kind,
    e.description,
    (e.content ?? "").slice(0, PREVIEW_LIMIT),
  ]);
  return Papa.unparse({ fields: ERROR_CSV_FIELDS, data }, { newline: "\n" });
}
