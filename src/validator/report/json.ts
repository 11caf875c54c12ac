import type { ValidationReport } from "./report";

export function formatJsonReport(report: ValidationReport): string {
  return JSON.stringify(report, null, 2);
}
