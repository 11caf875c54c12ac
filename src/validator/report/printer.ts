import { ValidationReport, describeDelimiter } from "./report";
import type { IssueRecord } from "./types";

const RULE = "=".repeat(80);
const THIN_RULE = "-".repeat(80);
const GROUP_LIMIT = 10;
const DUPLICATE_LIMIT = 20;

export const pad = (s: string, n = 22) => (s + "...").padEnd(n, ".");
const mark = (ok: boolean) => (ok ? "  ✅" : "  ❌");
const count = (n: number) => n.toLocaleString("en-US");

function formatTimestamp(d: Date): string {
  const p = (n: number) => n.toString().padStart(2, "0");
  return (
    `${d.getFullYear()}-${p(d.getMonth() + 1)}-${p(d.getDate())} ` +
    `${p(d.getHours())}:${p(d.getMinutes())}:${p(d.getSeconds())}`
  );
}

export function resultBanner(report: ValidationReport): string {
  if (report.cancelled) return "VALIDATION CANCELLED ⚠  (partial results)";
  return report.passed ? "RESULT: PASS ✅" : "RESULT: FAIL ❌";
}

function groupByKind(issues: IssueRecord[]): Map<string, IssueRecord[]> {
  const groups = new Map<string, IssueRecord[]>();
  for (const issue of issues) {
    const group = groups.get(issue.kind);
    if (group) group.push(issue);
    else groups.set(issue.kind, [issue]);
  }
  return groups;
}

function issueSection(
  title: string,
  noun: string,
  issues: IssueRecord[]
): string[] {
  const out = ["", RULE, `${title} (${issues.length} found)`, RULE];
  for (const [kind, group] of groupByKind(issues)) {
    out.push("", `${kind} (${group.length} occurrences):`, THIN_RULE);
    for (const issue of group.slice(0, GROUP_LIMIT)) {
      out.push(`  Row ${issue.row}: ${issue.description}`);
    }
    if (group.length > GROUP_LIMIT) {
      out.push(`  ... and ${group.length - GROUP_LIMIT} more similar ${noun}`);
    }
  }
  return out;
}

/** Grouped plain-text report, the same text the CLI prints and saves. */
export function formatReport(report: ValidationReport): string {
  const lines = [RULE, "DATA FILE VALIDATION REPORT", RULE, ""];

  lines.push(`${pad("file")}${report.fileName}`);
  lines.push(`${pad("file size")}${(report.fileSize / (1024 * 1024)).toFixed(2)} MB`);
  lines.push(`${pad("file type")}${report.fileType}`);
  lines.push(`${pad("duration")}${(report.durationMs / 1000).toFixed(2)} s`);
  if (report.finishedAt) {
    lines.push(`${pad("finished")}${formatTimestamp(report.finishedAt)}`);
  }

  lines.push("", THIN_RULE, resultBanner(report), THIN_RULE, "");

  lines.push(`${pad("total rows")}${count(report.totalRows)}`);
  lines.push(`${pad("valid rows")}${count(report.validRows)}`);
  lines.push(
    `${pad("invalid rows")}${count(report.invalidRows)}${mark(report.invalidRows === 0)}`
  );
  if (report.delimiter !== null) {
    lines.push(`${pad("delimiter")}'${describeDelimiter(report.delimiter)}'`);
  }
  if (report.expectedColumns > 0) {
    lines.push(`${pad("expected columns")}${report.expectedColumns}`);
  }

  if (report.errors.length) {
    lines.push(...issueSection("ERRORS", "errors", report.errors));
  }
  if (report.warnings.length) {
    lines.push(...issueSection("WARNINGS", "warnings", report.warnings));
  }

  if (report.duplicates.length) {
    lines.push("", RULE, `DUPLICATE ROWS (${report.duplicates.length} found)`, RULE);
    for (const dup of report.duplicates.slice(0, DUPLICATE_LIMIT)) {
      lines.push(`  Row ${dup.row}: ${dup.description}`);
    }
    if (report.duplicates.length > DUPLICATE_LIMIT) {
      lines.push(
        `  ... and ${report.duplicates.length - DUPLICATE_LIMIT} more duplicate rows`
      );
    }
  }

  if (!report.errors.length && !report.warnings.length && !report.cancelled) {
    lines.push("", "No errors or warnings found. File is valid! ✅");
  }

  lines.push("", RULE, "END OF REPORT", RULE);
  return lines.join("\n");
}

export function printHuman(report: ValidationReport) {
  console.log(formatReport(report));
}
