import type { IssueKind, IssueRecord } from "./types";

/**
 * Browsing helpers over a report's error list: filtering by kind, lookup by
 * row, column sorting and the summary line shown above a filtered list.
 */

export const ALL_KINDS = "All Errors";

export type IssueFilter = IssueKind | typeof ALL_KINDS;
export type IssueColumn = "row" | "kind" | "description" | "preview";

export function issueKinds(issues: IssueRecord[]): IssueKind[] {
  return [...new Set(issues.map((i) => i.kind))].sort();
}

export function filterIssues(
  issues: IssueRecord[],
  filter: IssueFilter
): IssueRecord[] {
  if (filter === ALL_KINDS) return [...issues];
  return issues.filter((i) => i.kind === filter);
}

export function findIssueByRow(
  issues: IssueRecord[],
  row: number
): IssueRecord | undefined {
  return issues.find((i) => i.row === row);
}

function columnText(issue: IssueRecord, column: IssueColumn): string {
  switch (column) {
    case "kind":
      return issue.kind;
    case "description":
      return issue.description;
    case "preview":
      return previewContent(issue.content);
    case "row":
      return String(issue.row);
  }
}

/** Stable sort; rows compare numerically, everything else as text. */
export function sortIssues(
  issues: IssueRecord[],
  column: IssueColumn,
  reverse = false
): IssueRecord[] {
  const dir = reverse ? -1 : 1;
  return [...issues].sort((a, b) => {
    if (column === "row") return (a.row - b.row) * dir;
    return columnText(a, column).localeCompare(columnText(b, column)) * dir;
  });
}

export function navigatorStats(visible: number, total: number): string {
  if (visible === 0) return "No errors found";
  if (visible === total) return `Showing all ${total} error(s)`;
  return `Showing ${visible} of ${total} error(s)`;
}

export function previewContent(content: string | undefined, limit = 100): string {
  if (!content) return "";
  return content.length > limit ? `${content.slice(0, limit)}...` : content;
}

/** Row numbers as a clipboard-friendly list, e.g. "3, 7, 12". */
export function joinRowNumbers(issues: IssueRecord[]): string {
  return issues.map((i) => i.row).join(", ");
}
