import { CONTENT_LIMIT, ValidationReport } from "./report/report";
import { contentDigest } from "./utils/checksum";

export interface DuplicateGroup {
  rows: number[];
  content: string;
}

interface Bucket {
  rows: number[];
  preview: string;
}

const LISTED_SIBLINGS = 10;

/**
 * Groups rows by the digest of their trimmed text. Only the rows and a
 * preview of the first occurrence are kept per digest.
 */
export class DuplicateDetector {
  private buckets = new Map<string, Bucket>();

  record(row: number, line: string): void {
    const trimmed = line.trim();
    const digest = contentDigest(trimmed);
    const bucket = this.buckets.get(digest);
    if (bucket) {
      bucket.rows.push(row);
    } else {
      this.buckets.set(digest, {
        rows: [row],
        preview: trimmed.slice(0, CONTENT_LIMIT),
      });
    }
  }

  get size(): number {
    return this.buckets.size;
  }

  /** Groups of two or more rows, in order of first occurrence. */
  *groups(): IterableIterator<DuplicateGroup> {
    for (const { rows, preview } of this.buckets.values()) {
      if (rows.length >= 2) yield { rows, content: preview };
    }
  }

  /** One record per group member; stops when the report's list is full. */
  emitInto(report: ValidationReport): void {
    for (const group of this.groups()) {
      for (const row of group.rows) {
        if (report.duplicatesFull) return;
        report.addDuplicate(
          row,
          `Exact duplicate of row(s): ${listSiblings(group.rows, row)}`,
          group.content
        );
      }
    }
  }
}

function listSiblings(rows: number[], self: number): string {
  const shown: number[] = [];
  for (const r of rows) {
    if (r === self) continue;
    if (shown.length === LISTED_SIBLINGS) break;
    shown.push(r);
  }
  const rest = rows.length - 1 - shown.length;
  return rest > 0 ? `${shown.join(", ")} and ${rest} more` : shown.join(", ");
}
