import type {
  DuplicateRecord,
  IssueKind,
  IssueRecord,
  ReportJson,
} from "./types";

export const DEFAULT_MAX_ERRORS = 1000;
export const CONTENT_LIMIT = 500;

/**
 * Findings of one validation run. Only the validator that created it writes
 * to it; once returned it belongs to the caller.
 */
export class ValidationReport {
  fileSize = 0;
  fileType = "";
  delimiter: string | null = null;
  expectedColumns = 0;

  totalRows = 0;
  validRows = 0;
  invalidRows = 0;

  readonly errors: IssueRecord[] = [];
  readonly warnings: IssueRecord[] = [];
  readonly duplicates: DuplicateRecord[] = [];

  readonly startedAt = new Date();
  finishedAt: Date | null = null;

  passed = false;
  cancelled = false;

  constructor(
    readonly fileName: string,
    readonly maxErrors: number = DEFAULT_MAX_ERRORS
  ) {}

  /** Returns false once the error list is full. */
  addError(
    row: number,
    kind: IssueKind,
    description: string,
    content?: string
  ): boolean {
    return pushCapped(this.errors, this.maxErrors, {
      row,
      kind,
      description,
      ...contentField(content),
    });
  }

  addWarning(
    row: number,
    kind: IssueKind,
    description: string,
    content?: string
  ): boolean {
    return pushCapped(this.warnings, this.maxErrors, {
      row,
      kind,
      description,
      ...contentField(content),
    });
  }

  addDuplicate(row: number, description: string, content: string): boolean {
    return pushCapped(this.duplicates, this.maxErrors, {
      row,
      description,
      content: content.slice(0, CONTENT_LIMIT),
    });
  }

  get errorsFull(): boolean {
    return this.errors.length >= this.maxErrors;
  }

  get duplicatesFull(): boolean {
    return this.duplicates.length >= this.maxErrors;
  }

  /** Fatal I/O failure: always recorded, even past the cap. */
  fail(kind: IssueKind, description: string) {
    this.errors.push({ row: 0, kind, description });
  }

  finish() {
    this.finishedAt = new Date();
    this.passed = this.invalidRows === 0 && this.errors.length === 0;
  }

  get durationMs(): number {
    return this.finishedAt
      ? this.finishedAt.getTime() - this.startedAt.getTime()
      : 0;
  }

  toJSON(): ReportJson {
    return {
      fileName: this.fileName,
      fileSize: this.fileSize,
      fileType: this.fileType,
      delimiter: this.delimiter,
      expectedColumns: this.expectedColumns,
      totalRows: this.totalRows,
      validRows: this.validRows,
      invalidRows: this.invalidRows,
      startedAt: this.startedAt.toISOString(),
      finishedAt: this.finishedAt ? this.finishedAt.toISOString() : null,
      durationMs: this.durationMs,
      passed: this.passed,
      cancelled: this.cancelled,
      errors: [...this.errors],
      warnings: [...this.warnings],
      duplicates: [...this.duplicates],
    };
  }
}

function pushCapped<T>(list: T[], cap: number, item: T): boolean {
  if (list.length >= cap) return false;
  list.push(item);
  return true;
}

function contentField(content: string | undefined): { content?: string } {
  return content ? { content: content.slice(0, CONTENT_LIMIT) } : {};
}

/** Printable form of a delimiter, e.g. `\t` for tab. */
export function describeDelimiter(delimiter: string): string {
  return JSON.stringify(delimiter).slice(1, -1);
}
