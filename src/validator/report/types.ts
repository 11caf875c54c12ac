export type FileKind = "delimited" | "json";

export const ISSUE_KINDS = [
  "EMPTY_FILE",
  "FILE_READ_ERROR",
  "COLUMN_COUNT_MISMATCH",
  "UNCLOSED_QUOTES",
  "JSON_PARSE_ERROR",
  "TYPE_MISMATCH",
  "KEY_MISMATCH",
  "DUPLICATE_ROW",
] as const;

export type IssueKind = (typeof ISSUE_KINDS)[number];

export interface IssueRecord {
  row: number;
  kind: IssueKind;
  description: string;
  content?: string;
}

export interface DuplicateRecord {
  row: number;
  description: string;
  content: string;
}

/**
 * (percent 0-100, rows counted so far, errors recorded so far).
 * Called from inside the scan loop, so it must return quickly.
 */
export type ProgressCallback = (
  percent: number,
  rowsProcessed: number,
  errorsSoFar: number
) => void;

export interface ValidateOptions {
  maxErrors?: number;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

export interface DelimitedOptions extends ValidateOptions {
  delimiter?: string;
  checkDuplicates?: boolean;
}

export interface ReportJson {
  fileName: string;
  fileSize: number;
  fileType: string;
  delimiter: string | null;
  expectedColumns: number;
  totalRows: number;
  validRows: number;
  invalidRows: number;
  startedAt: string;
  finishedAt: string | null;
  durationMs: number;
  passed: boolean;
  cancelled: boolean;
  errors: IssueRecord[];
  warnings: IssueRecord[];
  duplicates: DuplicateRecord[];
}
