import path from "node:path";
import { log } from "../util/logger";
import { validateDelimited } from "./readers/delimitedReader";
import { validateJSON } from "./readers/jsonReader";
import { ValidationReport, describeDelimiter } from "./report/report";
import type { FileKind, ProgressCallback } from "./report/types";

export function detectFileKind(filePath: string): FileKind {
  return path.extname(filePath).toLowerCase() === ".json" ? "json" : "delimited";
}

export async function runValidation(opts: {
  filePath: string;
  kind?: FileKind;
  delimiter?: string;
  maxErrors?: number;
  checkDuplicates?: boolean;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}): Promise<ValidationReport> {
  const kind = opts.kind ?? detectFileKind(opts.filePath);
  log.info({ file: opts.filePath, kind }, "validation started");

  const onProgress: ProgressCallback = (percent, rows, errors) => {
    log.debug({ percent: Number(percent.toFixed(1)), rows, errors }, "progress");
    opts.onProgress?.(percent, rows, errors);
  };

  const report =
    kind === "json"
      ? await validateJSON(opts.filePath, {
          maxErrors: opts.maxErrors,
          signal: opts.signal,
          onProgress,
        })
      : await validateDelimited(opts.filePath, {
          delimiter: opts.delimiter,
          maxErrors: opts.maxErrors,
          checkDuplicates: opts.checkDuplicates,
          signal: opts.signal,
          onProgress,
        });

  log.info(
    {
      delimiter: report.delimiter === null ? undefined : describeDelimiter(report.delimiter),
      expectedColumns: report.expectedColumns,
      totalRows: report.totalRows,
      invalidRows: report.invalidRows,
      errors: report.errors.length,
      warnings: report.warnings.length,
      duplicates: report.duplicates.length,
      durationMs: report.durationMs,
    },
    report.cancelled
      ? "validation cancelled"
      : report.passed
        ? "validation passed"
        : "validation failed"
  );
  return report;
}
