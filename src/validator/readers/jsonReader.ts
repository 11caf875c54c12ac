import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../../util/errors";
import { DEFAULT_MAX_ERRORS, ValidationReport } from "../report/report";
import type { ValidateOptions } from "../report/types";

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonTypeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * 1-based line of a JSON.parse failure, taken from the engine's message
 * (`line 3 column 5` or `at position 42`). Defaults to 1.
 */
export function parseErrorLine(message: string, source: string): number {
  const lineMatch = /line (\d+) column \d+/.exec(message);
  if (lineMatch) return Number(lineMatch[1]);

  const posMatch = /at position (\d+)/.exec(message);
  if (posMatch) {
    const pos = Math.min(Number(posMatch[1]), source.length);
    let line = 1;
    for (let i = 0; i < pos; i++) if (source[i] === "\n") line++;
    return line;
  }
  return 1;
}

/** "Missing keys: a, c; Extra keys: b", keys sorted. Empty when equal. */
export function describeKeyDrift(expected: Set<string>, actual: Set<string>): string {
  const missing = [...expected].filter((k) => !actual.has(k)).sort();
  const extra = [...actual].filter((k) => !expected.has(k)).sort();
  const parts: string[] = [];
  if (missing.length) parts.push(`Missing keys: ${missing.join(", ")}`);
  if (extra.length) parts.push(`Extra keys: ${extra.join(", ")}`);
  return parts.join("; ");
}

/**
 * Loads the whole document and checks its top-level shape. For an array of
 * objects, the first element's keys are the schema for the rest.
 */
export async function validateJSON(
  filePath: string,
  options: ValidateOptions = {}
): Promise<ValidationReport> {
  const { maxErrors = DEFAULT_MAX_ERRORS, signal, onProgress } = options;
  const report = new ValidationReport(path.basename(filePath), maxErrors);
  report.fileType = "JSON";

  try {
    report.fileSize = (await fs.promises.stat(filePath)).size;
    const content = await fs.promises.readFile(filePath, "utf8");
    onProgress?.(50, 0, 0);

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      const message = errorMessage(err);
      report.addError(
        parseErrorLine(message, content),
        "JSON_PARSE_ERROR",
        `Invalid JSON: ${message}`
      );
      report.invalidRows = 1;
      report.finish();
      return report;
    }

    if (Array.isArray(data)) {
      checkArray(report, data, signal);
    } else if (isJsonObject(data)) {
      report.totalRows = 1;
      report.validRows = 1;
      report.expectedColumns = Object.keys(data).length;
    } else {
      report.totalRows = 1;
      report.validRows = 1;
    }

    if (!report.cancelled) {
      onProgress?.(100, report.totalRows, report.errors.length);
    }
  } catch (err) {
    report.fail("FILE_READ_ERROR", `Error reading file: ${errorMessage(err)}`);
  }

  report.finish();
  return report;
}

function checkArray(
  report: ValidationReport,
  items: unknown[],
  signal: AbortSignal | undefined
) {
  report.totalRows = items.length;
  report.validRows = items.length;

  const first = items[0];
  if (!isJsonObject(first)) return;

  const schema = new Set(Object.keys(first));
  report.expectedColumns = schema.size;

  for (let i = 1; i < items.length; i++) {
    if (signal?.aborted) {
      report.cancelled = true;
      return;
    }
    const item = items[i];
    const row = i + 1;

    if (!isJsonObject(item)) {
      report.invalidRows++;
      report.validRows--;
      report.addError(
        row,
        "TYPE_MISMATCH",
        `Expected object, got ${jsonTypeName(item)}`,
        JSON.stringify(item)
      );
      continue;
    }

    const drift = describeKeyDrift(schema, new Set(Object.keys(item)));
    if (drift) {
      report.addWarning(row, "KEY_MISMATCH", drift, JSON.stringify(item));
    }
  }
}
