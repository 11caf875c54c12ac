import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../../util/errors";
import { DuplicateDetector } from "../duplicates";
import { detectDelimiter } from "../parsing/delimiter";
import {
  countDelimitersOutsideQuotes,
  quoteBalance,
} from "../parsing/tokenizer";
import {
  DEFAULT_MAX_ERRORS,
  ValidationReport,
  describeDelimiter,
} from "../report/report";
import type { DelimitedOptions } from "../report/types";
import { readLines, readSample } from "./lines";

export const SAMPLE_LINES = 50;
export const PROGRESS_EVERY = 1000;

/**
 * Streams a delimited file once and checks every non-blank line against the
 * column count of the first line. Never throws: I/O failures end up in the
 * report as a single FILE_READ_ERROR.
 */
export async function validateDelimited(
  filePath: string,
  options: DelimitedOptions = {}
): Promise<ValidationReport> {
  const {
    maxErrors = DEFAULT_MAX_ERRORS,
    checkDuplicates = false,
    signal,
    onProgress,
  } = options;
  const report = new ValidationReport(path.basename(filePath), maxErrors);
  report.fileType = "Delimited";

  try {
    const stat = await fs.promises.stat(filePath);
    if (!stat.isFile()) throw new Error(`${filePath} is not a regular file`);
    report.fileSize = stat.size;

    const sample = await readSample(filePath, SAMPLE_LINES);
    if (sample.length === 0) {
      report.addError(0, "EMPTY_FILE", "File is empty");
      report.finish();
      return report;
    }

    const delimiter = detectDelimiter(sample, options.delimiter);
    const expectedColumns = countDelimitersOutsideQuotes(sample[0], delimiter) + 1;
    report.delimiter = delimiter;
    report.expectedColumns = expectedColumns;
    report.fileType = `Delimited (delimiter: '${describeDelimiter(delimiter)}')`;

    const duplicates = checkDuplicates ? new DuplicateDetector() : null;
    let row = 0;

    for await (const { text, bytesRead } of readLines(filePath)) {
      if (signal?.aborted) {
        report.cancelled = true;
        break;
      }
      row++;
      if (text.trim() === "") continue;

      report.totalRows++;
      duplicates?.record(row, text);
      checkLine(report, row, text, delimiter, expectedColumns);

      if (onProgress && report.totalRows % PROGRESS_EVERY === 0) {
        const percent = Math.min(100, (bytesRead / report.fileSize) * 100);
        onProgress(percent, report.totalRows, report.errors.length);
      }
    }

    if (!report.cancelled) {
      duplicates?.emitInto(report);
      onProgress?.(100, report.totalRows, report.errors.length);
    }
  } catch (err) {
    report.fail("FILE_READ_ERROR", `Error reading file: ${errorMessage(err)}`);
  }

  report.finish();
  return report;
}

function checkLine(
  report: ValidationReport,
  row: number,
  line: string,
  delimiter: string,
  expectedColumns: number
) {
  const actualColumns = countDelimitersOutsideQuotes(line, delimiter) + 1;
  if (actualColumns !== expectedColumns) {
    report.invalidRows++;
    report.addError(
      row,
      "COLUMN_COUNT_MISMATCH",
      `Expected ${expectedColumns} columns, found ${actualColumns}`,
      line
    );
    return;
  }

  if (quoteBalance(line, '"') % 2 !== 0) {
    report.invalidRows++;
    report.addError(row, "UNCLOSED_QUOTES", "Unclosed double quotes detected", line);
  } else if (quoteBalance(line, "'") % 2 !== 0) {
    report.addWarning(row, "UNCLOSED_QUOTES", "Unclosed single quotes detected", line);
  } else {
    report.validRows++;
  }
}
