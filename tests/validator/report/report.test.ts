import { describe, it, expect } from "vitest";
import { formatErrorsCsv } from "../../../src/validator/report/csv";
import { formatJsonReport } from "../../../src/validator/report/json";
import { formatReport } from "../../../src/validator/report/printer";
import {
  ValidationReport,
  describeDelimiter,
} from "../../../src/validator/report/report";

describe("ValidationReport", () => {
  it("truncates stored content to 500 characters", () => {
    const report = new ValidationReport("big.csv");
    report.addError(1, "COLUMN_COUNT_MISMATCH", "Expected 2 columns, found 1", "x".repeat(800));
    report.addDuplicate(2, "Exact duplicate of row(s): 3", "y".repeat(600));

    expect(report.errors[0].content).toHaveLength(500);
    expect(report.duplicates[0].content).toHaveLength(500);
  });

  it("omits content when none is given", () => {
    const report = new ValidationReport("a.csv");
    report.addWarning(4, "KEY_MISMATCH", "Extra keys: b");
    expect(report.warnings[0]).toStrictEqual({
      row: 4,
      kind: "KEY_MISMATCH",
      description: "Extra keys: b",
    });
  });

  it("caps each list at maxErrors", () => {
    const report = new ValidationReport("a.csv", 2);
    expect(report.addError(1, "UNCLOSED_QUOTES", "one")).toBe(true);
    expect(report.addError(2, "UNCLOSED_QUOTES", "two")).toBe(true);
    expect(report.addError(3, "UNCLOSED_QUOTES", "three")).toBe(false);
    expect(report.errors).toHaveLength(2);
    expect(report.errorsFull).toBe(true);
    expect(report.addWarning(1, "UNCLOSED_QUOTES", "w")).toBe(true);
  });

  it("always records a fatal failure", () => {
    const report = new ValidationReport("a.csv", 1);
    report.addError(1, "UNCLOSED_QUOTES", "one");
    report.fail("FILE_READ_ERROR", "Error reading file: gone");
    expect(report.errors.map((e) => e.kind)).toEqual(["UNCLOSED_QUOTES", "FILE_READ_ERROR"]);
    expect(report.errors[1].row).toBe(0);
  });

  it("passes when there are no invalid rows and no errors", () => {
    const report = new ValidationReport("a.csv");
    report.totalRows = 3;
    report.validRows = 2;
    report.addWarning(3, "UNCLOSED_QUOTES", "Unclosed single quotes detected");
    report.addDuplicate(2, "Exact duplicate of row(s): 3", "a");
    report.finish();

    expect(report.passed).toBe(true);
    expect(report.finishedAt).toBeInstanceOf(Date);
  });

  it("fails on invalid rows even when the error list is empty", () => {
    const report = new ValidationReport("a.csv", 1);
    report.invalidRows = 1;
    report.finish();
    expect(report.passed).toBe(false);
  });

  it("serialises to plain JSON", () => {
    const report = new ValidationReport("a.csv");
    report.delimiter = "\t";
    report.addError(2, "COLUMN_COUNT_MISMATCH", "Expected 2 columns, found 1", "x");
    report.finish();

    const parsed = JSON.parse(formatJsonReport(report));
    expect(parsed.fileName).toBe("a.csv");
    expect(parsed.delimiter).toBe("\t");
    expect(parsed.passed).toBe(false);
    expect(parsed.cancelled).toBe(false);
    expect(parsed.errors).toEqual([
      { row: 2, kind: "COLUMN_COUNT_MISMATCH", description: "Expected 2 columns, found 1", content: "x" },
    ]);
    expect(parsed.startedAt).toBe(report.startedAt.toISOString());
  });
});

describe("describeDelimiter", () => {
  it("escapes control characters", () => {
    expect(describeDelimiter("\t")).toBe("\\t");
    expect(describeDelimiter("|")).toBe("|");
  });
});

function failingReport(): ValidationReport {
  const report = new ValidationReport("people.csv");
  report.fileSize = 2048;
  report.fileType = "Delimited (delimiter: ',')";
  report.delimiter = ",";
  report.expectedColumns = 3;
  report.totalRows = 13;
  report.validRows = 1;
  report.invalidRows = 12;
  for (let row = 2; row <= 13; row++) {
    report.addError(row, "COLUMN_COUNT_MISMATCH", "Expected 3 columns, found 2", "a,b");
  }
  report.finish();
  return report;
}

describe("formatReport", () => {
  it("groups errors by kind and shows the first ten", () => {
    const lines = formatReport(failingReport()).split("\n");

    expect(lines).toContain("RESULT: FAIL ❌");
    expect(lines).toContain("file..................people.csv");
    expect(lines).toContain("file size.............0.00 MB");
    expect(lines).toContain("total rows............13");
    expect(lines).toContain("invalid rows..........12  ❌");
    expect(lines).toContain("delimiter.............','");
    expect(lines).toContain("expected columns......3");
    expect(lines).toContain("ERRORS (12 found)");
    expect(lines).toContain("COLUMN_COUNT_MISMATCH (12 occurrences):");
    expect(lines).toContain("  Row 11: Expected 3 columns, found 2");
    expect(lines).not.toContain("  Row 12: Expected 3 columns, found 2");
    expect(lines).toContain("  ... and 2 more similar errors");
    expect(lines[lines.length - 2]).toBe("END OF REPORT");
  });

  it("reports a clean file", () => {
    const report = new ValidationReport("ok.csv");
    report.totalRows = 1500;
    report.validRows = 1500;
    report.finish();
    const lines = formatReport(report).split("\n");

    expect(lines).toContain("RESULT: PASS ✅");
    expect(lines).toContain("total rows............1,500");
    expect(lines).toContain("invalid rows..........0  ✅");
    expect(lines).toContain("No errors or warnings found. File is valid! ✅");
  });

  it("shows the cancellation banner instead of pass or fail", () => {
    const report = new ValidationReport("big.csv");
    report.cancelled = true;
    report.finish();
    const lines = formatReport(report).split("\n");

    expect(lines).toContain("VALIDATION CANCELLED ⚠  (partial results)");
    expect(lines).not.toContain("RESULT: PASS ✅");
    expect(lines).not.toContain("No errors or warnings found. File is valid! ✅");
  });

  it("lists warnings in their own section", () => {
    const report = new ValidationReport("a.csv");
    report.addWarning(4, "UNCLOSED_QUOTES", "Unclosed single quotes detected");
    report.finish();
    const lines = formatReport(report).split("\n");

    expect(lines).toContain("WARNINGS (1 found)");
    expect(lines).toContain("UNCLOSED_QUOTES (1 occurrences):");
    expect(lines).toContain("  Row 4: Unclosed single quotes detected");
  });

  it("shows up to twenty duplicates", () => {
    const report = new ValidationReport("a.csv");
    for (let row = 1; row <= 25; row++) {
      report.addDuplicate(row, "Exact duplicate of row(s): 99", "same");
    }
    report.finish();
    const lines = formatReport(report).split("\n");

    expect(lines).toContain("DUPLICATE ROWS (25 found)");
    expect(lines).toContain("  Row 20: Exact duplicate of row(s): 99");
    expect(lines).not.toContain("  Row 21: Exact duplicate of row(s): 99");
    expect(lines).toContain("  ... and 5 more duplicate rows");
  });
});

describe("formatErrorsCsv", () => {
  it("writes one line per error with a quoted preview", () => {
    const report = new ValidationReport("a.csv");
    report.addError(3, "COLUMN_COUNT_MISMATCH", "Expected 3 columns, found 2", "a,b");
    report.fail("FILE_READ_ERROR", "Error reading file: boom");

    expect(formatErrorsCsv(report).split("\n")).toEqual([
      "Row Number,Error Type,Description,Row Content Preview",
      '3,COLUMN_COUNT_MISMATCH,"Expected 3 columns, found 2","a,b"',
      "0,FILE_READ_ERROR,Error reading file: boom,",
    ]);
  });

  it("cuts the preview at 200 characters", () => {
    const report = new ValidationReport("a.csv");
    report.addError(1, "UNCLOSED_QUOTES", "Unclosed double quotes detected", "x".repeat(450));

    const [, row] = formatErrorsCsv(report).split("\n");
    expect(row).toBe(`1,UNCLOSED_QUOTES,Unclosed double quotes detected,${"x".repeat(200)}`);
  });
});
