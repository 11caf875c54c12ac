import { describe, it, expect } from "vitest";
import { DuplicateDetector } from "../../src/validator/duplicates";
import { ValidationReport } from "../../src/validator/report/report";

describe("DuplicateDetector", () => {
  it("groups rows whose trimmed content is identical", () => {
    const detector = new DuplicateDetector();
    detector.record(5, "  x,y ");
    detector.record(6, "x,z");
    detector.record(9, "x,y");

    expect([...detector.groups()]).toEqual([{ rows: [5, 9], content: "x,y" }]);
    expect(detector.size).toBe(2);
  });

  it("emits one record per member naming the other rows", () => {
    const detector = new DuplicateDetector();
    detector.record(5, "x,y");
    detector.record(9, "x,y");
    const report = new ValidationReport("dups.csv");

    detector.emitInto(report);

    expect(report.duplicates).toEqual([
      { row: 5, description: "Exact duplicate of row(s): 9", content: "x,y" },
      { row: 9, description: "Exact duplicate of row(s): 5", content: "x,y" },
    ]);
  });

  it("lists at most ten sibling rows", () => {
    const detector = new DuplicateDetector();
    for (let row = 1; row <= 13; row++) detector.record(row, "same");
    const report = new ValidationReport("dups.csv");

    detector.emitInto(report);

    expect(report.duplicates[0].description).toBe(
      "Exact duplicate of row(s): 2, 3, 4, 5, 6, 7, 8, 9, 10, 11 and 2 more"
    );
    expect(report.duplicates).toHaveLength(13);
  });

  it("stops at the report's cap across groups", () => {
    const detector = new DuplicateDetector();
    for (const row of [1, 2, 3]) detector.record(row, "a");
    for (const row of [4, 5]) detector.record(row, "b");
    const report = new ValidationReport("dups.csv", 4);

    detector.emitInto(report);

    expect(report.duplicates.map((d) => d.row)).toEqual([1, 2, 3, 4]);
  });

  it("yields nothing for unique rows", () => {
    const detector = new DuplicateDetector();
    detector.record(1, "a");
    detector.record(2, "b");
    expect([...detector.groups()]).toEqual([]);
  });
});
