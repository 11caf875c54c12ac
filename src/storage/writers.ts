import fs from "node:fs";
import path from "node:path";
import { canFitOnDisk } from "../util/diskSpace";
import { formatErrorsCsv } from "../validator/report/csv";
import { formatJsonReport } from "../validator/report/json";
import { formatReport } from "../validator/report/printer";
import type { ValidationReport } from "../validator/report/report";

export interface WriteOptions {
  /** free space to leave on the disk, bytes */
  safetyBufferBytes?: number;
  json?: boolean;
  now?: Date;
}

// yyyymmdd_hhmmss
export function reportStamp(now: Date = new Date()): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

/**
 * Saves the text report, the error CSV (when there are errors) and
 * optionally the JSON report into `dir`. Returns the written paths.
 */
export async function writeReports(
  report: ValidationReport,
  dir: string,
  opts: WriteOptions = {}
): Promise<string[]> {
  const stamp = reportStamp(opts.now);
  const outputs: [string, string][] = [
    [`validation_report_${stamp}.txt`, formatReport(report)],
  ];
  if (report.errors.length) {
    outputs.push([`errors_${stamp}.csv`, formatErrorsCsv(report)]);
  }
  if (opts.json) {
    outputs.push([`validation_report_${stamp}.json`, formatJsonReport(report)]);
  }

  await fs.promises.mkdir(dir, { recursive: true });

  const totalBytes = outputs.reduce(
    (sum, [, body]) => sum + Buffer.byteLength(body, "utf8"),
    0
  );
  if (!(await canFitOnDisk(totalBytes, dir, opts.safetyBufferBytes))) {
    throw new Error(`Not enough free disk space in ${dir} to write reports`);
  }

  const written: string[] = [];
  for (const [name, body] of outputs) {
    const target = path.join(dir, name);
    await fs.promises.writeFile(target, body, "utf8");
    written.push(target);
  }
  return written;
}
