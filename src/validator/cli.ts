#!/usr/bin/env node
import { Command, Option } from "commander";
import { writeReports } from "../storage/writers";
import { cfg } from "../util/config";
import { errorMessage } from "../util/errors";
import { log } from "../util/logger";
import { type CliOptions, parseDelimiter, parsePositiveInt } from "./options";
import {
  ALL_KINDS,
  filterIssues,
  navigatorStats,
  previewContent,
} from "./report/navigator";
import { ISSUE_KINDS } from "./report/types";
import { printHuman } from "./report/printer";
import { runValidation } from "./runner";

const EXIT_PASS = 0;
const EXIT_ERROR = 1;
const EXIT_FAIL = 2;
const EXIT_CANCELLED = 3;

const program = new Command();

program
  .name("datafile-validate")
  .description(
    "Checks delimited (CSV/TSV/pipe/...) and JSON files for structural defects"
  )
  .argument("<file>", "file to validate")
  .addOption(
    new Option("--type <type>", "file type")
      .choices(["auto", "delimited", "json"])
      .default("auto")
  )
  .option(
    "--delimiter <char>",
    "pin the delimiter instead of detecting it (tab, pipe, ... accepted)",
    parseDelimiter
  )
  .option(
    "--max-errors <n>",
    "cap for stored errors, warnings and duplicates each",
    parsePositiveInt,
    cfg.VALIDATOR_MAX_ERRORS
  )
  .option("--duplicates", "report exact duplicate rows", false)
  .addOption(
    new Option("--kind <kind>", "list stored errors of one kind after the report")
      .choices([ALL_KINDS, ...ISSUE_KINDS])
  )
  .option("--report-dir <dir>", "folder for saved reports", cfg.VALIDATOR_REPORT_FOLDER)
  .option("--json", "also save a JSON report", false)
  .option("--no-save", "print only, do not write report files")
  .action(async (file: string, opts: CliOptions) => {
    const controller = new AbortController();
    const onSigint = () => {
      log.warn("interrupt received, stopping after the current row");
      controller.abort();
    };
    process.once("SIGINT", onSigint);

    let lastLogged = -1;
    try {
      const report = await runValidation({
        filePath: file,
        kind: opts.type === "auto" ? undefined : opts.type,
        delimiter: opts.delimiter,
        maxErrors: opts.maxErrors,
        checkDuplicates: opts.duplicates,
        signal: controller.signal,
        onProgress: (percent, rows) => {
          const step = Math.floor(percent / 10);
          if (step === lastLogged) return;
          lastLogged = step;
          log.info({ rows }, `processing... ${percent.toFixed(1)}%`);
        },
      });

      printHuman(report);

      if (opts.kind) {
        const filter = opts.kind;
        const shown = filterIssues(report.errors, filter);
        console.log("");
        console.log(
          `[${filter === ALL_KINDS ? "ALL" : filter}] ${navigatorStats(shown.length, report.errors.length)}`
        );
        for (const issue of shown) {
          console.log(
            `  Row ${issue.row}: ${issue.description}  ${previewContent(issue.content)}`
          );
        }
      }

      if (opts.save) {
        const written = await writeReports(report, opts.reportDir, {
          json: opts.json,
          safetyBufferBytes: cfg.VALIDATOR_DISK_BUFFER_MB * 1024 * 1024,
        });
        for (const p of written) log.info(`Report written: ${p}`);
      }

      process.exitCode = report.cancelled
        ? EXIT_CANCELLED
        : report.passed
          ? EXIT_PASS
          : EXIT_FAIL;
    } catch (err) {
      log.error(`Validator error: ${errorMessage(err)}`);
      process.exitCode = EXIT_ERROR;
    } finally {
      process.off("SIGINT", onSigint);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  log.error(`Validator error: ${errorMessage(err)}`);
  process.exitCode = EXIT_ERROR;
});
