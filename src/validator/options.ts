import { InvalidArgumentError } from "commander";
import type { IssueFilter } from "./report/navigator";
import type { FileKind } from "./report/types";

export interface CliOptions {
  type: "auto" | FileKind;
  delimiter?: string;
  maxErrors: number;
  duplicates: boolean;
  kind?: IssueFilter;
  reportDir: string;
  json: boolean;
  save: boolean;
}

const DELIMITER_ALIASES: Record<string, string> = {
  tab: "\t",
  "\\t": "\t",
  comma: ",",
  pipe: "|",
  semicolon: ";",
  colon: ":",
  asterisk: "*",
};

export function parseDelimiter(value: string): string {
  const delimiter = DELIMITER_ALIASES[value.toLowerCase()] ?? value;
  if (delimiter.length !== 1) {
    throw new InvalidArgumentError("Delimiter must be a single character.");
  }
  return delimiter;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}
