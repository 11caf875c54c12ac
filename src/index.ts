export { validateDelimited } from "./validator/readers/delimitedReader";
export { validateJSON } from "./validator/readers/jsonReader";
export { runValidation, detectFileKind } from "./validator/runner";
export {
  CANDIDATE_DELIMITERS,
  detectDelimiter,
  profileDelimiters,
} from "./validator/parsing/delimiter";
export type { DelimiterProfile } from "./validator/parsing/delimiter";
export {
  countDelimitersOutsideQuotes,
  splitQuotedLine,
  quoteBalance,
} from "./validator/parsing/tokenizer";
export { DuplicateDetector } from "./validator/duplicates";
export type { DuplicateGroup } from "./validator/duplicates";
export { ValidationReport, describeDelimiter } from "./validator/report/report";
export { formatReport } from "./validator/report/printer";
export { formatErrorsCsv } from "./validator/report/csv";
export { formatJsonReport } from "./validator/report/json";
export * from "./validator/report/navigator";
export { writeReports } from "./storage/writers";
export * from "./validator/report/types";
