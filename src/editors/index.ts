/**
 * Header editors and their helpers
 */

export { BinaryHeaderEditor } from "./binary-editor";
export type { ChangeRecordPolicy, ThrottleDecision } from "./change-policy";
export { ChangeLogThrottle, RECORD_ALL_CHANGES, SampledChangePolicy } from "./change-policy";
export { CsvTable, loadCsvTable, parseCsv, parseCsvRow } from "./csv-import";
export { EbcdicEditor } from "./ebcdic-editor";
export type { TraceEditOptions } from "./trace-editor";
export {
  DEFAULT_PREVIEW_TRACES,
  MAX_STORED_ERRORS,
  PROGRESS_INTERVAL,
  TraceHeaderEditor,
  traceVariables,
} from "./trace-editor";
