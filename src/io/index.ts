// ============================================================================
// IO — spreadsheet records and results, OCR service
// ============================================================================

export { XlsxRecordSource, parseRecordSheet, ID_NUMBER_PATTERN } from "./record-source";
export type { RecordColumns } from "./record-source";
export {
  XlsxResultSink,
  RESULT_COLUMNS,
  buildResultWorkbook,
  defaultOutputPath,
  formatTimestamp,
  resultRows,
} from "./result-sink";
export type { ResultTarget } from "./result-sink";
export { HttpOcrEngine, OcrError } from "./ocr-engine";
export type { FetchLike, OcrSettings } from "./ocr-engine";
