// ============================================================================
// SPREADSHEET RESULT SINK — one sheet with every result row
// ============================================================================

import { mkdir, writeFile } from "fs/promises";
import { dirname, join } from "path";
import * as XLSX from "xlsx";
import type { QueryResult, ResultSink } from "../query-task";

export const RESULT_COLUMNS = ["Name", "ID Number", "Queried At", "Status", "Case Count", "Detail"] as const;

const SHEET_NAME = "Results";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** `<outputDir>/query_result_YYYYMMDD_HHMMSS.xlsx` in local time. */
export function defaultOutputPath(outputDir: string, now: Date): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return join(outputDir, `query_result_${stamp}.xlsx`);
}

export function resultRows(results: QueryResult[]): Array<Array<string | number>> {
  return results.map(result => [
    result.name,
    result.idNumber,
    formatTimestamp(result.queriedAt),
    result.status === "success" ? "Success" : "Failure",
    result.caseCount,
    result.detail,
  ]);
}

export function buildResultWorkbook(results: QueryResult[]): XLSX.WorkBook {
  const sheet = XLSX.utils.aoa_to_sheet([[...RESULT_COLUMNS], ...resultRows(results)]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAME);
  return workbook;
}

export interface ResultTarget {
  /** Explicit file; a timestamped file in `outputDir` when absent */
  outputPath?: string;
  outputDir: string;
}

export class XlsxResultSink implements ResultSink {
  constructor(
    private readonly target: ResultTarget,
    private readonly now: () => Date = () => new Date()
  ) {}

  async write(results: QueryResult[]): Promise<string> {
    const path = this.target.outputPath ?? defaultOutputPath(this.target.outputDir, this.now());
    await mkdir(dirname(path), { recursive: true });

    const buffer: Buffer = XLSX.write(buildResultWorkbook(results), { type: "buffer", bookType: "xlsx" });
    await writeFile(path, buffer);

    console.log(`[XlsxResultSink] Wrote ${results.length} row(s) to ${path}`);
    return path;
  }
}
