import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import os from "os";
import path from "path";
import * as XLSX from "xlsx";
import type { QueryResult } from "../../query-task";
import { defaultOutputPath, formatTimestamp, RESULT_COLUMNS, XlsxResultSink } from "../result-sink";

const QUERIED_AT = new Date(2024, 2, 1, 8, 30, 5);

const RESULTS: QueryResult[] = [
  {
    name: "Person One",
    idNumber: "110101199001011234",
    queriedAt: QUERIED_AT,
    status: "success",
    caseCount: 7,
    detail: "query succeeded, execution records found",
  },
  {
    name: "Person Two",
    idNumber: "110101199202022345",
    queriedAt: QUERIED_AT,
    status: "failure",
    caseCount: 0,
    detail: "captcha recognition failed",
  },
];

function readRows(file: string): unknown[][] {
  const workbook = XLSX.read(readFileSync(file), { type: "buffer" });
  return XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[workbook.SheetNames[0]], { header: 1 });
}

describe("formatTimestamp", () => {
  it("formats local time with zero padding", () => {
    expect(formatTimestamp(QUERIED_AT)).toBe("2024-03-01 08:30:05");
  });
});

describe("defaultOutputPath", () => {
  it("stamps the file name with the local date and time", () => {
    expect(defaultOutputPath("output", QUERIED_AT)).toBe(path.join("output", "query_result_20240301_083005.xlsx"));
  });
});

describe("XlsxResultSink", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("writes a header and one row per result", async () => {
    dir = mkdtempSync(path.join(os.tmpdir(), "results-"));
    const file = path.join(dir, "out.xlsx");

    const written = await new XlsxResultSink({ outputPath: file, outputDir: dir }).write(RESULTS);

    expect(written).toBe(file);
    expect(readRows(file)).toEqual([
      [...RESULT_COLUMNS],
      ["Person One", "110101199001011234", "2024-03-01 08:30:05", "Success", 7, "query succeeded, execution records found"],
      ["Person Two", "110101199202022345", "2024-03-01 08:30:05", "Failure", 0, "captcha recognition failed"],
    ]);
  });

  it("creates the output directory and a timestamped file", async () => {
    dir = mkdtempSync(path.join(os.tmpdir(), "results-"));
    const outputDir = path.join(dir, "nested", "output");

    const written = await new XlsxResultSink({ outputDir }, () => QUERIED_AT).write([]);

    expect(written).toBe(path.join(outputDir, "query_result_20240301_083005.xlsx"));
    expect(readRows(written)).toEqual([[...RESULT_COLUMNS]]);
  });
});
