// ============================================================================
// SPREADSHEET RECORD SOURCE — identity numbers and names from the first sheet
// ============================================================================

import { readFile } from "fs/promises";
import * as XLSX from "xlsx";
import { maskIdNumber, RecordSourceError, type QueryRecord, type RecordSource } from "../query-task";

/** 17 digits followed by a digit or check letter X. */
export const ID_NUMBER_PATTERN = /^\d{17}[\dXx]$/;

export interface RecordColumns {
  /** Header text of the identity-number column */
  idColumn: string;
  /** Header text of the name column */
  nameColumn: string;
}

function cellText(cell: unknown): string {
  if (cell === null || cell === undefined) return "";
  return String(cell).trim();
}

/**
 * Parse the first sheet of a workbook into query records.
 * Rows missing the ID or the name are skipped silently; rows with an
 * invalid identity number are skipped with a warning. Missing header
 * columns are fatal.
 */
export function parseRecordSheet(buffer: Buffer, columns: RecordColumns, source: string): QueryRecord[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: "buffer" });
  } catch (error) {
    throw new RecordSourceError(
      `Failed to read spreadsheet: ${error instanceof Error ? error.message : String(error)}`,
      source
    );
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet || !sheet["!ref"]) {
    throw new RecordSourceError("Spreadsheet has no data", source);
  }

  const firstRow = XLSX.utils.decode_range(sheet["!ref"]).s.r + 1;
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: false, defval: "", blankrows: true });
  const header = (rows[0] ?? []).map(cellText);

  const idIndex = header.indexOf(columns.idColumn);
  const nameIndex = header.indexOf(columns.nameColumn);
  const missing = [
    ...(idIndex < 0 ? [columns.idColumn] : []),
    ...(nameIndex < 0 ? [columns.nameColumn] : []),
  ];
  if (missing.length > 0) {
    throw new RecordSourceError(`Missing column(s): ${missing.join(", ")}`, source);
  }

  const records: QueryRecord[] = [];
  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    const rowOrigin = firstRow + i;
    const idNumber = cellText(row[idIndex]).replace(/\s+/g, "");
    const displayName = cellText(row[nameIndex]);

    if (!idNumber || !displayName) continue;
    if (!ID_NUMBER_PATTERN.test(idNumber)) {
      console.warn(`[XlsxRecordSource] Row ${rowOrigin}: invalid identity number "${maskIdNumber(idNumber)}", skipped`);
      continue;
    }
    records.push({ idNumber: idNumber.toUpperCase(), displayName, rowOrigin });
  }
  return records;
}

export class XlsxRecordSource implements RecordSource {
  constructor(
    private readonly path: string,
    private readonly columns: RecordColumns
  ) {}

  get description(): string {
    return this.path;
  }

  async load(): Promise<QueryRecord[]> {
    let buffer: Buffer;
    try {
      buffer = await readFile(this.path);
    } catch (error) {
      throw new RecordSourceError(
        `Cannot open ${this.path}: ${error instanceof Error ? error.message : String(error)}`,
        this.path
      );
    }

    const records = parseRecordSheet(buffer, this.columns, this.path);
    console.log(`[XlsxRecordSource] Loaded ${records.length} record(s) from ${this.path}`);
    return records;
  }
}
