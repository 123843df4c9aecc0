import fs from "fs";
import ExcelJS from "exceljs";
import type { CellValue as ExcelCellValue, Worksheet } from "exceljs";
import { columnNames } from "./columns.js";
import { SourceParseError, reportLoadError } from "./errors.js";
import type { CellValue, Dataset, LoadResult, Row } from "./types.js";

export const ARTIFACT_SHEET = "Main Chamber";
export const ARTIFACT_SKIP_ROWS = 3;

export type ArtifactLoadOptions = {
  sheetName?: string;
  skipRows?: number;
};

export function normalizeCell(value: ExcelCellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value === "" ? null : value;
  if (typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof Date) return value;
  if ("richText" in value) return value.richText.map(part => part.text).join("") || null;
  if ("hyperlink" in value) return value.text || null;
  if ("formula" in value || "sharedFormula" in value) return normalizeCell(value.result);
  // #N/A, #DIV/0! and friends
  return null;
}

function readCells(sheet: Worksheet, rowNumber: number, width: number): CellValue[] {
  const row = sheet.getRow(rowNumber);
  const cells: CellValue[] = [];
  for (let col = 1; col <= width; col++) {
    cells.push(normalizeCell(row.getCell(col).value));
  }
  return cells;
}

function sheetToDataset(sheet: Worksheet, skipRows: number): Dataset {
  const headerRow = skipRows + 1;
  // Skipped title rows do not widen the table.
  let width = 0;
  for (let r = headerRow; r <= sheet.rowCount; r++) {
    width = Math.max(width, sheet.getRow(r).cellCount);
  }
  if (sheet.rowCount < headerRow || width === 0) {
    throw new SourceParseError(`no header row after skipping ${skipRows} rows`);
  }

  const columns = columnNames(readCells(sheet, headerRow, width));
  const rows: Row[] = [];

  for (let r = headerRow + 1; r <= sheet.rowCount; r++) {
    const cells = readCells(sheet, r, width);
    if (cells.every(c => c === null)) continue;
    rows.push(Object.fromEntries(columns.map((name, i): [string, CellValue] => [name, cells[i] ?? null])));
  }

  return { columns, rows };
}

export async function loadArtifactData(excelFilePath: string, options: ArtifactLoadOptions = {}): Promise<LoadResult> {
  const { sheetName = ARTIFACT_SHEET, skipRows = ARTIFACT_SKIP_ROWS } = options;

  try {
    const stat = await fs.promises.stat(excelFilePath);
    if (stat.isDirectory()) {
      throw Object.assign(new Error(`${excelFilePath} is a directory`), { code: "EISDIR" });
    }
    if (stat.size === 0) throw new SourceParseError("file has no content");

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(excelFilePath);

    const sheet = workbook.getWorksheet(sheetName);
    if (!sheet) throw new SourceParseError(`worksheet named '${sheetName}' not found`);

    return { ok: true, dataset: sheetToDataset(sheet, skipRows) };
  } catch (err) {
    return { ok: false, error: reportLoadError(err, excelFilePath) };
  }
}
