import fs from "fs";
import csv from "csv-parser";
import { createColumnNamer } from "./columns.js";
import { SourceParseError, reportLoadError } from "./errors.js";
import type { CellValue, Dataset, LoadResult, Row } from "./types.js";

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export function parseField(value: string): CellValue {
  if (value === "") return null;
  if (NUMERIC.test(value)) return Number(value);
  return value;
}

// An empty line parses to no cells, or a single empty one.
function isBlankLine(cells: string[]): boolean {
  return cells.length === 0 || (cells.length === 1 && cells[0] === "");
}

function readTsv(tsvFilePath: string): Promise<Dataset> {
  const namer = createColumnNamer();

  return new Promise<Dataset>((resolve, reject) => {
    let columns: string[] | null = null;
    const rows: Row[] = [];

    const source = fs.createReadStream(tsvFilePath);
    // Cells keyed by position; the header is picked here so leading blank lines are skipped.
    const parser = csv({ separator: "\t", headers: false });

    const fail = (err: unknown) => {
      source.destroy();
      parser.destroy();
      reject(err);
    };

    source.on("error", fail);
    parser.on("error", fail);
    parser.on("data", (record: Record<string, string>) => {
      const cells = Object.values(record);
      if (isBlankLine(cells)) return;

      if (columns === null) {
        columns = cells.map((c, i) => namer(i === 0 ? c.replace(/^\uFEFF/, "") : c, i));
        return;
      }
      rows.push(Object.fromEntries(columns.map((name, i): [string, CellValue] => {
        const raw = cells[i];
        return [name, raw === undefined ? null : parseField(raw)];
      })));
    });
    parser.on("end", () => {
      if (columns === null) {
        reject(new SourceParseError("no header line"));
        return;
      }
      resolve({ columns, rows });
    });

    source.pipe(parser);
  });
}

export async function loadLocationNotes(tsvFilePath: string): Promise<LoadResult> {
  try {
    return { ok: true, dataset: await readTsv(tsvFilePath) };
  } catch (err) {
    return { ok: false, error: reportLoadError(err, tsvFilePath) };
  }
}
