import type { CellValue, Dataset, Row } from "./types.js";

export type ColumnType = "number" | "string" | "boolean" | "date" | "mixed" | "empty";

export type ColumnInfo = {
  name: string;
  nonNull: number;
  type: ColumnType;
};

export type DatasetInfo = {
  rowCount: number;
  columns: ColumnInfo[];
};

function typeOf(value: Exclude<CellValue, null>): ColumnType {
  if (value instanceof Date) return "date";
  if (typeof value === "number") return "number";
  if (typeof value === "boolean") return "boolean";
  return "string";
}

export function previewRows(dataset: Dataset, count = 5): Row[] {
  return dataset.rows.slice(0, Math.max(0, count));
}

export function describeDataset(dataset: Dataset): DatasetInfo {
  const columns = dataset.columns.map((name): ColumnInfo => {
    const kinds = new Set<ColumnType>();
    let nonNull = 0;
    for (const row of dataset.rows) {
      const v = row[name];
      if (v === null || v === undefined) continue;
      nonNull++;
      kinds.add(typeOf(v));
    }
    const type: ColumnType = kinds.size === 0 ? "empty" : kinds.size > 1 ? "mixed" : [...kinds][0];
    return { name, nonNull, type };
  });

  return { rowCount: dataset.rows.length, columns };
}

export function formatDatasetInfo(dataset: Dataset): string[] {
  const info = describeDataset(dataset);
  return [
    `Rows: ${info.rowCount}, Columns: ${info.columns.length}`,
    ...info.columns.map(c => `${c.name}: ${c.nonNull} non-null ${c.type}`)
  ];
}
