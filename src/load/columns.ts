import type { CellValue } from "./types.js";

export type ColumnNamer = (raw: CellValue | undefined, index: number) => string;

function labelOf(raw: CellValue | undefined): string {
  if (raw === null || raw === undefined) return "";
  if (raw instanceof Date) return raw.toISOString();
  return String(raw);
}

/**
 * Turns header cells into unique column names, left to right.
 * Blank headers become `Unnamed: <index>`; repeats get `.1`, `.2`, ... suffixes.
 */
export function createColumnNamer(): ColumnNamer {
  const seen = new Map<string, number>();
  const taken = new Set<string>();

  return (raw, index) => {
    const base = labelOf(raw) || `Unnamed: ${index}`;
    let name = base;
    let n = seen.get(base) ?? 0;
    while (taken.has(name)) {
      n++;
      name = `${base}.${n}`;
    }
    seen.set(base, n);
    taken.add(name);
    return name;
  };
}

export function columnNames(headers: (CellValue | undefined)[]): string[] {
  const name = createColumnNamer();
  return headers.map((h, i) => name(h, i));
}
