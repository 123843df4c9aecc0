export type CellValue = string | number | boolean | Date | null;

export type Row = Record<string, CellValue>;

export type Dataset = {
  columns: string[];
  rows: Row[];
};

export type LoadErrorKind = "not_found" | "empty" | "io";

export type LoadError = {
  kind: LoadErrorKind;
  path: string;
  message: string;
};

export type LoadResult =
  | { ok: true; dataset: Dataset }
  | { ok: false; error: LoadError };
