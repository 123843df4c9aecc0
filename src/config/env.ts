import dotenv from "dotenv";
import { ARTIFACT_SHEET, ARTIFACT_SKIP_ROWS } from "../load/artifacts.js";
dotenv.config();

function int(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const v = parseInt(raw, 10);
  if (Number.isNaN(v)) throw new Error(`Invalid integer in env var: ${name}=${raw}`);
  return v;
}

export const env = {
  ARTIFACTS_FILE: process.env.ARTIFACTS_FILE || "artifacts.xlsx",
  LOCATIONS_FILE: process.env.LOCATIONS_FILE || "locations.tsv",
  JOURNAL_FILE: process.env.JOURNAL_FILE || "journal.txt",

  ARTIFACT_SHEET: process.env.ARTIFACT_SHEET || ARTIFACT_SHEET,
  ARTIFACT_SKIP_ROWS: int("ARTIFACT_SKIP_ROWS", ARTIFACT_SKIP_ROWS),
  PREVIEW_ROWS: int("PREVIEW_ROWS", 5)
};
