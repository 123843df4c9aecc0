import fs from "fs";
import { reportLoadError } from "../load/errors.js";
import type { LoadError } from "../load/types.js";

export type JournalResult =
  | { ok: true; text: string }
  | { ok: false; error: LoadError };

export async function readJournal(journalFilePath: string): Promise<JournalResult> {
  try {
    return { ok: true, text: await fs.promises.readFile(journalFilePath, "utf8") };
  } catch (err) {
    return { ok: false, error: reportLoadError(err, journalFilePath) };
  }
}
