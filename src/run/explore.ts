import { env } from "../config/env.js";
import { loadArtifactData } from "../load/artifacts.js";
import { loadLocationNotes } from "../load/locations.js";
import { formatDatasetInfo, previewRows } from "../load/summary.js";
import { readJournal } from "../extract/journal.js";
import { extractJournalDates } from "../extract/dates.js";
import { extractSecretCodes } from "../extract/codes.js";
import type { LoadResult } from "../load/types.js";

function argValue(name: string): string | undefined {
  const idx = process.argv.indexOf(name);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function printTable(result: LoadResult) {
  if (!result.ok) return;
  console.log(`Successfully loaded dataset. First ${env.PREVIEW_ROWS} rows:`);
  console.table(previewRows(result.dataset, env.PREVIEW_ROWS));
  console.log("\nDataset Info:");
  for (const line of formatDatasetInfo(result.dataset)) console.log(line);
}

async function main() {
  const artifactsFile = argValue("--artifacts") || env.ARTIFACTS_FILE;
  const locationsFile = argValue("--locations") || env.LOCATIONS_FILE;
  const journalFile = argValue("--journal") || env.JOURNAL_FILE;

  console.log(`--- Loading Artifact Data from ${artifactsFile} ---`);
  try {
    printTable(await loadArtifactData(artifactsFile, {
      sheetName: env.ARTIFACT_SHEET,
      skipRows: env.ARTIFACT_SKIP_ROWS
    }));
  } catch (e) {
    console.error("Artifact stage failed:", e);
  }

  console.log(`\n--- Loading Location Notes from ${locationsFile} ---`);
  try {
    printTable(await loadLocationNotes(locationsFile));
  } catch (e) {
    console.error("Location stage failed:", e);
  }

  console.log(`\n--- Processing Journal from ${journalFile} ---`);
  try {
    const journal = await readJournal(journalFile);
    if (journal.ok) {
      console.log("\nExtracting Dates...");
      console.log("Found dates:", extractJournalDates(journal.text));

      console.log("\nExtracting Secret Codes...");
      console.log("Found codes:", extractSecretCodes(journal.text));
    }
  } catch (e) {
    console.error("Journal stage failed:", e);
  }
}

main().catch(e => { console.error(e); process.exitCode = 1; });
