const DATE_CANDIDATE = /\d{2}\/\d{2}\/\d{4}/g;
const MONTH_DAY_YEAR = /^(\d{2})\/(\d{2})\/(\d{4})$/;

export type JournalDate = {
  month: number;
  day: number;
  year: number;
};

export function findDateCandidates(text: string): string[] {
  return (text || "").match(DATE_CANDIDATE) || [];
}

/** Reads a candidate as MM/DD/YYYY. Null when it cannot name a month of a real year. */
export function parseJournalDate(candidate: string): JournalDate | null {
  const m = MONTH_DAY_YEAR.exec(candidate);
  if (!m) return null;

  const month = parseInt(m[1], 10);
  const day = parseInt(m[2], 10);
  const year = parseInt(m[3], 10);
  if (month < 1 || month > 12 || year < 1) return null;

  return { month, day, year };
}

// Day is bounded at 31 for every month; 02/30/2024 passes.
export function isWithinDateBounds(date: JournalDate): boolean {
  return date.month >= 1 && date.month <= 12 && date.day >= 1 && date.day <= 31;
}

export function extractJournalDates(journalText: string): string[] {
  return findDateCandidates(journalText).filter(candidate => {
    const date = parseJournalDate(candidate);
    return date !== null && isWithinDateBounds(date);
  });
}
