// ---------------------------------------------------------------------------
// Release date parsing.  Only the calendar date matters; results are UTC
// midnight so the host never shifts them across a day boundary.
// ---------------------------------------------------------------------------

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

function monthIndex(name: string): number {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase());
}

function utcDate(year: number, month: number, day: number): Date | null {
  if (month < 0 || month > 11 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month, day));
  // Rejects 31 February and friends.
  if (date.getUTCMonth() !== month) return null;
  return date;
}

/**
 * Parse the release dates product pages show: "October 31, 2023",
 * "Oct. 31, 2023", "31 October 2023" and ISO "2023-10-31".
 */
export function parseReleaseDate(text: string): Date | null {
  const value = text.trim().replace(/\s+/g, " ");

  let m = /^(\d{4})-(\d{2})-(\d{2})/.exec(value);
  if (m) return utcDate(Number(m[1]), Number(m[2]) - 1, Number(m[3]));

  m = /^([A-Za-z]+)\.? (\d{1,2}),? (\d{4})$/.exec(value);
  if (m) return utcDate(Number(m[3]), monthIndex(m[1]), Number(m[2]));

  m = /^(\d{1,2}) ([A-Za-z]+)\.?,? (\d{4})$/.exec(value);
  if (m) return utcDate(Number(m[3]), monthIndex(m[2]), Number(m[1]));

  return null;
}
