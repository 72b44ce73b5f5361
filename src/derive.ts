import * as d3 from 'd3';
import type { CrashRecord, RecordFilter, Season } from './types';

const DATE_FORMATS = ['%Y-%m-%d', '%Y-%m-%dT%H:%M:%S', '%Y-%m-%dT%H:%M:%SZ', '%Y-%m-%d %H:%M', '%m/%d/%Y'];

const parsers = DATE_FORMATS.map((specifier) => ({
  parse: d3.utcParse(specifier),
  format: d3.utcFormat(specifier)
}));

const isoDate = d3.utcFormat('%Y-%m-%d');

const SUMMER_FIRST = 5;
const SUMMER_LAST = 10;

export interface RawCrash {
  id: string;
  date: Date;
  latitude: number;
  longitude: number;
  fatalities: number;
  category: string;
}

// Round-tripping rejects dates d3 would roll over, such as 2019-02-30.
export function parseCrashDate(text: string): Date | null {
  const trimmed = text.trim();
  for (const { parse, format } of parsers) {
    const date = parse(trimmed);
    if (date && format(date) === trimmed) {
      return date;
    }
  }
  return null;
}

export function seasonOf(month: number): Season {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`Month must be an integer from 1 to 12, got ${month}`);
  }
  return month >= SUMMER_FIRST && month <= SUMMER_LAST ? 'summer' : 'winter';
}

export function deriveRecord(raw: RawCrash): CrashRecord {
  const month = raw.date.getUTCMonth() + 1;
  return {
    id: raw.id,
    date: isoDate(raw.date),
    year: raw.date.getUTCFullYear(),
    month,
    season: seasonOf(month),
    latitude: raw.latitude,
    longitude: raw.longitude,
    fatalities: raw.fatalities,
    category: raw.category
  };
}

export function filterByYear(records: readonly CrashRecord[], year: number): CrashRecord[] {
  return records.filter((record) => record.year === year);
}

export function filterRecords(records: readonly CrashRecord[], filter: RecordFilter): CrashRecord[] {
  const months = filter.months ? new Set(filter.months) : null;
  return records.filter((record) => {
    if (filter.year != null && record.year !== filter.year) return false;
    if (filter.season != null && record.season !== filter.season) return false;
    if (months && !months.has(record.month)) return false;
    return true;
  });
}

export function yearsIn(records: readonly CrashRecord[]): number[] {
  return [...new Set(records.map((record) => record.year))].sort((a, b) => a - b);
}
