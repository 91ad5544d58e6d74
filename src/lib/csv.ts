import Papa from 'papaparse';

export type CsvRecord = Record<string, string | undefined>;

/** Rows keyed by the header line; blank lines are skipped. */
export function parseCsv(text: string): CsvRecord[] {
  return Papa.parse<CsvRecord>(text, { header: true, skipEmptyLines: true }).data;
}
