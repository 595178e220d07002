import { parse } from "csv-parse/sync";
import { z } from "zod";

export type CsvRow = Record<string, string>;

export type CsvTable = {
  headers: string[];
  rows: CsvRow[];
};

const CsvRecordsSchema = z.array(z.record(z.string(), z.string()));

export function readCsvTable(csvText: string): CsvTable {
  let headers: string[] = [];

  const records: unknown = parse(csvText, {
    bom: true,
    columns: (header: string[]) => {
      headers = header.map((column) => column.trim());
      return headers;
    },
    skip_empty_lines: true,
    relax_column_count: true,
  });

  return {
    headers,
    rows: CsvRecordsSchema.parse(records),
  };
}
