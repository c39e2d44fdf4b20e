import Papa from "papaparse";
import * as XLSX from "xlsx";
import { ValidationError } from "@/lib/errors";
import type { RawRow, TabularData } from "@/lib/donor-engine/types";
import { toText } from "@/lib/utils";

export type ParsedTable = {
  headers: string[];
  rows: RawRow[];
};

const WORKBOOK_EXTENSIONS = new Set(["xlsx", "xls"]);
const TEXT_EXTENSIONS = new Set(["csv", "txt"]);

export function parseTableFile(buffer: Buffer, fileName: string): ParsedTable {
  const extension = fileName.split(".").pop()?.toLowerCase() ?? "";

  if (WORKBOOK_EXTENSIONS.has(extension)) {
    const workbook = XLSX.read(buffer, { type: "buffer", cellDates: true });
    const sheetName = workbook.SheetNames[0];
    if (!sheetName) {
      throw new ValidationError("The uploaded workbook does not contain any sheets.");
    }
    const sheet = workbook.Sheets[sheetName];
    const rows = XLSX.utils.sheet_to_json<RawRow>(sheet, { defval: null });
    const headerRows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1 });
    const firstRow = headerRows[0];
    const headers = Array.isArray(firstRow) ? firstRow.map((cell) => toText(cell)) : Object.keys(rows[0] ?? {});
    return { headers, rows };
  }

  if (!TEXT_EXTENSIONS.has(extension)) {
    throw new ValidationError(`Unsupported file type: ${fileName}`, { extension });
  }

  const result = Papa.parse<Record<string, string>>(buffer.toString("utf8"), {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false
  });

  if (result.errors.length > 0) {
    throw new ValidationError(`Failed to parse CSV: ${result.errors[0].message}`, result.errors);
  }

  return {
    headers: result.meta.fields ?? [],
    rows: result.data
  };
}

export function toCsv(table: TabularData): string {
  return Papa.unparse({ fields: table.headers, data: table.rows });
}
