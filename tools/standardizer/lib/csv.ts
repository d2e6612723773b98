import type { JsonValue, RawRecord } from "../pipeline/types.js";
import { NUMERIC_PATTERN } from "./value.js";

export interface ParsedCsv {
  headers: string[];
  rows: string[][];
}

export function parseCsv(content: string): ParsedCsv {
  const rows = parseCsvRows(content)
    .map((row) => row.map((cell) => normalizeCell(cell)))
    .filter((row) => row.some((cell) => cell.length > 0));

  if (rows.length === 0) {
    return { headers: [], rows: [] };
  }

  return {
    headers: rows[0],
    rows: rows.slice(1),
  };
}

/**
 * Maps CSV rows onto header-keyed records. Numeric-looking cells become
 * numbers and empty cells become null; missing trailing cells are null too.
 */
export function csvToRecords(content: string): RawRecord[] {
  const { headers, rows } = parseCsv(content);
  return rows.map((row) => {
    const record: RawRecord = {};
    headers.forEach((header, index) => {
      record[header] = inferCell(row[index] ?? "");
    });
    return record;
  });
}

function inferCell(cell: string): JsonValue {
  if (cell.length === 0) {
    return null;
  }
  return NUMERIC_PATTERN.test(cell) ? Number(cell) : cell;
}

function normalizeCell(value: string): string {
  return value
    .replace(/\uFEFF/g, "")
    .replace(/\r/g, "")
    .trim();
}

function parseCsvRows(content: string): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentCell = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    const next = content[i + 1];

    if (char === '"') {
      if (inQuotes && next === '"') {
        currentCell += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (!inQuotes && char === ",") {
      currentRow.push(currentCell);
      currentCell = "";
      continue;
    }

    if (!inQuotes && (char === "\n" || char === "\r")) {
      if (char === "\r" && next === "\n") {
        i++;
      }
      currentRow.push(currentCell);
      rows.push(currentRow);
      currentRow = [];
      currentCell = "";
      continue;
    }

    currentCell += char;
  }

  if (currentCell.length > 0 || currentRow.length > 0) {
    currentRow.push(currentCell);
    rows.push(currentRow);
  }

  return rows;
}
