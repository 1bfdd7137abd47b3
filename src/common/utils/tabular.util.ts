import { access, mkdir } from 'fs/promises';
import { dirname, extname } from 'path';
import * as ExcelJS from 'exceljs';
import { CellValue, TabularData, TabularRow } from '../interfaces/tabular.interface';
import { SourceKind, SourceNotFoundError } from '../errors/statement.errors';
import { fromSheetDate, isoDate, toSheetDate } from './date.util';

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** @throws SourceNotFoundError when nothing exists at path */
export async function assertSourceExists(kind: SourceKind, path: string): Promise<void> {
  if (!(await fileExists(path))) {
    throw new SourceNotFoundError(kind, path);
  }
}

function isCsv(path: string): boolean {
  return extname(path).toLowerCase() === '.csv';
}

/**
 * Reads the first worksheet of an .xlsx or .csv file.
 * Row 1 holds the column names; fully blank rows are skipped.
 * CSV cells stay text so identifiers keep their leading zeros.
 */
export async function readTable(kind: SourceKind, path: string): Promise<TabularData> {
  await assertSourceExists(kind, path);

  const workbook = new ExcelJS.Workbook();
  const worksheet = isCsv(path)
    ? await workbook.csv.readFile(path, { map: (datum: string) => (datum === '' ? null : datum) })
    : await loadFirstWorksheet(workbook, path);

  const headers: { column: number; name: string }[] = [];
  worksheet.getRow(1).eachCell((cell, column) => {
    const name = cell.text.trim();
    if (name !== '') {
      headers.push({ column, name });
    }
  });

  const rows: TabularRow[] = [];
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    const sheetRow = worksheet.getRow(rowNumber);
    if (!sheetRow.hasValues) {
      continue;
    }

    const row: TabularRow = {};
    for (const header of headers) {
      row[header.name] = normalizeCell(sheetRow.getCell(header.column).value);
    }
    if (Object.values(row).some((value) => value !== null)) {
      rows.push(row);
    }
  }

  return { columns: headers.map((header) => header.name), rows };
}

async function loadFirstWorksheet(workbook: ExcelJS.Workbook, path: string): Promise<ExcelJS.Worksheet> {
  await workbook.xlsx.readFile(path);
  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    throw new Error(`${path} contains no worksheets`);
  }
  return worksheet;
}

/** Rewrites the whole file; format follows the extension. */
export async function writeTable(path: string, data: TabularData): Promise<void> {
  const csv = isCsv(path);
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet('Sheet1');

  worksheet.addRow(data.columns);
  for (const row of data.rows) {
    worksheet.addRow(data.columns.map((column) => toWritableCell(row[column] ?? null, csv)));
  }

  await mkdir(dirname(path), { recursive: true });
  if (csv) {
    await workbook.csv.writeFile(path);
  } else {
    await workbook.xlsx.writeFile(path);
  }
}

function toWritableCell(value: CellValue, csv: boolean): CellValue {
  if (value instanceof Date) {
    return csv ? isoDate(value) : toSheetDate(value);
  }
  return value;
}

/** Flattens exceljs cell shapes (rich text, formulas, links) to a plain value. */
export function normalizeCell(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return value.trim() === '' ? null : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return fromSheetDate(value);
  }
  if ('error' in value) {
    return null;
  }
  if ('richText' in value) {
    return normalizeCell(value.richText.map((run) => run.text).join(''));
  }
  if ('hyperlink' in value) {
    return normalizeCell(value.text);
  }
  if ('result' in value) {
    return value.result === undefined ? null : normalizeCell(value.result);
  }
  return null;
}
