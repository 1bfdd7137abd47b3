import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import * as ExcelJS from 'exceljs';
import { StatementConfig } from '../config/statement-config.interface';

export const TEMPLATE_HEADERS = ['Trade ID', 'Trade Date', 'Notional', 'Mark', 'Bid', 'Offer', 'COUNTERPARTY'];
export const TEMPLATE_FOOTER = 'Indicative levels only';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'fund-statements-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function buildTestConfig(dir: string, overrides: Partial<StatementConfig> = {}): StatementConfig {
  return {
    primaryPath: join(dir, 'primary'),
    secondaryPath: join(dir, 'secondary'),
    tradeBookFile: 'trade-book.csv',
    templateFile: join(dir, 'template.xlsx'),
    outputDir: join(dir, 'out'),
    feedFilePattern: 'valuations_{date}.csv',
    feedLabel: 'Daily Valuation',
    productLabel: 'Swaps',
    headerMapping: {
      'Trade ID': 'TRADEIDENTIFIER',
      'Trade Date': 'TRADE DATE',
      Notional: 'NOTIONAL',
      Mark: 'COMBINED VALUE',
      Bid: 'BID',
      Offer: 'OFFER',
    },
    defaultFieldValues: { CURRENCY: 'USD' },
    columnFormats: {
      'TRADE DATE': 'date',
      NOTIONAL: 'amount',
      'COMBINED VALUE': 'amount',
      BID: 'percent',
      OFFER: 'percent',
    },
    template: { headerRow: 3, titleCell: 'A1', dateCell: 'A2' },
    ...overrides,
  };
}

/**
 * Template: title in A1, date in A2, headers in row 3,
 * a footer in row 4 that data rows must push down.
 */
export async function writeTemplate(path: string, headers: string[] = TEMPLATE_HEADERS): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet('Template');
  worksheet.getCell('A1').value = 'TITLE';
  worksheet.getCell('A2').value = 'DATE';
  worksheet.getRow(3).values = headers;
  worksheet.getCell('A4').value = TEMPLATE_FOOTER;
  await workbook.xlsx.writeFile(path);
}

export async function readWorksheet(path: string): Promise<ExcelJS.Worksheet> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);
  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    throw new Error(`${path} has no worksheet`);
  }
  return worksheet;
}
