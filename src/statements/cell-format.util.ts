import * as ExcelJS from 'exceljs';
import Decimal from 'decimal.js';
import { CellValue } from '../common/interfaces/tabular.interface';
import { isoDate, parseCellDate, toSheetDate } from '../common/utils/date.util';
import { toDecimalOrNull } from '../common/utils/decimal.util';
import { ColumnFormat } from '../config/statement-config.interface';

export const DATE_FORMAT = 'dd/mm/yyyy';
export const AMOUNT_FORMAT = '#,##0.00';
export const PERCENT_FORMAT = '0.00%';
export const RATE_FORMAT = '0.000%';

export const DATA_FONT: Partial<ExcelJS.Font> = { name: 'Arial', size: 10 };
export const DATA_ALIGNMENT: Partial<ExcelJS.Alignment> = { horizontal: 'center', vertical: 'middle' };

export type StatementValue = CellValue | Decimal;

export interface FormattedCell {
  value: ExcelJS.CellValue;
  numFmt?: string;
}

function asDecimal(value: StatementValue): Decimal | null {
  return value instanceof Decimal ? value : toDecimalOrNull(value);
}

function asDate(value: StatementValue): Date | null {
  return value instanceof Decimal ? null : parseCellDate(value);
}

function asText(value: StatementValue): string {
  if (value instanceof Date) {
    return isoDate(value);
  }
  return value instanceof Decimal ? value.toString() : String(value);
}

// Percent and rate columns hold percentage points (5.25 means 5.25%).
function asPercent(value: StatementValue, numFmt: string): FormattedCell {
  const number = asDecimal(value);
  return number === null ? { value: asText(value) } : { value: number.dividedBy(100).toNumber(), numFmt };
}

/**
 * Turns a record value into what goes in the statement cell.
 * Values a numeric or date format cannot read are written as text.
 */
export function formatCell(value: StatementValue | undefined, format?: ColumnFormat): FormattedCell {
  if (value === null || value === undefined) {
    return { value: null };
  }

  switch (format) {
    case 'date': {
      const date = asDate(value);
      return date === null ? { value: asText(value) } : { value: toSheetDate(date), numFmt: DATE_FORMAT };
    }
    case 'amount': {
      const amount = asDecimal(value);
      return amount === null ? { value: asText(value) } : { value: amount.toNumber(), numFmt: AMOUNT_FORMAT };
    }
    case 'percent':
      return asPercent(value, PERCENT_FORMAT);
    case 'rate':
      return asPercent(value, RATE_FORMAT);
    case 'text':
      return { value: asText(value) };
    default:
      if (value instanceof Decimal) {
        return { value: value.toNumber() };
      }
      if (value instanceof Date) {
        return { value: toSheetDate(value), numFmt: DATE_FORMAT };
      }
      return { value };
  }
}
