import { format, isValid, parse, parseISO } from 'date-fns';
import { CellValue } from '../interfaces/tabular.interface';

const TEXT_DATE_FORMATS = ['dd/MM/yyyy', 'yyyyMMdd'];

/**
 * Spreadsheet dates are stored as UTC midnight; the pipeline works in local
 * calendar days, so both directions go through these two helpers.
 */
export function fromSheetDate(value: Date): Date {
  return new Date(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate());
}

export function toSheetDate(value: Date): Date {
  return new Date(Date.UTC(value.getFullYear(), value.getMonth(), value.getDate()));
}

/** Parses a date cell: Date objects, ISO, dd/MM/yyyy or yyyyMMdd text. Anything else is null. */
export function parseCellDate(value: CellValue | undefined): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (text === '') {
    return null;
  }
  if (/^\d{4}-\d{2}-\d{2}/.test(text)) {
    const iso = parseISO(text);
    return isValid(iso) ? iso : null;
  }
  for (const pattern of TEXT_DATE_FORMATS) {
    const parsed = parse(text, pattern, new Date());
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
}

/** Compact as-of stamp used in output names, e.g. 20240701 */
export function compactDate(value: Date): string {
  return format(value, 'yyyyMMdd');
}

export function isoDate(value: Date): string {
  return format(value, 'yyyy-MM-dd');
}
