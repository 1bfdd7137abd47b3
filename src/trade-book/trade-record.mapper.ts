import { CellValue, TabularRow } from '../common/interfaces/tabular.interface';
import { parseCellDate } from '../common/utils/date.util';
import { toDecimalOrNull } from '../common/utils/decimal.util';
import { TradeColumn, TradeRecord } from './entities/trade-record.entity';

/** String form of an identifier cell; numbers print without a trailing ".0". */
export function normalizeIdentifier(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value).trim();
}

/**
 * Reads a pass-through column, returning `fallback` when the column is
 * absent or the cell is empty.
 */
export function getField(record: Pick<TradeRecord, 'fields'>, name: string, fallback: CellValue = null): CellValue {
  const value = record.fields[name];
  if (value === undefined || value === null || (typeof value === 'string' && value.trim() === '')) {
    return fallback;
  }
  return value;
}

export function toTradeRecord(row: TabularRow): TradeRecord {
  const fundId = normalizeIdentifier(row[TradeColumn.FUND_ID]);

  return {
    tradeId: normalizeIdentifier(row[TradeColumn.TRADE_ID]),
    tradeDate: parseCellDate(row[TradeColumn.TRADE_DATE]),
    notional: toDecimalOrNull(row[TradeColumn.NOTIONAL]),
    spread: toDecimalOrNull(row[TradeColumn.SPREAD]),
    pnl: toDecimalOrNull(row[TradeColumn.PNL]),
    fundId: fundId === '' ? null : fundId,
    fields: { ...row },
  };
}
