import Decimal from 'decimal.js';
import { TradeRecord } from '../../trade-book/entities/trade-record.entity';

// Columns the pipeline adds to the trade book.
export const DerivedColumn = {
  PV: 'PV',
  ADJUSTED_PNL: 'ADJUSTED P&L',
  COMBINED_VALUE: 'COMBINED VALUE',
  BID: 'BID',
  OFFER: 'OFFER',
} as const;

export const DERIVED_COLUMNS: string[] = Object.values(DerivedColumn);

// Trade record joined with its valuation and, once computed, the derived prices.
// Lives for one pipeline run only.
export interface MergedRecord extends TradeRecord {
  valuationMatched: boolean;
  pv: Decimal;                      // feed PV with the sign flipped; 0 when unmatched
  adjustedPnl: Decimal | null;      // null until computed, or when P&L/trade date is missing
  combinedValue: Decimal | null;
  bid: Decimal | null;
  offer: Decimal | null;
}

export interface MergedTable {
  columns: string[];
  records: MergedRecord[];
}
