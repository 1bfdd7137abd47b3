import Decimal from 'decimal.js';
import { TabularRow } from '../../common/interfaces/tabular.interface';

// Column names of the trade book and the valuation feed.
export const TradeColumn = {
  TRADE_ID: 'TRADEIDENTIFIER',
  TRADE_DATE: 'TRADE DATE',
  PNL: 'P&L',
  SPREAD: 'SPREAD',
  FUND_ID: 'FUND ID',
  NOTIONAL: 'NOTIONAL',
  PV: 'PV',
} as const;

// Typed view of one trade-book row.
// Core fields are parsed; every source column stays available in `fields`.
export interface TradeRecord {
  tradeId: string;              // trimmed, never truncated
  tradeDate: Date | null;
  notional: Decimal | null;
  spread: Decimal | null;
  pnl: Decimal | null;          // raw, unamortized
  fundId: string | null;        // statement partition key
  fields: TabularRow;           // pass-through columns, unchanged
}
