import Decimal from 'decimal.js';

// Derived prices for one trade. Either all four are set or none are.
export type AmortizationResult =
  | { adjustedPnl: Decimal; combinedValue: Decimal; bid: Decimal; offer: Decimal }
  | { adjustedPnl: null; combinedValue: null; bid: null; offer: null };

// What the engine needs from a merged record.
export interface AmortizationInput {
  pnl: Decimal | null;
  tradeDate: Date | null;
  spread: Decimal | null;
  pv: Decimal;
}
