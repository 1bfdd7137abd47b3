import { Injectable, Logger } from '@nestjs/common';
import { differenceInCalendarDays } from 'date-fns';
import Decimal from 'decimal.js';
import { clamp, exactSum } from '../common/utils/decimal.util';
import { MergedTable } from '../valuation/entities/merged-record.entity';
import { AmortizationInput, AmortizationResult } from './entities/amortization-result.entity';

const DAYS_PER_YEAR = 365;
const HORIZON_MONTHS = 12;

export const EMPTY_RESULT: AmortizationResult = {
  adjustedPnl: null,
  combinedValue: null,
  bid: null,
  offer: null,
};

// Straight-line decay of trade P&L over twelve months, plus bid/offer around the mark.
// All arithmetic in Decimal at the global 20-digit precision.
@Injectable()
export class AmortizationService {
  private readonly logger = new Logger(AmortizationService.name);

  /**
   * Computes adjusted P&L, combined value, bid and offer.
   * Trades without P&L or trade date get all four as null.
   *
   * Elapsed time counts calendar days over a 365-day year. The decay
   * multiplier is kept within [0, 1]: an as-of date before the trade date
   * leaves the P&L whole rather than scaling it up.
   */
  compute(record: AmortizationInput, asOfDate: Date): AmortizationResult {
    if (record.pnl === null || record.tradeDate === null) {
      return EMPTY_RESULT;
    }

    const multiplier = this.decayMultiplier(record.tradeDate, asOfDate);
    const adjustedPnl = Decimal.max(0, record.pnl.times(multiplier));
    const combinedValue = record.pv.plus(adjustedPnl);

    // asymmetric: two thirds of the spread below the mark, one third above.
    // bid is rounded to 20 digits once; offer is bid + spread unrounded, so
    // offer - bid is exactly the spread rather than two separate roundings apart.
    const spread = record.spread ?? new Decimal(0);
    const bid = combinedValue.minus(spread.times(2).dividedBy(3));
    const offer = exactSum(bid, spread);

    return { adjustedPnl, combinedValue, bid, offer };
  }

  /** Share of the original P&L still carried at asOfDate */
  decayMultiplier(tradeDate: Date, asOfDate: Date): Decimal {
    const days = differenceInCalendarDays(asOfDate, tradeDate);
    const monthsElapsed = new Decimal(days).dividedBy(DAYS_PER_YEAR).times(HORIZON_MONTHS);
    const remaining = new Decimal(HORIZON_MONTHS).minus(monthsElapsed).dividedBy(HORIZON_MONTHS);
    return clamp(remaining, new Decimal(0), new Decimal(1));
  }

  /** Computes every record of a merged table; the input table is left as it was */
  computeAll(table: MergedTable, asOfDate: Date): MergedTable {
    const records = table.records.map((record) => ({
      ...record,
      ...this.compute(record, asOfDate),
    }));

    const skipped = records.filter((record) => record.adjustedPnl === null).length;
    if (skipped > 0) {
      this.logger.log(`${skipped} trade(s) left uncomputed: missing P&L or trade date`);
    }

    return { columns: [...table.columns], records };
  }
}
