import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { CellValue, TabularData } from '../common/interfaces/tabular.interface';
import { SchemaError } from '../common/errors/statement.errors';
import { negate, toDecimalOrNull } from '../common/utils/decimal.util';
import { TradeColumn } from '../trade-book/entities/trade-record.entity';
import { normalizeIdentifier, toTradeRecord } from '../trade-book/trade-record.mapper';
import { DERIVED_COLUMNS, MergedRecord, MergedTable } from './entities/merged-record.entity';

// Canonical trade identifiers are at most this long; feed ids carry extra suffix data.
export const CANONICAL_ID_LENGTH = 7;

export function canonicalFeedId(value: CellValue | undefined): string {
  return normalizeIdentifier(value).slice(0, CANONICAL_ID_LENGTH);
}

// Left-joins the daily valuation feed onto the trade book.
@Injectable()
export class ValuationMatcherService {
  private readonly logger = new Logger(ValuationMatcherService.name);

  /**
   * Every trade-book row is kept, in order. Feed identifiers are cut to
   * their canonical form; book identifiers are compared as they are.
   * A missing valuation counts as PV 0, then the sign is flipped
   * (the feed reports PV from the provider's side).
   *
   * @throws SchemaError when either side lacks TRADEIDENTIFIER or the feed lacks PV
   */
  merge(tradeBook: TabularData, valuationFeed: TabularData): MergedTable {
    requireColumn(tradeBook, TradeColumn.TRADE_ID, 'the trade book');
    requireColumn(valuationFeed, TradeColumn.TRADE_ID, 'the valuation feed');
    requireColumn(valuationFeed, TradeColumn.PV, 'the valuation feed');

    const pvById = this.indexFeed(valuationFeed);

    const records: MergedRecord[] = tradeBook.rows.map((row) => {
      const trade = toTradeRecord(row);
      const feedPv = trade.tradeId === '' ? undefined : pvById.get(trade.tradeId);

      return {
        ...trade,
        valuationMatched: feedPv !== undefined,
        pv: negate(feedPv ?? new Decimal(0)),
        adjustedPnl: null,
        combinedValue: null,
        bid: null,
        offer: null,
      };
    });

    const matched = records.filter((record) => record.valuationMatched).length;
    this.logger.log(`Matched ${matched} of ${records.length} trade(s) against ${valuationFeed.rows.length} valuation(s)`);

    return {
      columns: [...tradeBook.columns, ...DERIVED_COLUMNS.filter((column) => !tradeBook.columns.includes(column))],
      records,
    };
  }

  // First occurrence of a canonical id wins; a blank PV counts as no valuation.
  private indexFeed(feed: TabularData): Map<string, Decimal> {
    const pvById = new Map<string, Decimal>();
    let duplicates = 0;

    for (const row of feed.rows) {
      const id = canonicalFeedId(row[TradeColumn.TRADE_ID]);
      if (id === '') {
        continue;
      }
      if (pvById.has(id)) {
        duplicates++;
        continue;
      }
      const pv = toDecimalOrNull(row[TradeColumn.PV]);
      if (pv !== null) {
        pvById.set(id, pv);
      }
    }

    if (duplicates > 0) {
      this.logger.warn(`Ignored ${duplicates} duplicate valuation row(s) after truncating identifiers to ${CANONICAL_ID_LENGTH} characters`);
    }
    return pvById;
  }
}

function requireColumn(table: TabularData, column: string, source: string): void {
  if (!table.columns.includes(column)) {
    throw new SchemaError(column, source);
  }
}
