import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { isoDate } from '../common/utils/date.util';
import { assertSourceExists } from '../common/utils/tabular.util';
import { AmortizationService } from '../amortization/amortization.service';
import { STATEMENT_CONFIG, StatementConfig } from '../config/statement-config.interface';
import { TradeBookStorageService } from '../trade-book/trade-book-storage.service';
import { MergedTable } from '../valuation/entities/merged-record.entity';
import { ValuationFeedService } from '../valuation/valuation-feed.service';
import { ValuationMatcherService } from '../valuation/valuation-matcher.service';
import { StatementRenderResult } from './entities/statement.entity';
import { StatementRendererService } from './statement-renderer.service';

export interface StatementRun extends StatementRenderResult {
  runId: string;
  computedRows: number;
  skippedRows: number;     // missing P&L or trade date
}

// merge -> compute -> render, one run at a time.
@Injectable()
export class StatementPipelineService {
  private readonly logger = new Logger(StatementPipelineService.name);
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    @Inject(STATEMENT_CONFIG) private readonly config: StatementConfig,
    private readonly tradeBook: TradeBookStorageService,
    private readonly feed: ValuationFeedService,
    private readonly matcher: ValuationMatcherService,
    private readonly amortization: AmortizationService,
    private readonly renderer: StatementRendererService,
  ) {}

  /**
   * Runs the whole pipeline and writes one statement per fund.
   * A run requested while another is in flight starts once that one settles.
   */
  run(asOfDate: Date): Promise<StatementRun> {
    const next = this.queue.then(() => this.execute(asOfDate));
    this.queue = next.catch(() => undefined);
    return next;
  }

  /** Merged and computed rows without writing anything */
  async preview(asOfDate: Date): Promise<MergedTable> {
    return this.computeTable(asOfDate);
  }

  private async execute(asOfDate: Date): Promise<StatementRun> {
    const runId = uuidv4();
    this.logger.log(`Run ${runId} started for ${isoDate(asOfDate)}`);

    // before the feed lookup, which may copy files into the primary path
    await assertSourceExists('template', this.config.templateFile);
    const computed = await this.computeTable(asOfDate);
    const result = await this.renderer.render(computed, asOfDate);

    const computedRows = computed.records.filter((record) => record.adjustedPnl !== null).length;
    this.logger.log(`Run ${runId} finished: ${result.written.length} written, ${result.failed.length} failed`);

    return {
      runId,
      ...result,
      computedRows,
      skippedRows: computed.records.length - computedRows,
    };
  }

  private async computeTable(asOfDate: Date): Promise<MergedTable> {
    const book = await this.tradeBook.getTable();
    const valuations = await this.feed.load(asOfDate);
    const merged = this.matcher.merge(book, valuations);
    return this.amortization.computeAll(merged, asOfDate);
  }
}
