import { BadRequestException, Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { isValid, parseISO } from 'date-fns';
import { isoDate } from '../common/utils/date.util';
import { toNumberOrNull } from '../common/utils/decimal.util';
import { MergedRecord } from '../valuation/entities/merged-record.entity';
import { StatementPipelineService } from './statement-pipeline.service';
import { PreviewStatementsQueryDto, RunStatementsDto } from './dto/statement-request.dto';
import { MergedRecordDto, StatementPreviewResponseDto, StatementRunResponseDto } from './dto/statement-response.dto';

@Controller('statements')
export class StatementsController {
  constructor(private readonly pipeline: StatementPipelineService) {}

  /**
   * Reconciles the trade book with the day's valuations and writes
   * one statement per fund. Partial output is reported in `failed`.
   *
   * POST /statements/runs
   */
  @Post('runs')
  @HttpCode(HttpStatus.CREATED)
  async runStatements(@Body() dto: RunStatementsDto): Promise<StatementRunResponseDto> {
    const run = await this.pipeline.run(parseAsOfDate(dto.asOfDate));

    return {
      runId: run.runId,
      asOfDate: isoDate(run.asOfDate),
      written: run.written,
      failed: run.failed,
      unassignedRows: run.unassignedRows,
      computedRows: run.computedRows,
      skippedRows: run.skippedRows,
      message: run.failed.length === 0
        ? `${run.written.length} statement(s) written`
        : `${run.written.length} statement(s) written, ${run.failed.length} failed`,
    };
  }

  /**
   * Merged and computed trades for an as-of date, nothing written.
   *
   * GET /statements/preview?asOfDate=2024-07-01
   */
  @Get('preview')
  @HttpCode(HttpStatus.OK)
  async preview(@Query() query: PreviewStatementsQueryDto): Promise<StatementPreviewResponseDto> {
    const asOfDate = parseAsOfDate(query.asOfDate);
    const table = await this.pipeline.preview(asOfDate);
    return {
      asOfDate: isoDate(asOfDate),
      records: table.records.map(toRecordDto),
    };
  }
}

function parseAsOfDate(value: string | undefined): Date {
  const parsed = value ? parseISO(value) : new Date(NaN);
  if (!isValid(parsed)) {
    throw new BadRequestException(`asOfDate must be a yyyy-MM-dd date, got "${value ?? ''}"`);
  }
  return parsed;
}

function toRecordDto(record: MergedRecord): MergedRecordDto {
  return {
    tradeId: record.tradeId,
    fundId: record.fundId,
    tradeDate: record.tradeDate ? isoDate(record.tradeDate) : null,
    pnl: toNumberOrNull(record.pnl),
    spread: toNumberOrNull(record.spread),
    valuationMatched: record.valuationMatched,
    pv: record.pv.toNumber(),
    adjustedPnl: toNumberOrNull(record.adjustedPnl),
    combinedValue: toNumberOrNull(record.combinedValue),
    bid: toNumberOrNull(record.bid),
    offer: toNumberOrNull(record.offer),
  };
}
