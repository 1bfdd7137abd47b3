import { Inject, Injectable, Logger } from '@nestjs/common';
import * as ExcelJS from 'exceljs';
import { mkdir } from 'fs/promises';
import { join } from 'path';
import { MissingGroupingColumnError, RenderWriteError, SchemaError } from '../common/errors/statement.errors';
import { compactDate, toSheetDate } from '../common/utils/date.util';
import { assertSourceExists } from '../common/utils/tabular.util';
import { STATEMENT_CONFIG, StatementConfig } from '../config/statement-config.interface';
import { TradeColumn } from '../trade-book/entities/trade-record.entity';
import { getField } from '../trade-book/trade-record.mapper';
import { DerivedColumn, MergedRecord, MergedTable } from '../valuation/entities/merged-record.entity';
import { DATA_ALIGNMENT, DATA_FONT, DATE_FORMAT, formatCell, StatementValue } from './cell-format.util';
import { FailedStatement, StatementGroup, StatementRenderResult, WrittenStatement } from './entities/statement.entity';

const SHEET_NAME_LIMIT = 31;

interface TemplateHeader {
  column: number;
  text: string;
}

/** Reads a named field off a merged record; pass-through columns fall back to the raw row. */
export function resolveField(record: MergedRecord, field: string): StatementValue {
  switch (field) {
    case TradeColumn.TRADE_ID:
      return record.tradeId === '' ? null : record.tradeId;
    case TradeColumn.FUND_ID:
      return record.fundId;
    case TradeColumn.TRADE_DATE:
      return record.tradeDate ?? getField(record, field);
    case DerivedColumn.PV:
      return record.pv;
    case DerivedColumn.ADJUSTED_PNL:
      return record.adjustedPnl;
    case DerivedColumn.COMBINED_VALUE:
      return record.combinedValue;
    case DerivedColumn.BID:
      return record.bid;
    case DerivedColumn.OFFER:
      return record.offer;
    default:
      return getField(record, field);
  }
}

/**
 * Partitions records by fund in first-seen order.
 * Records without a fund id are counted, not grouped.
 */
export function groupByFund(records: MergedRecord[], asOfDate: Date): { groups: StatementGroup[]; unassignedRows: number } {
  const groups = new Map<string, StatementGroup>();
  let unassignedRows = 0;

  for (const record of records) {
    if (record.fundId === null) {
      unassignedRows++;
      continue;
    }
    const group = groups.get(record.fundId);
    if (group) {
      group.records.push(record);
    } else {
      groups.set(record.fundId, { fundId: record.fundId, asOfDate, records: [record] });
    }
  }

  return { groups: Array.from(groups.values()), unassignedRows };
}

/** `<fund>_<yyyyMMdd>.xlsx`; a copy number goes after the fund when the name is already taken */
export function statementFileName(fundId: string, asOfDate: Date, copy = 1): string {
  const fund = fundId.replace(/[\\/:*?"<>|\s]+/g, '_');
  return `${copy > 1 ? `${fund}-${copy}` : fund}_${compactDate(asOfDate)}.xlsx`;
}

/**
 * Picks a file name no earlier fund of the run has used.
 * Names are compared case-insensitively.
 */
export function uniqueStatementFileName(fundId: string, asOfDate: Date, taken: Set<string>): string {
  let copy = 1;
  let name = statementFileName(fundId, asOfDate);
  while (taken.has(name.toLowerCase())) {
    copy++;
    name = statementFileName(fundId, asOfDate, copy);
  }
  taken.add(name.toLowerCase());
  return name;
}

export function statementSheetName(fundId: string, asOfDate: Date): string {
  const stamp = compactDate(asOfDate);
  const fund = fundId.replace(/[\\/*?:[\]']/g, '-').slice(0, SHEET_NAME_LIMIT - stamp.length - 1);
  return `${fund} ${stamp}`;
}

// Writes one statement workbook per fund from the template.
@Injectable()
export class StatementRendererService {
  private readonly logger = new Logger(StatementRendererService.name);

  constructor(@Inject(STATEMENT_CONFIG) private readonly config: StatementConfig) {}

  /**
   * Renders every fund's statement for the run.
   * Grouping column and template problems abort before anything is written.
   * A fund whose file cannot be written is reported in `failed` and the
   * remaining funds are still rendered.
   *
   * @throws MissingGroupingColumnError when the table has no FUND ID column
   * @throws SourceNotFoundError when the template file is missing
   */
  async render(table: MergedTable, asOfDate: Date): Promise<StatementRenderResult> {
    if (!table.columns.includes(TradeColumn.FUND_ID)) {
      throw new MissingGroupingColumnError(TradeColumn.FUND_ID);
    }

    const headers = await this.readTemplateHeaders();
    const { groups, unassignedRows } = groupByFund(table.records, asOfDate);
    if (unassignedRows > 0) {
      this.logger.warn(`${unassignedRows} trade(s) have no ${TradeColumn.FUND_ID} and were left out of every statement`);
    }

    const written: WrittenStatement[] = [];
    const failed: FailedStatement[] = [];

    const taken = new Set<string>();
    for (const group of groups) {
      const fileName = uniqueStatementFileName(group.fundId, asOfDate, taken);
      if (fileName !== statementFileName(group.fundId, asOfDate)) {
        this.logger.warn(`Fund ${group.fundId} shares its file name with an earlier fund; writing ${fileName}`);
      }
      const path = join(this.config.outputDir, fileName);
      try {
        await this.writeStatement(group, headers, path);
        written.push({ fundId: group.fundId, path, rows: group.records.length });
      } catch (error) {
        const failure = new RenderWriteError(group.fundId, path, error);
        this.logger.error(failure.message);
        failed.push({ fundId: group.fundId, path, reason: failure.message });
      }
    }

    this.logger.log(`Wrote ${written.length} of ${groups.length} statement(s) to ${this.config.outputDir}`);
    return { asOfDate, written, failed, unassignedRows };
  }

  private async loadTemplate(): Promise<{ workbook: ExcelJS.Workbook; worksheet: ExcelJS.Worksheet }> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.config.templateFile);
    const worksheet = workbook.worksheets[0];
    if (!worksheet) {
      throw new SchemaError('worksheet', 'the statement template', `${this.config.templateFile} contains no worksheet`);
    }
    return { workbook, worksheet };
  }

  private async readTemplateHeaders(): Promise<TemplateHeader[]> {
    await assertSourceExists('template', this.config.templateFile);
    const { worksheet } = await this.loadTemplate();

    const headers: TemplateHeader[] = [];
    worksheet.getRow(this.config.template.headerRow).eachCell((cell, column) => {
      const text = cell.text.trim();
      if (text !== '') {
        headers.push({ column, text });
      }
    });

    if (headers.length === 0) {
      throw new SchemaError(
        `header row ${this.config.template.headerRow}`,
        'the statement template',
        `Template ${this.config.templateFile} has no column headers in row ${this.config.template.headerRow}`,
      );
    }
    return headers;
  }

  // Fresh template copy per fund; data rows are inserted under the header row,
  // pushing whatever the template has below it further down.
  private async writeStatement(group: StatementGroup, headers: TemplateHeader[], path: string): Promise<void> {
    const { workbook, worksheet } = await this.loadTemplate();
    const { headerRow, titleCell, dateCell } = this.config.template;

    worksheet.getCell(titleCell).value = `${this.config.feedLabel} - ${group.fundId} ${this.config.productLabel}`;
    const stamp = worksheet.getCell(dateCell);
    stamp.value = toSheetDate(group.asOfDate);
    stamp.numFmt = DATE_FORMAT;

    group.records.forEach((record, index) => {
      const row = worksheet.insertRow(headerRow + 1 + index, []);
      for (const header of headers) {
        const field = this.config.headerMapping[header.text] ?? header.text;
        const formatted = formatCell(resolveField(record, field), this.config.columnFormats[field]);

        const cell = row.getCell(header.column);
        cell.value = formatted.value;
        if (formatted.numFmt) {
          cell.numFmt = formatted.numFmt;
        }
        cell.alignment = DATA_ALIGNMENT;
        cell.font = DATA_FONT;
      }
    });

    worksheet.name = statementSheetName(group.fundId, group.asOfDate);

    await mkdir(this.config.outputDir, { recursive: true });
    await workbook.xlsx.writeFile(path);
  }
}
