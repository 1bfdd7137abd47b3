import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { join } from 'path';
import { CellValue, TabularData, TabularRow } from '../common/interfaces/tabular.interface';
import { readTable, writeTable } from '../common/utils/tabular.util';
import { STATEMENT_CONFIG, StatementConfig } from '../config/statement-config.interface';

// Holds the trade book for the life of the process.
// Loaded lazily once, edited in memory, rewritten in full on save.
// Single writer: there is no locking against edits made outside the process.
@Injectable()
export class TradeBookStorageService {
  private readonly logger = new Logger(TradeBookStorageService.name);
  private table: TabularData | null = null;

  constructor(@Inject(STATEMENT_CONFIG) private readonly config: StatementConfig) {}

  get path(): string {
    return join(this.config.primaryPath, this.config.tradeBookFile);
  }

  /** Reads the whole file, replacing any in-memory state */
  async load(): Promise<TabularData> {
    return copyTable(await this.readFromDisk());
  }

  /** Discards unsaved edits */
  async reload(): Promise<TabularData> {
    return this.load();
  }

  /** Returns a copy; edits go through append/replace */
  async getTable(): Promise<TabularData> {
    return copyTable(await this.current());
  }

  async save(): Promise<number> {
    const table = await this.current();
    await writeTable(this.path, table);
    this.logger.log(`Saved ${table.rows.length} trade(s) to ${this.path}`);
    return table.rows.length;
  }

  /**
   * Adds a row, filling empty or absent columns from the default-value table.
   * Columns not yet in the book are appended to the column list.
   *
   * @returns index of the new row
   */
  async append(row: TabularRow): Promise<number> {
    const table = await this.current();
    const filled = this.withDefaults(row);

    this.extendColumns(table, Object.keys(filled));
    table.rows.push(filled);
    return table.rows.length - 1;
  }

  /** @throws NotFoundException for an index outside the book */
  async replace(index: number, row: TabularRow): Promise<void> {
    const table = await this.current();
    if (!Number.isInteger(index) || index < 0 || index >= table.rows.length) {
      throw new NotFoundException(`Row ${index} does not exist (trade book has ${table.rows.length} rows)`);
    }

    this.extendColumns(table, Object.keys(row));
    table.rows[index] = { ...row };
  }

  private async current(): Promise<TabularData> {
    return this.table ?? this.readFromDisk();
  }

  private async readFromDisk(): Promise<TabularData> {
    const table = await readTable('trade book', this.path);
    this.table = table;
    this.logger.log(`Loaded ${table.rows.length} trade(s) from ${this.path}`);
    return table;
  }

  private withDefaults(row: TabularRow): TabularRow {
    const filled: TabularRow = { ...row };
    for (const [column, fallback] of Object.entries(this.config.defaultFieldValues)) {
      if (isBlank(filled[column])) {
        filled[column] = fallback;
      }
    }
    return filled;
  }

  private extendColumns(table: TabularData, columns: string[]): void {
    for (const column of columns) {
      if (!table.columns.includes(column)) {
        table.columns.push(column);
      }
    }
  }
}

function isBlank(value: CellValue | undefined): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function copyTable(table: TabularData): TabularData {
  return {
    columns: [...table.columns],
    rows: table.rows.map((row) => ({ ...row })),
  };
}
