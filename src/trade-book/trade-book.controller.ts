import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post, Put } from '@nestjs/common';
import { TabularData, TabularRow } from '../common/interfaces/tabular.interface';
import { isoDate } from '../common/utils/date.util';
import { TradeBookStorageService } from './trade-book-storage.service';
import { TradeBookResponseDto, TradeRowDto } from './dto/trade-row.dto';

// Editor contract for the trade book: browse, append, replace, save.
@Controller('trade-book')
export class TradeBookController {
  constructor(private readonly storage: TradeBookStorageService) {}

  /**
   * Returns every row of the in-memory book.
   *
   * GET /trade-book
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  async getTradeBook(): Promise<TradeBookResponseDto> {
    return toResponse(await this.storage.getTable());
  }

  /**
   * Appends a row; empty columns take their configured defaults.
   *
   * POST /trade-book/rows
   */
  @Post('rows')
  @HttpCode(HttpStatus.CREATED)
  async appendRow(@Body() dto: TradeRowDto) {
    const index = await this.storage.append(toRow(dto));
    return { message: 'Row appended', index };
  }

  /**
   * PUT /trade-book/rows/:index
   */
  @Put('rows/:index')
  @HttpCode(HttpStatus.OK)
  async replaceRow(@Param('index', ParseIntPipe) index: number, @Body() dto: TradeRowDto) {
    await this.storage.replace(index, toRow(dto));
    return { message: `Row ${index} replaced`, index };
  }

  /**
   * Writes the whole book back to disk.
   *
   * POST /trade-book/save
   */
  @Post('save')
  @HttpCode(HttpStatus.OK)
  async save() {
    const rowCount = await this.storage.save();
    return { message: 'Trade book saved', path: this.storage.path, rowCount };
  }

  /**
   * Drops unsaved edits and re-reads the file.
   *
   * POST /trade-book/reload
   */
  @Post('reload')
  @HttpCode(HttpStatus.OK)
  async reload(): Promise<TradeBookResponseDto> {
    return toResponse(await this.storage.reload());
  }
}

function toRow(dto: TradeRowDto): TabularRow {
  return { ...dto.fields };
}

function toResponse(table: TabularData): TradeBookResponseDto {
  return {
    columns: table.columns,
    rows: table.rows.map((row) => {
      const json: Record<string, string | number | boolean | null> = {};
      for (const [column, value] of Object.entries(row)) {
        json[column] = value instanceof Date ? isoDate(value) : value;
      }
      return json;
    }),
    rowCount: table.rows.length,
  };
}
