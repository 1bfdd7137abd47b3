import { IsObject } from 'class-validator';

// A trade-book row keyed by column name, as sent by the editor.
export class TradeRowDto {
  @IsObject()
  fields!: Record<string, string | number | null>;
}

export class TradeBookResponseDto {
  columns!: string[];
  rows!: Record<string, string | number | boolean | null>[];
  rowCount!: number;
}
