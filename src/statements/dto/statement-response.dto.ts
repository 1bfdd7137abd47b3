// Computed trade as returned by the preview endpoint
export class MergedRecordDto {
  tradeId!: string;
  fundId!: string | null;
  tradeDate!: string | null;
  pnl!: number | null;
  spread!: number | null;
  valuationMatched!: boolean;
  pv!: number;                   // sign already flipped
  adjustedPnl!: number | null;
  combinedValue!: number | null;
  bid!: number | null;
  offer!: number | null;
}

export class StatementPreviewResponseDto {
  asOfDate!: string;
  records!: MergedRecordDto[];
}

export class StatementRunResponseDto {
  runId!: string;
  asOfDate!: string;
  written!: { fundId: string; path: string; rows: number }[];
  failed!: { fundId: string; path: string; reason: string }[];
  unassignedRows!: number;
  computedRows!: number;
  skippedRows!: number;
  message!: string;
}
