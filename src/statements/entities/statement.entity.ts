import { MergedRecord } from '../../valuation/entities/merged-record.entity';

// Records of one fund for one run; consumed by the renderer and dropped.
export interface StatementGroup {
  fundId: string;
  asOfDate: Date;
  records: MergedRecord[];
}

export interface WrittenStatement {
  fundId: string;
  path: string;
  rows: number;
}

export interface FailedStatement {
  fundId: string;
  path: string;
  reason: string;
}

export interface StatementRenderResult {
  asOfDate: Date;
  written: WrittenStatement[];
  failed: FailedStatement[];    // a failed fund does not stop the others
  unassignedRows: number;       // rows with no fund id, left out of every statement
}
