export const STATEMENT_CONFIG = Symbol('STATEMENT_CONFIG');

// How a statement column is written into the output sheet.
export type ColumnFormat = 'date' | 'amount' | 'percent' | 'rate' | 'text';

export interface TemplateLayout {
  headerRow: number;   // 1-based row holding the column headers
  titleCell: string;   // e.g. "A1"
  dateCell: string;    // e.g. "A2"
}

// Everything the pipeline needs, built once at startup and injected.
export interface StatementConfig {
  primaryPath: string;
  secondaryPath: string;
  tradeBookFile: string;
  templateFile: string;
  outputDir: string;
  feedFilePattern: string;              // "{date}" becomes yyyyMMdd
  feedLabel: string;
  productLabel: string;
  headerMapping: Record<string, string>;       // template header text -> record field
  defaultFieldValues: Record<string, string>;  // filled into appended trade-book rows
  columnFormats: Record<string, ColumnFormat>; // record field -> output format
  template: TemplateLayout;
}
