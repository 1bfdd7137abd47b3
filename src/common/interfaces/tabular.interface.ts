// A cell as the pipeline sees it once read from a spreadsheet or CSV file.
export type CellValue = string | number | boolean | Date | null;

export type TabularRow = Record<string, CellValue>;

// Whole-file table; column order is kept so the file can be rewritten as read.
export interface TabularData {
  columns: string[];
  rows: TabularRow[];
}
