// A single cell as the backend hands it back; unformatted reads keep numbers and date serials
export type SheetCell = string | number | boolean;

export type SheetGrid = SheetCell[][];

export interface AppendResult {
  // A1 range the backend reports as written, e.g. `'Data'!A7:E7`
  updatedRange: string | null;
}

/**
 * Remote tabular store addressed by A1 ranges. Implementations surface every
 * transport failure as BackendUnavailableError and never retry.
 */
export interface SpreadsheetBackend {
  readRange(range: string): Promise<SheetGrid>;
  appendRow(range: string, values: SheetCell[]): Promise<AppendResult>;
  updateRange(range: string, values: SheetGrid): Promise<void>;
  resolveSheetId(tabName: string): Promise<number>;
  // Zero-based, end-exclusive row span
  deleteRows(sheetId: number, startIndex: number, endIndex: number): Promise<void>;
}
