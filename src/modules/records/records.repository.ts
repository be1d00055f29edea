import { RowNotFoundError, SchemaMismatchError } from '../../shared/errors.js';
import { memoizeAsync } from '../../shared/memoize.js';
import type { SpreadsheetBackend } from '../../shared/sheets/spreadsheet.types.js';
import { type ColumnLayout, columnLetter, headerLabels } from './records.columns.js';
import { buildHeaderIndex, decodeRow, encodeRecord, misplacedColumns, missingColumns } from './records.codec.js';
import type { HeaderIndex, RecordValues, SheetRow, TableSnapshot } from './records.types.js';

export interface RecordsRepositoryOptions {
  tabName: string;
  layout: ColumnLayout;
  timezone: string;
}

const quoteTab = (tabName: string) => `'${tabName.replace(/'/g, "''")}'`;

export const parseRowNumber = (updatedRange: string | null): number | null => {
  if (!updatedRange) {
    return null;
  }
  const match = /![A-Z]+(\d+)/.exec(updatedRange);
  return match ? Number(match[1]) : null;
};

export class RecordsRepository {
  // Resolved once per process; a renamed or recreated tab needs a restart
  private readonly sheetId: () => Promise<number>;

  constructor(
    private readonly backend: SpreadsheetBackend,
    private readonly options: RecordsRepositoryOptions
  ) {
    this.sheetId = memoizeAsync(() => backend.resolveSheetId(options.tabName));
  }

  get layout(): ColumnLayout {
    return this.options.layout;
  }

  get timezone(): string {
    return this.options.timezone;
  }

  async fetchTable(): Promise<TableSnapshot> {
    const grid = await this.backend.readRange(this.range());
    if (!grid.length) {
      return { grid: [], headerIndex: new Map() };
    }
    return { grid, headerIndex: buildHeaderIndex(grid[0]) };
  }

  // Writes are positional, so every label must also sit in its own column
  requireHeader(headerIndex: HeaderIndex): void {
    const missing = missingColumns(headerIndex, this.options.layout);
    const misplaced = misplacedColumns(headerIndex, this.options.layout);
    if (missing.length || misplaced.length) {
      throw new SchemaMismatchError(missing, headerLabels(this.options.layout), misplaced);
    }
  }

  decodeRows(snapshot: TableSnapshot): SheetRow[] {
    return snapshot.grid
      .slice(1)
      .map((raw, index) =>
        decodeRow(raw, index + 2, snapshot.headerIndex, this.options.layout, this.options.timezone)
      );
  }

  getRow(snapshot: TableSnapshot, rowNumber: number): SheetRow {
    this.assertRowNumber(snapshot, rowNumber);
    return decodeRow(
      snapshot.grid[rowNumber - 1],
      rowNumber,
      snapshot.headerIndex,
      this.options.layout,
      this.options.timezone
    );
  }

  // Returns the new row's number when the backend reports it
  async appendRecord(record: RecordValues): Promise<number | null> {
    const result = await this.backend.appendRow(this.range(), encodeRecord(record, this.options.layout));
    return parseRowNumber(result.updatedRange);
  }

  /**
   * Overwrites one row in place, then reads it back so the caller sees the
   * values after the backend's own coercion (numbers, dates).
   */
  async writeRow(snapshot: TableSnapshot, rowNumber: number, record: RecordValues): Promise<SheetRow> {
    this.assertRowNumber(snapshot, rowNumber);
    const range = this.range(rowNumber);
    await this.backend.updateRange(range, [encodeRecord(record, this.options.layout)]);
    const [written] = await this.backend.readRange(range);
    return decodeRow(written ?? [], rowNumber, snapshot.headerIndex, this.options.layout, this.options.timezone);
  }

  // Every later row moves up by one; row numbers held by callers go stale
  async deleteRow(snapshot: TableSnapshot, rowNumber: number): Promise<void> {
    this.assertRowNumber(snapshot, rowNumber);
    const sheetId = await this.sheetId();
    await this.backend.deleteRows(sheetId, rowNumber - 1, rowNumber);
  }

  private assertRowNumber(snapshot: TableSnapshot, rowNumber: number): void {
    const lastRow = snapshot.grid.length;
    if (!Number.isInteger(rowNumber) || rowNumber < 2 || rowNumber > lastRow) {
      throw new RowNotFoundError(
        lastRow >= 2
          ? `Row ${rowNumber} is out of range (valid rows: 2..${lastRow}).`
          : `Row ${rowNumber} is out of range (the sheet has no data rows).`
      );
    }
  }

  private range(row?: number): string {
    const lastColumn = columnLetter(this.options.layout.order.length);
    if (row === undefined) {
      return `${quoteTab(this.options.tabName)}!A:${lastColumn}`;
    }
    return `${quoteTab(this.options.tabName)}!A${row}:${lastColumn}${row}`;
  }
}
