import type { SheetCell } from '../../shared/sheets/spreadsheet.types.js';

export type CellValue = SheetCell;

export type RawRow = CellValue[];

export type HeaderIndex = Map<string, number>;

export interface TableSnapshot {
  // Every row of the used range, header included; grid[0] is row 1
  grid: RawRow[];
  headerIndex: HeaderIndex;
}

// Values as they are persisted, one string per logical column
export interface RecordValues {
  timestamp: string;
  location: string;
  items: string;
  note: string;
  revenue: string;
}

export interface DecodedValues extends RecordValues {
  // Epoch seconds, or null when the cell holds no recognisable date
  timestampEpoch: number | null;
  itemTokens: string[];
  revenueValue: number;
}

export interface SheetRow extends DecodedValues {
  rowNumber: number;
}

export interface AppendedRecord {
  values: DecodedValues;
  rowNumber: number | null;
}

export type ResponseRow = Record<string, string | number>;

// Items arrive either as a list or as one comma-separated string
export type ItemsInput = string | string[];

export interface RecordInput {
  location?: unknown;
  items?: unknown;
  product?: unknown;
  products?: unknown;
  note?: unknown;
  notes?: unknown;
  revenue?: unknown;
  timestamp?: unknown;
}

export interface UpdateRowInput extends RecordInput {
  row_number?: unknown;
}

export interface RecordPatch {
  timestamp?: string;
  location?: string;
  items?: string;
  note?: string;
  revenue?: string;
}

export interface SearchInput {
  location?: unknown;
  product?: unknown;
  item?: unknown;
  since_ts?: unknown;
  until_ts?: unknown;
  limit?: unknown;
}

export interface RevenueInput {
  location?: unknown;
  since_ts?: unknown;
  until_ts?: unknown;
}

export interface SearchFilters {
  location?: string;
  item?: string;
  sinceTs?: number;
  untilTs?: number;
  limit: number;
}

export interface RevenueFilters {
  location?: string;
  sinceTs?: number;
  untilTs?: number;
}

export interface RevenueSummary {
  total: number;
  rows: number;
}

export interface LastItemResult {
  row: SheetRow;
  lastItem: string;
}
