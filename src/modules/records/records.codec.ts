import { SchemaMismatchError, ValidationError } from '../../shared/errors.js';
import { type ColumnKey, type ColumnLayout, headerLabels } from './records.columns.js';
import { formatEpoch, parseDateToEpoch, parseIntLoose, splitItems } from './records.parsers.js';
import type {
  CellValue,
  DecodedValues,
  HeaderIndex,
  ItemsInput,
  RawRow,
  RecordInput,
  RecordValues,
  ResponseRow,
  SheetRow
} from './records.types.js';

export const buildHeaderIndex = (header: RawRow | undefined): HeaderIndex => {
  const index: HeaderIndex = new Map();
  (header ?? []).forEach((cell, position) => {
    const label = String(cell).trim();
    if (label && !index.has(label)) {
      index.set(label, position);
    }
  });
  return index;
};

export const missingColumns = (headerIndex: HeaderIndex, layout: ColumnLayout): string[] =>
  headerLabels(layout).filter((label) => !headerIndex.has(label));

// Labels present in the header but not in the column the layout writes to
export const misplacedColumns = (headerIndex: HeaderIndex, layout: ColumnLayout): string[] =>
  layout.order
    .filter((key, position) => {
      const found = headerIndex.get(layout.labels[key]);
      return found !== undefined && found !== position;
    })
    .map((key) => layout.labels[key]);

const readCell = (raw: RawRow, headerIndex: HeaderIndex, layout: ColumnLayout, key: ColumnKey): CellValue => {
  const position = headerIndex.get(layout.labels[key]);
  if (position === undefined) {
    throw new SchemaMismatchError([layout.labels[key]], headerLabels(layout));
  }
  // Trailing blank cells are not returned by the backend
  return position < raw.length ? raw[position] : '';
};

const cellText = (cell: CellValue): string => (typeof cell === 'string' ? cell.trim() : String(cell));

/**
 * Maps a physical row to a typed record. Date serials are rendered as
 * DD-MM-YYYY; revenue keeps its raw text next to the loosely parsed value.
 */
export const decodeRow = (
  raw: RawRow,
  rowNumber: number,
  headerIndex: HeaderIndex,
  layout: ColumnLayout,
  zone: string
): SheetRow => {
  const timestampCell = readCell(raw, headerIndex, layout, 'timestamp');
  const revenueCell = readCell(raw, headerIndex, layout, 'revenue');
  const itemsCell = readCell(raw, headerIndex, layout, 'items');
  const timestampEpoch = parseDateToEpoch(timestampCell, zone);

  return {
    rowNumber,
    timestamp:
      typeof timestampCell === 'number' && timestampEpoch !== null
        ? formatEpoch(timestampEpoch, zone)
        : cellText(timestampCell),
    location: cellText(readCell(raw, headerIndex, layout, 'location')),
    items: cellText(itemsCell),
    note: cellText(readCell(raw, headerIndex, layout, 'note')),
    revenue: cellText(revenueCell),
    timestampEpoch,
    itemTokens: splitItems(itemsCell),
    revenueValue: parseIntLoose(revenueCell)
  };
};

// Derived fields for values that have not been read back from the sheet yet
export const deriveValues = (values: RecordValues, zone: string): DecodedValues => ({
  ...values,
  timestampEpoch: parseDateToEpoch(values.timestamp, zone),
  itemTokens: splitItems(values.items),
  revenueValue: parseIntLoose(values.revenue)
});

export const encodeRecord = (record: RecordValues, layout: ColumnLayout): string[] =>
  layout.order.map((key) => record[key]);

export const recordValues = (row: SheetRow): RecordValues => ({
  timestamp: row.timestamp,
  location: row.location,
  items: row.items,
  note: row.note,
  revenue: row.revenue
});

// Native header labels first, then language-independent mirrors
export const toResponseRow = (row: DecodedValues, layout: ColumnLayout, rowNumber: number | null): ResponseRow => {
  const response: ResponseRow = rowNumber === null ? {} : { row_number: rowNumber };
  for (const key of layout.order) {
    response[layout.labels[key]] = row[key];
  }
  return {
    ...response,
    timestamp: row.timestamp,
    location: row.location,
    items: row.items,
    note: row.note,
    revenue: row.revenue,
    revenue_value: row.revenueValue
  };
};

export const toItemsInput = (value: unknown, field = 'items'): ItemsInput => {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => {
      if (typeof entry !== 'string') {
        throw new ValidationError(`${field} must be a string or a list of strings.`, field);
      }
      return entry;
    });
  }
  throw new ValidationError(`${field} must be a string or a list of strings.`, field);
};

/**
 * Folds the legacy `product`/`products` and `notes` fields into `items` and
 * `note` when the canonical field is absent. Running it twice changes nothing.
 */
export const mergeLegacyFields = (input: RecordInput): RecordInput => {
  const merged: RecordInput = { ...input };
  if (merged.items === undefined) {
    if (merged.products !== undefined) {
      merged.items = merged.products;
    } else if (merged.product !== undefined) {
      merged.items = merged.product;
    }
  }
  if (merged.note === undefined && merged.notes !== undefined) {
    merged.note = merged.notes;
  }
  return merged;
};
