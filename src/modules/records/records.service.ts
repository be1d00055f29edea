import { DateTime } from 'luxon';
import type { RevenueMode } from './records.config.js';
import { RowNotFoundError, ValidationError } from '../../shared/errors.js';
import type { ColumnLayout } from './records.columns.js';
import { deriveValues, mergeLegacyFields, recordValues, toItemsInput } from './records.codec.js';
import {
  DATE_FORMAT_LABEL,
  formatEpoch,
  normalizeItems,
  parseDateToEpoch,
  parseIntLoose,
  parseStrictInt,
  todayString
} from './records.parsers.js';
import { DEFAULT_SEARCH_LIMIT, MAX_SEARCH_LIMIT, findLatestForLocation, searchRows, sumRevenue } from './records.query.js';
import type { RecordsRepository } from './records.repository.js';
import type {
  AppendedRecord,
  LastItemResult,
  RecordInput,
  RecordPatch,
  RecordValues,
  RevenueInput,
  RevenueSummary,
  SearchFilters,
  SearchInput,
  SheetRow,
  UpdateRowInput
} from './records.types.js';

export interface RecordsServiceOptions {
  revenueMode: RevenueMode;
  now?: () => DateTime;
}

const requireText = (value: unknown, field: string): string => {
  const text = typeof value === 'string' ? value.trim() : '';
  if (!text) {
    throw new ValidationError(`${field} is required.`, field);
  }
  return text;
};

const optionalText = (value: unknown, field: string): string | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (value === null) {
    return '';
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string.`, field);
  }
  return value.trim();
};

// Blank filters count as absent
const optionalFilter = (value: unknown, field: string): string | undefined => {
  const text = optionalText(value, field);
  return text ? text : undefined;
};

const optionalEpoch = (value: unknown, field: string): number | undefined => {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`${field} must be a UNIX timestamp in seconds.`, field);
  }
  return parsed;
};

const resolveItems = (value: unknown): string => {
  if (value === undefined || value === null) {
    throw new ValidationError('items is required.', 'items');
  }
  const items = normalizeItems(toItemsInput(value));
  if (!items) {
    throw new ValidationError('items must contain at least one item.', 'items');
  }
  return items;
};

const resolveRowNumber = (value: unknown): number => {
  const rowNumber = parseStrictInt(value, 'row_number');
  if (rowNumber === null) {
    throw new ValidationError('row_number is required.', 'row_number');
  }
  return rowNumber;
};

export class RecordsService {
  private readonly now: () => DateTime;

  constructor(
    private readonly repository: RecordsRepository,
    private readonly options: RecordsServiceOptions
  ) {
    this.now = options.now ?? (() => DateTime.now());
  }

  get layout(): ColumnLayout {
    return this.repository.layout;
  }

  get timezone(): string {
    return this.repository.timezone;
  }

  async appendRecord(payload: RecordInput): Promise<AppendedRecord> {
    const input = mergeLegacyFields(payload);
    const values: RecordValues = {
      timestamp:
        input.timestamp === undefined || input.timestamp === null
          ? todayString(this.timezone, this.now())
          : this.resolveTimestamp(input.timestamp),
      location: requireText(input.location, 'location'),
      items: resolveItems(input.items),
      note: optionalText(input.note, 'note') ?? '',
      revenue: this.resolveRevenue(input.revenue) ?? ''
    };

    const snapshot = await this.repository.fetchTable();
    this.repository.requireHeader(snapshot.headerIndex);
    const rowNumber = await this.repository.appendRecord(values);
    return { values: deriveValues(values, this.timezone), rowNumber };
  }

  async lastItem(location: unknown): Promise<LastItemResult> {
    const target = requireText(location, 'location');
    const snapshot = await this.repository.fetchTable();
    if (snapshot.grid.length < 2) {
      throw new RowNotFoundError('No data.');
    }
    this.repository.requireHeader(snapshot.headerIndex);
    const result = findLatestForLocation(this.repository.decodeRows(snapshot), target);
    if (!result) {
      throw new RowNotFoundError(`No rows for location '${target}'.`);
    }
    return result;
  }

  async search(input: SearchInput): Promise<SheetRow[]> {
    const filters = this.resolveSearchFilters(input);
    const snapshot = await this.repository.fetchTable();
    if (snapshot.grid.length < 2) {
      return [];
    }
    this.repository.requireHeader(snapshot.headerIndex);
    return searchRows(this.repository.decodeRows(snapshot), filters);
  }

  async sumRevenue(input: RevenueInput): Promise<RevenueSummary> {
    const filters = {
      location: optionalFilter(input.location, 'location'),
      sinceTs: optionalEpoch(input.since_ts, 'since_ts'),
      untilTs: optionalEpoch(input.until_ts, 'until_ts')
    };
    const snapshot = await this.repository.fetchTable();
    if (snapshot.grid.length < 2) {
      return { total: 0, rows: 0 };
    }
    this.repository.requireHeader(snapshot.headerIndex);
    return sumRevenue(this.repository.decodeRows(snapshot), filters);
  }

  /**
   * Applies a partial patch to one row. Fields left out keep their current
   * value; a patch with nothing in it returns the row untouched.
   */
  async updateRow(payload: UpdateRowInput): Promise<SheetRow> {
    const rowNumber = resolveRowNumber(payload.row_number);
    const patch = this.resolvePatch(mergeLegacyFields(payload));

    const snapshot = await this.repository.fetchTable();
    this.repository.requireHeader(snapshot.headerIndex);
    const current = this.repository.getRow(snapshot, rowNumber);
    if (!Object.keys(patch).length) {
      return current;
    }
    return this.repository.writeRow(snapshot, rowNumber, { ...recordValues(current), ...patch });
  }

  async deleteRow(payload: { row_number?: unknown }): Promise<SheetRow> {
    const rowNumber = resolveRowNumber(payload.row_number);
    const snapshot = await this.repository.fetchTable();
    this.repository.requireHeader(snapshot.headerIndex);
    const removed = this.repository.getRow(snapshot, rowNumber);
    await this.repository.deleteRow(snapshot, rowNumber);
    return removed;
  }

  private resolvePatch(input: RecordInput): RecordPatch {
    const patch: RecordPatch = {};
    // null means "not given", as on append
    if (input.timestamp !== undefined && input.timestamp !== null) {
      patch.timestamp = this.resolveTimestamp(input.timestamp);
    }
    if (input.location !== undefined) {
      patch.location = requireText(input.location, 'location');
    }
    if (input.items !== undefined) {
      patch.items = resolveItems(input.items);
    }
    const note = optionalText(input.note, 'note');
    if (note !== undefined) {
      patch.note = note;
    }
    const revenue = this.resolveRevenue(input.revenue);
    if (revenue !== undefined) {
      patch.revenue = revenue;
    }
    return patch;
  }

  private resolveSearchFilters(input: SearchInput): SearchFilters {
    const limit = parseStrictInt(input.limit, 'limit') ?? DEFAULT_SEARCH_LIMIT;
    if (limit < 1 || limit > MAX_SEARCH_LIMIT) {
      throw new ValidationError(`limit must be between 1 and ${MAX_SEARCH_LIMIT}.`, 'limit');
    }
    return {
      location: optionalFilter(input.location, 'location'),
      item: optionalFilter(input.product ?? input.item, 'product'),
      sinceTs: optionalEpoch(input.since_ts, 'since_ts'),
      untilTs: optionalEpoch(input.until_ts, 'until_ts'),
      limit
    };
  }

  // Stored in canonical DD-MM-YYYY whatever format came in
  private resolveTimestamp(value: unknown): string {
    const epoch = typeof value === 'string' ? parseDateToEpoch(value, this.timezone) : null;
    if (epoch === null) {
      throw new ValidationError(`timestamp must be a date such as ${DATE_FORMAT_LABEL}.`, 'timestamp');
    }
    return formatEpoch(epoch, this.timezone);
  }

  // undefined: not provided; '' clears the cell
  private resolveRevenue(value: unknown): string | undefined {
    if (value === undefined) {
      return undefined;
    }
    if (this.options.revenueMode === 'strict') {
      const parsed = parseStrictInt(value, 'revenue');
      return parsed === null ? '' : String(parsed);
    }
    if (value === null || (typeof value === 'string' && !value.trim())) {
      return '';
    }
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new ValidationError('revenue must be a number or text.', 'revenue');
    }
    return String(parseIntLoose(value));
  }
}
