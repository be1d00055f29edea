import { describe, it, expect } from 'vitest';
import { SchemaMismatchError, ValidationError } from '../../src/shared/errors.js';
import { resolveColumnLayout } from '../../src/modules/records/records.columns.js';
import {
  buildHeaderIndex,
  decodeRow,
  deriveValues,
  encodeRecord,
  mergeLegacyFields,
  misplacedColumns,
  missingColumns,
  toItemsInput,
  toResponseRow
} from '../../src/modules/records/records.codec.js';
import { HEADER } from '../helpers/memorySpreadsheet.js';

const en = resolveColumnLayout('en');
const bg = resolveColumnLayout('bg');
const legacy = resolveColumnLayout('legacy');

describe('header index', () => {
  it('should map trimmed labels to their first position', () => {
    const index = buildHeaderIndex([' timestamp ', 'location', 'location', '', 7]);
    expect(index.get('timestamp')).toBe(0);
    expect(index.get('location')).toBe(1);
    expect(index.get('7')).toBe(4);
    expect(index.size).toBe(3);
  });

  it('should report missing logical columns by label', () => {
    const index = buildHeaderIndex(['timestamp', 'location', 'items']);
    expect(missingColumns(index, en)).toEqual(['note', 'revenue']);
    expect(missingColumns(buildHeaderIndex(HEADER), en)).toEqual([]);
  });

  it('should report labels that sit in another column than the layout writes to', () => {
    const swapped = buildHeaderIndex(['timestamp', 'location', 'items', 'revenue', 'note']);
    expect(misplacedColumns(swapped, en)).toEqual(['note', 'revenue']);
    const original = buildHeaderIndex(['timestamp', 'location', 'product', 'quantity', 'note', 'user']);
    expect(misplacedColumns(original, legacy)).toEqual([]);
    expect(misplacedColumns(buildHeaderIndex(['timestamp', 'location']), en)).toEqual([]);
  });
});

describe('decodeRow', () => {
  const index = buildHeaderIndex(HEADER);

  it('should pad rows shorter than the header with blanks', () => {
    const row = decodeRow(['01-01-2024', 'Sofia Mall', 'Ball, Kite'], 2, index, en, 'UTC');
    expect(row).toEqual({
      rowNumber: 2,
      timestamp: '01-01-2024',
      location: 'Sofia Mall',
      items: 'Ball, Kite',
      note: '',
      revenue: '',
      timestampEpoch: 1704067200,
      itemTokens: ['Ball', 'Kite'],
      revenueValue: 0
    });
  });

  it('should render date serials and numeric revenue as text', () => {
    const row = decodeRow([45296, ' Plovdiv ', 'Car', 'paid cash', 120], 3, index, en, 'UTC');
    expect(row.timestamp).toBe('05-01-2024');
    expect(row.location).toBe('Plovdiv');
    expect(row.revenue).toBe('120');
    expect(row.revenueValue).toBe(120);
  });

  it('should keep unreadable dates as typed', () => {
    const row = decodeRow(['sometime', 'Varna', 'Doll', '', 'лв 80'], 4, index, en, 'UTC');
    expect(row.timestamp).toBe('sometime');
    expect(row.timestampEpoch).toBeNull();
    expect(row.revenueValue).toBe(80);
  });

  it('should locate each column by its header label', () => {
    const shuffled = buildHeaderIndex(['location', 'revenue', 'timestamp', 'items', 'note']);
    const row = decodeRow(['Burgas', '300', '02-01-2024', 'Train', 'gift'], 2, shuffled, en, 'UTC');
    expect(row.location).toBe('Burgas');
    expect(row.revenue).toBe('300');
    expect(row.timestamp).toBe('02-01-2024');
    expect(row.items).toBe('Train');
    expect(row.note).toBe('gift');
  });

  it('should fail hard when a column is absent from the header', () => {
    const partial = buildHeaderIndex(['timestamp', 'location', 'items']);
    expect(() => decodeRow(['01-01-2024', 'Sofia', 'Ball'], 2, partial, en, 'UTC')).toThrow(SchemaMismatchError);
  });
});

describe('encodeRecord', () => {
  it('should emit values in the layout column order', () => {
    const values = { location: 'Sofia', items: 'Ball', note: 'n', revenue: '5', timestamp: '01-01-2024' };
    expect(encodeRecord(values, en)).toEqual(['01-01-2024', 'Sofia', 'Ball', 'n', '5']);
  });

  it('should put quantity before note for the legacy layout', () => {
    const values = { location: 'Sofia', items: 'Ball', note: 'n', revenue: '5', timestamp: '01-01-2024' };
    expect(encodeRecord(values, legacy)).toEqual(['01-01-2024', 'Sofia', 'Ball', '5', 'n']);
  });
});

describe('toResponseRow', () => {
  it('should carry native labels and plain mirrors', () => {
    const values = deriveValues(
      { timestamp: '01-01-2024', location: 'Sofia', items: 'Ball, Kite', note: '', revenue: '1 200' },
      'UTC'
    );
    expect(toResponseRow(values, bg, 9)).toEqual({
      row_number: 9,
      Дата: '01-01-2024',
      Обект: 'Sofia',
      Продукти: 'Ball, Kite',
      Бележка: '',
      Оборот: '1 200',
      timestamp: '01-01-2024',
      location: 'Sofia',
      items: 'Ball, Kite',
      note: '',
      revenue: '1 200',
      revenue_value: 1200
    });
  });

  it('should omit the row number when it is unknown', () => {
    const values = deriveValues({ timestamp: '', location: 'Sofia', items: 'Ball', note: '', revenue: '' }, 'UTC');
    expect(toResponseRow(values, en, null)).not.toHaveProperty('row_number');
  });
});

describe('legacy input fields', () => {
  it('should adopt product or products as items', () => {
    expect(mergeLegacyFields({ product: 'Ball' }).items).toBe('Ball');
    expect(mergeLegacyFields({ products: ['Ball', 'Kite'] }).items).toEqual(['Ball', 'Kite']);
    expect(mergeLegacyFields({ product: 'Ball', products: 'Kite' }).items).toBe('Kite');
  });

  it('should adopt notes as note', () => {
    expect(mergeLegacyFields({ notes: 'paid' }).note).toBe('paid');
    expect(mergeLegacyFields({ note: 'kept', notes: 'ignored' }).note).toBe('kept');
  });

  it('should leave canonical fields alone and be idempotent', () => {
    const input = { items: 'Car', product: 'Ball', location: 'Sofia' };
    const once = mergeLegacyFields(input);
    expect(once.items).toBe('Car');
    expect(mergeLegacyFields(once)).toEqual(once);
  });
});

describe('toItemsInput', () => {
  it('should accept a string or a list of strings', () => {
    expect(toItemsInput('A, B')).toBe('A, B');
    expect(toItemsInput(['A', 'B'])).toEqual(['A', 'B']);
  });

  it('should reject other shapes', () => {
    expect(() => toItemsInput([1, 2])).toThrow(ValidationError);
    expect(() => toItemsInput({ name: 'A' })).toThrow('items must be a string or a list of strings.');
  });
});
