import { describe, it, expect, beforeEach } from 'vitest';
import { BackendUnavailableError, RowNotFoundError, SchemaMismatchError } from '../../src/shared/errors.js';
import { resolveColumnLayout } from '../../src/modules/records/records.columns.js';
import { RecordsRepository, parseRowNumber } from '../../src/modules/records/records.repository.js';
import { HEADER, MemorySpreadsheet } from '../helpers/memorySpreadsheet.js';

const createRepository = (backend: MemorySpreadsheet, tabName = 'Data') =>
  new RecordsRepository(backend, { tabName, layout: resolveColumnLayout('en'), timezone: 'UTC' });

describe('RecordsRepository', () => {
  let backend: MemorySpreadsheet;
  let repository: RecordsRepository;

  beforeEach(() => {
    backend = new MemorySpreadsheet([
      HEADER,
      ['01-01-2024', 'Sofia', 'Ball', '', 100],
      ['02-01-2024', 'Varna', 'Kite, Car']
    ]);
    repository = createRepository(backend);
  });

  describe('fetchTable', () => {
    it('should read the configured columns and index the header', async () => {
      const snapshot = await repository.fetchTable();
      expect(backend.calls).toEqual(["read 'Data'!A:E"]);
      expect(snapshot.grid).toHaveLength(3);
      expect(snapshot.headerIndex.get('revenue')).toBe(4);
    });

    it('should return an empty table for an empty range', async () => {
      backend.grid = [];
      const snapshot = await repository.fetchTable();
      expect(snapshot).toEqual({ grid: [], headerIndex: new Map() });
    });

    it('should quote tab names', async () => {
      const quoted = createRepository(backend, "Q1 'sales'");
      await quoted.fetchTable();
      expect(backend.calls).toEqual(["read 'Q1 ''sales'''!A:E"]);
    });

    it('should surface backend failures as they are', async () => {
      backend.failNextCall('quota exceeded');
      await expect(repository.fetchTable()).rejects.toThrow(BackendUnavailableError);
    });
  });

  describe('requireHeader', () => {
    it('should list every missing column', async () => {
      backend.grid[0] = ['timestamp', 'location', 'items'];
      const snapshot = await repository.fetchTable();
      expect(() => repository.requireHeader(snapshot.headerIndex)).toThrow(
        'Sheet header must include: timestamp, location, items, note, revenue. Missing: note, revenue.'
      );
    });

    it('should reject a header whose labels are in other columns', async () => {
      backend.grid[0] = ['timestamp', 'location', 'items', 'revenue', 'note'];
      const snapshot = await repository.fetchTable();
      expect(() => repository.requireHeader(snapshot.headerIndex)).toThrow(
        'Sheet header must list, in order: timestamp, location, items, note, revenue. Out of place: note, revenue.'
      );
    });

    it('should accept extra columns after the known ones', async () => {
      backend.grid[0] = [...HEADER, 'user'];
      const snapshot = await repository.fetchTable();
      expect(() => repository.requireHeader(snapshot.headerIndex)).not.toThrow();
    });

    it('should reject an empty sheet', async () => {
      backend.grid = [];
      const snapshot = await repository.fetchTable();
      expect(() => repository.requireHeader(snapshot.headerIndex)).toThrow(SchemaMismatchError);
    });
  });

  describe('decodeRows', () => {
    it('should number data rows from 2', async () => {
      const rows = repository.decodeRows(await repository.fetchTable());
      expect(rows.map((row) => [row.rowNumber, row.location])).toEqual([
        [2, 'Sofia'],
        [3, 'Varna']
      ]);
    });
  });

  describe('appendRecord', () => {
    it('should append positionally and report the new row number', async () => {
      const rowNumber = await repository.appendRecord({
        timestamp: '03-01-2024',
        location: 'Ruse',
        items: 'Doll',
        note: 'new',
        revenue: '75'
      });
      expect(rowNumber).toBe(4);
      expect(backend.grid[3]).toEqual(['03-01-2024', 'Ruse', 'Doll', 'new', 75]);
    });

    it('should append twice when called twice', async () => {
      const values = { timestamp: '03-01-2024', location: 'Ruse', items: 'Doll', note: '', revenue: '' };
      await repository.appendRecord(values);
      await repository.appendRecord(values);
      expect(backend.grid).toHaveLength(5);
    });
  });

  describe('writeRow', () => {
    it('should overwrite one row and return what the backend stored', async () => {
      const snapshot = await repository.fetchTable();
      const row = await repository.writeRow(snapshot, 3, {
        timestamp: '02-01-2024',
        location: 'Varna',
        items: 'Kite, Car',
        note: 'fixed',
        revenue: '200'
      });
      expect(backend.calls.slice(1)).toEqual(["update 'Data'!A3:E3", "read 'Data'!A3:E3"]);
      expect(backend.grid[2][4]).toBe(200);
      expect(row.rowNumber).toBe(3);
      expect(row.note).toBe('fixed');
      expect(row.revenue).toBe('200');
      expect(row.revenueValue).toBe(200);
    });

    it('should refuse rows outside 2..last', async () => {
      const snapshot = await repository.fetchTable();
      const values = { timestamp: '', location: 'X', items: 'Y', note: '', revenue: '' };
      await expect(repository.writeRow(snapshot, 1, values)).rejects.toThrow(RowNotFoundError);
      await expect(repository.writeRow(snapshot, 4, values)).rejects.toThrow(
        'Row 4 is out of range (valid rows: 2..3).'
      );
      expect(backend.calls).toEqual(["read 'Data'!A:E"]);
    });
  });

  describe('deleteRow', () => {
    it('should remove the row and shift later rows up', async () => {
      await repository.deleteRow(await repository.fetchTable(), 2);
      expect(backend.calls).toContain('delete 7 1-2');
      expect(backend.grid.map((row) => row[1])).toEqual(['location', 'Varna']);
    });

    it('should resolve the tab id only once per repository', async () => {
      await repository.deleteRow(await repository.fetchTable(), 3);
      await repository.deleteRow(await repository.fetchTable(), 2);
      expect(backend.sheetIdLookups).toBe(1);
      expect(backend.grid).toEqual([HEADER]);
    });

    it('should not resolve the tab id for an invalid row', async () => {
      const snapshot = await repository.fetchTable();
      await expect(repository.deleteRow(snapshot, 9)).rejects.toThrow(RowNotFoundError);
      expect(backend.sheetIdLookups).toBe(0);
    });
  });
});

describe('parseRowNumber', () => {
  it('should read the first row of an A1 range', () => {
    expect(parseRowNumber("'Data'!A12:E12")).toBe(12);
    expect(parseRowNumber('Data!A:E')).toBeNull();
    expect(parseRowNumber(null)).toBeNull();
  });
});
