import { existsSync } from 'fs';
import { resolve } from 'path';
import { google, type sheets_v4 } from 'googleapis';
import { BackendUnavailableError } from '../errors.js';
import type { AppendResult, SheetCell, SheetGrid, SpreadsheetBackend } from './spreadsheet.types.js';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

// The part of the generated Sheets v4 client this backend calls
export interface SheetsClient {
  spreadsheets: {
    get(
      params: sheets_v4.Params$Resource$Spreadsheets$Get
    ): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    batchUpdate(params: sheets_v4.Params$Resource$Spreadsheets$Batchupdate): Promise<unknown>;
    values: {
      get(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Get
      ): Promise<{ data: sheets_v4.Schema$ValueRange }>;
      append(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Append
      ): Promise<{ data: sheets_v4.Schema$AppendValuesResponse }>;
      update(params: sheets_v4.Params$Resource$Spreadsheets$Values$Update): Promise<unknown>;
    };
  };
}

export interface GoogleSheetsOptions {
  spreadsheetId: string | null;
  serviceAccountFile: string | null;
  serviceAccountJson: string | null;
  // Built from the service-account settings when not given
  client?: SheetsClient;
}

const describeFailure = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return String(error);
};

const toCell = (value: unknown): SheetCell => {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return '';
};

const toGrid = (values: unknown[][] | null | undefined): SheetGrid =>
  (values ?? []).map((row) => (Array.isArray(row) ? row.map((cell) => toCell(cell)) : []));

export class GoogleSheetsBackend implements SpreadsheetBackend {
  private sheets: SheetsClient | null;

  constructor(private readonly options: GoogleSheetsOptions) {
    this.sheets = options.client ?? null;
  }

  async readRange(range: string): Promise<SheetGrid> {
    const { sheets, spreadsheetId } = this.connect();
    const response = await this.call('values.get', () =>
      sheets.spreadsheets.values.get({
        spreadsheetId,
        range,
        valueRenderOption: 'UNFORMATTED_VALUE',
        dateTimeRenderOption: 'SERIAL_NUMBER'
      })
    );
    return toGrid(response.data.values);
  }

  async appendRow(range: string, values: SheetCell[]): Promise<AppendResult> {
    const { sheets, spreadsheetId } = this.connect();
    const response = await this.call('values.append', () =>
      sheets.spreadsheets.values.append({
        spreadsheetId,
        range,
        valueInputOption: 'USER_ENTERED',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values: [values] }
      })
    );
    return { updatedRange: response.data.updates?.updatedRange ?? null };
  }

  async updateRange(range: string, values: SheetGrid): Promise<void> {
    const { sheets, spreadsheetId } = this.connect();
    await this.call('values.update', () =>
      sheets.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: 'USER_ENTERED',
        requestBody: { values }
      })
    );
  }

  async resolveSheetId(tabName: string): Promise<number> {
    const { sheets, spreadsheetId } = this.connect();
    const response = await this.call('spreadsheets.get', () =>
      sheets.spreadsheets.get({
        spreadsheetId,
        fields: 'sheets.properties(sheetId,title)'
      })
    );
    const sheet = response.data.sheets?.find((entry) => entry.properties?.title === tabName);
    const sheetId = sheet?.properties?.sheetId;
    if (sheetId === null || sheetId === undefined) {
      throw new Error(`Could not find sheetId for tab "${tabName}".`);
    }
    return sheetId;
  }

  async deleteRows(sheetId: number, startIndex: number, endIndex: number): Promise<void> {
    const { sheets, spreadsheetId } = this.connect();
    await this.call('batchUpdate', () =>
      sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: [
            {
              deleteDimension: {
                range: { sheetId, dimension: 'ROWS', startIndex, endIndex }
              }
            }
          ]
        }
      })
    );
  }

  private connect(): { sheets: SheetsClient; spreadsheetId: string } {
    const spreadsheetId = this.options.spreadsheetId;
    if (!spreadsheetId) {
      throw new Error('Server missing SHEET_ID.');
    }
    if (!this.sheets) {
      this.sheets = google.sheets({ version: 'v4', auth: this.createAuth() });
    }
    return { sheets: this.sheets, spreadsheetId };
  }

  private createAuth() {
    const { serviceAccountFile, serviceAccountJson } = this.options;
    if (serviceAccountFile) {
      const keyFile = resolve(serviceAccountFile);
      if (!existsSync(keyFile)) {
        throw new Error(`SERVICE_ACCOUNT_FILE not found at: ${keyFile}`);
      }
      return new google.auth.GoogleAuth({ keyFile, scopes: SCOPES });
    }
    if (serviceAccountJson) {
      return new google.auth.GoogleAuth({ credentials: JSON.parse(serviceAccountJson), scopes: SCOPES });
    }
    throw new Error('Provide SERVICE_ACCOUNT_FILE (preferred) or SERVICE_ACCOUNT_JSON in the environment.');
  }

  // Failures are wrapped once and never retried
  private async call<T>(label: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new BackendUnavailableError(`Google Sheets ${label} failed: ${describeFailure(error)}`, error);
    }
  }
}
