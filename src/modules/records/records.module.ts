import { loadConfig } from './records.config.js';
import { GoogleSheetsBackend } from '../../shared/sheets/googleSheets.client.js';
import { resolveColumnLayout } from './records.columns.js';
import { RecordsRepository } from './records.repository.js';
import { RecordsService } from './records.service.js';

export const appConfig = loadConfig();

const backend = new GoogleSheetsBackend({
  spreadsheetId: appConfig.sheetId,
  serviceAccountFile: appConfig.serviceAccountFile,
  serviceAccountJson: appConfig.serviceAccountJson
});

const repository = new RecordsRepository(backend, {
  tabName: appConfig.tabName,
  layout: resolveColumnLayout(appConfig.columnPreset),
  timezone: appConfig.timezone
});

export const recordsService = new RecordsService(repository, { revenueMode: appConfig.revenueMode });
