import type { Application } from 'express';
import { headerLabels } from '../modules/records/records.columns.js';
import { DATE_FORMAT_LABEL } from '../modules/records/records.parsers.js';
import { createRecordsRouter } from '../modules/records/records.router.js';
import type { RecordsService } from '../modules/records/records.service.js';
import { requireApiKey } from '../shared/apiKey.middleware.js';
import { createHealthRouter } from '../shared/health.router.js';

export interface AppDependencies {
  recordsService: RecordsService;
  apiKey: string | null;
}

export const registerAppRoutes = (app: Application, { recordsService, apiKey }: AppDependencies) => {
  app.use(
    '/health',
    createHealthRouter({
      timezone: recordsService.timezone,
      dateFormat: DATE_FORMAT_LABEL,
      columns: headerLabels(recordsService.layout)
    })
  );
  app.use('/', createRecordsRouter(recordsService, requireApiKey(apiKey)));
};
