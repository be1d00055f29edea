import 'dotenv/config';
import { createApp } from './createApp.js';
import { appConfig, recordsService } from '../modules/records/records.module.js';

const bootstrap = async () => {
  const app = createApp({ recordsService, apiKey: appConfig.apiKey });

  if (!appConfig.apiKey) {
    console.warn('API_KEY is not set; guarded routes will answer 500 until it is configured.');
  }

  app.listen(appConfig.port, () => {
    console.log(`Records API is running on port ${appConfig.port} (tab "${appConfig.tabName}", ${appConfig.timezone})`);
  });
};

bootstrap().catch((error) => {
  console.error('Failed to start the server:', error);
  process.exit(1);
});
