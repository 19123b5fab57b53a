// index.ts
import { loadConfig } from './config';
import type { Config } from './config';
import { loadDefaultActivities } from './data/seed-activities';
import { ActivityStore } from './services/activity-store';
import { startServer } from './server';
import { logger } from './utils/logger';

function main(): void {
  let config: Config;
  let store: ActivityStore;
  try {
    config = loadConfig();
    store = new ActivityStore(loadDefaultActivities());
  } catch (err) {
    logger.error('Critical error during server startup. Server not started.', err);
    process.exit(1);
  }

  // Test runs import the app directly and never listen
  if (config.env === 'test') {
    return;
  }

  const { shutdown } = startServer(config, store);
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main();
