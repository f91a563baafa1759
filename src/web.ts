import { startMonitor } from './app.js';

startMonitor({ withStatusServer: true }).catch((error) => {
  console.error('[Main] Fatal error:', error);
  process.exit(1);
});
