import { startMonitor } from './app.js';

startMonitor({ withStatusServer: false }).catch((error) => {
  console.error('[Main] Fatal error:', error);
  process.exit(1);
});
