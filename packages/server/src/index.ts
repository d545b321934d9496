import { info } from 'firebase-functions/logger';
import { getConfig } from './config.js';
import { initializeDatabase } from './db/index.js';
import { createApp } from './app.js';

const config = getConfig();

// Initialize database
initializeDatabase();

const app = createApp({ corsOrigin: config.corsOrigin });

// Start server
app.listen(config.port, (): void => {
  info(`Server running on http://localhost:${String(config.port)}`, { env: config.nodeEnv });
});

export { app };
