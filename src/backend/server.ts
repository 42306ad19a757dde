/**
 * Express server - main entry point for the backend API server.
 * Wires the SQLite store and the generation client, then starts listening.
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { config } from '../shared/config';
import { ContentGenerator } from '../shared/generation';
import { createGenerationClientFromEnv } from '../shared/llm';
import { logger } from '../shared/logging';
import { DatabaseStorage } from '../shared/storage';
import { createApp } from './app';

export const start = (): void => {
  if (config.database.path !== ':memory:') {
    mkdirSync(dirname(config.database.path), { recursive: true });
  }

  const storage = new DatabaseStorage({ databasePath: config.database.path });
  const client = createGenerationClientFromEnv();
  const generator = new ContentGenerator(client);
  const app = createApp({ storage, generator });

  const server = app.listen(config.server.port, () => {
    logger.info(
      { port: config.server.port, provider: client.getProviderName(), database: config.database.path },
      'Server listening'
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      storage.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

// Start server when run directly
if (require.main === module) {
  start();
}
