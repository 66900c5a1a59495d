import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import { buildApp } from './app.js';
import { isMockMode, loadConfig, validateConfig } from './config.js';
import { createContainer } from './container.js';
import { errorMessage } from './errors.js';

// Load .env from the working directory
loadEnv({ path: resolve(process.cwd(), '.env') });

const config = loadConfig();

const validation = validateConfig(config);
for (const warning of validation.warnings) {
  console.warn(`[config] ${warning.key}: ${warning.reason}`);
}
if (!validation.ok) {
  for (const error of validation.errors) {
    console.error(`[config] ${error.key}: ${error.reason}`);
  }
  process.exit(1);
}

const container = await createContainer(config);

const app = await buildApp(
  {
    agent: container.agent,
    memoryStore: container.memoryStore,
    mode: () => container.chat.mode,
  },
  {
    logLevel: config.logLevel,
    maxImageBytes: config.maxImageBytes,
  },
);

const start = async () => {
  try {
    await app.listen({ port: config.port, host: config.host });
    console.log(`Clipboard sidecar running on http://${config.host}:${config.port}`);
    console.log(`Environment: ${config.nodeEnv}`);
    console.log(`Model mode: ${isMockMode(config) ? 'mock' : `live (${config.grokModel})`}`);

    // Warm the store so the first request doesn't pay for table creation.
    container.memoryStore.init()
      .then(() => {
        const status = container.memoryStore.status();
        console.log(`[memoryStore] Ready (${status.backend}, ${status.embeddingModel}, ${status.dimensions} dims)`);
      })
      .catch((error: unknown) => {
        console.error('[memoryStore] Initialization failed:', errorMessage(error));
      });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

// Graceful shutdown
const shutdown = async () => {
  console.log('Shutting down...');
  try {
    await app.close();
    await container.close();
  } catch (error) {
    console.error('Shutdown failed:', errorMessage(error));
    process.exit(1);
  }
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

await start();
