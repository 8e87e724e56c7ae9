// src/server.ts
import { buildApp } from './app.js';
import { OpenAIChatClient } from './ai/providers/openai.js';
import { loadConfig } from './config.js';
import { createLogger } from './observability/index.js';

const log = createLogger('server');

async function main() {
  const config = loadConfig();

  const client = new OpenAIChatClient({
    baseUrl: config.model.baseUrl,
    apiKey: config.model.apiKey,
  });

  const app = await buildApp({ config, client });

  let closing = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    log.info({ signal }, 'Shutting down');
    try {
      await app.close();
      process.exit(0);
    } catch (err) {
      log.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };
  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));

  await app.listen({ port: config.http.port, host: config.http.host });
  log.info(
    { port: config.http.port, host: config.http.host, model: config.model.name, node: process.version },
    'API listening'
  );
}

main().catch((err) => {
  log.fatal({ err }, 'Server startup failed');
  process.exit(1);
});
