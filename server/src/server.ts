import { createApp } from './app.js';
import { DEFAULT_FORVO_API_KEY, getConfig } from './config/env.js';
import { loadSourcesConfig } from './config/sources.config.js';
import { logger } from './lib/logger/structured-logger.js';
import { ScriptAudioLinkRegistry } from './services/audio/audio-link-registry.js';
import { buildSourceRegistry } from './services/sources/source-registry.js';
import { FetchTransport } from './services/transport/fetch-transport.js';

function start(): void {
  const config = getConfig();
  const sourcesConfig = loadSourcesConfig(config.sourcesConfigPath);

  if (sourcesConfig.forvo.enable && !sourcesConfig.forvo.apiKey && config.forvoApiKey === DEFAULT_FORVO_API_KEY) {
    logger.warn({ event: 'forvo_placeholder_key' }, '[Config] FORVO_API_KEY is not set; Forvo lookups will be rejected');
  }

  const registry = buildSourceRegistry(
    sourcesConfig,
    {
      transport: new FetchTransport({ timeoutMs: config.fetchTimeoutMs }),
      audioLinks: new ScriptAudioLinkRegistry(),
      limits: {
        maxWordLength: config.maxWordLength,
        maxRedirectDepth: config.maxRedirectDepth,
        searchMaturityMs: config.searchMaturityMs,
      },
      assetBaseUrl: config.assetBaseUrl,
    },
    { apiKey: config.forvoApiKey, apiBase: config.forvoApiBase }
  );

  const app = createApp({ registry });
  const server = app.listen(config.port, () => {
    logger.info({ event: 'server_listening', port: config.port }, `[Server] Listening on http://localhost:${config.port}`);
  });

  function shutdown(signal: NodeJS.Signals) {
    logger.info({ event: 'server_shutdown', signal }, `[Server] Received ${signal}, shutting down`);
    server.close(() => {
      logger.info({ event: 'server_closed' }, '[Server] Closed');
      process.exit(0);
    });
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  start();
} catch (error) {
  logger.fatal(
    { event: 'server_start_failed', error: error instanceof Error ? error.message : String(error) },
    '[Server] Failed to start'
  );
  process.exit(1);
}
