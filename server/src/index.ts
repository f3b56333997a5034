import { loadConfig } from '../../src/config.js';
import { CredentialGate } from '../../src/auth/credentialGate.js';
import { createApp } from './app.js';
import { openStores } from './bootstrap.js';

function main(): void {
  const config = loadConfig();
  const { records, settings } = openStores(config);
  const gate = new CredentialGate(settings.pinHash(), config.pinAttempts);

  const app = createApp({
    records,
    settings,
    gate,
    nearThreshold: config.nearThreshold,
    topCategories: config.topCategories,
    allowedOrigins: config.allowedOrigins,
    onExhausted: () => {
      console.error('[server] Too many PIN attempts; shutting down');
      process.exitCode = 1;
      server.close();
      server.closeIdleConnections();
    },
  });

  const server = app.listen(config.port, config.host, () => {
    console.log(`API server running on http://${config.host}:${config.port}`);
    console.log(`[server] Data directory: ${config.dataDir}`);
  });
}

try {
  main();
} catch (error) {
  console.error('[server] Failed to start:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
