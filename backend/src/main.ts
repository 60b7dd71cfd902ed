/**
 * Gateway entry point: validate configuration, start listening, shut down on signal
 */

import { config, printConfig, validateConfig } from './config/index.js';
import { createAgentClient } from './llm/index.js';
import { startServer } from './server.js';

console.log('[Server] Loading configuration...');
const validation = validateConfig();

if (!validation.valid) {
  console.error('[Server] Configuration validation failed:');
  validation.errors.forEach((error) => console.error(`  [ERROR] ${error}`));
  console.error('\nPlease fix the configuration errors before starting the server.\n');
  process.exit(1);
}

// Print configuration in development
if (config.server.env === 'development') {
  printConfig();
}

const client = createAgentClient(config);

startServer(config, client)
  .then((server) => {
    console.log(`
============================================================
 Agent Gateway
 Port: ${config.server.port.toString().padEnd(48)}
 Host: ${config.server.host.padEnd(48)}
 Mode: ${(config.agent.useNative ? 'native' : 'compatible').padEnd(48)}
 Ready to accept connections...
============================================================
  `);

    // Graceful shutdown
    const gracefulShutdown = (signal: string) => {
      console.log(`\n[Server] Received ${signal}, shutting down gracefully...`);
      server.close(() => {
        console.log('[Server] Closed');
        process.exit(0);
      });
      // Open streams can hold the listener past the stream timeout
      server.closeIdleConnections();
    };

    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  })
  .catch((error: unknown) => {
    console.error('[Server] Failed to start:', error);
    process.exit(1);
  });
