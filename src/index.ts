import type { Server } from 'http';
import dotenv from 'dotenv';
import { createApp, type GatewayContext } from './app.js';
import { createAdapter } from './adapters/index.js';
import { createAuthenticatedClient } from './services/backendClient.js';
import { loadConfig } from './services/config.js';
import { ConfigError } from './services/errors.js';
import { configureLogger, defaultLogger, enableFileLogging } from './services/logger.js';
import { createRateLimiter } from './services/rateLimiter.js';

dotenv.config();

function buildContext(): GatewayContext {
  const config = loadConfig();

  configureLogger({ level: config.logging.level });
  if (config.logging.dir) {
    enableFileLogging(config.logging.dir);
  }

  return {
    config,
    client: createAuthenticatedClient(config.backend, defaultLogger),
    adapter: createAdapter(config.backend.provider, {
      forwardContext: config.fieldRemapping.forwardContext,
    }),
    rateLimiter: createRateLimiter(config.rateLimit, defaultLogger),
  };
}

async function shutdown(server: Server, context: GatewayContext, signal: string): Promise<void> {
  defaultLogger.info('Shutting down', { signal });

  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await Promise.all([context.client.close(), context.rateLimiter.close()]);
}

/**
 * Configuration problems end startup before anything binds
 */
function tryBuildContext(): GatewayContext | null {
  try {
    return buildContext();
  } catch (error) {
    if (error instanceof ConfigError) {
      defaultLogger.error('Invalid configuration, refusing to start', { error: error.message });
      process.exitCode = 1;
      return null;
    }
    throw error;
  }
}

function main(): void {
  const context = tryBuildContext();
  if (!context) {
    return;
  }

  const { host, port } = context.config.server;
  const app = createApp(context);

  const server = app.listen(port, host, () => {
    defaultLogger.info('Gateway listening', {
      host,
      port,
      provider: context.config.backend.provider,
      endpoint: context.config.backend.endpoint,
    });
  });

  server.on('error', (err: Error) => {
    defaultLogger.error('Server error', { error: err.message });
    process.exitCode = 1;
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(server, context, signal).catch((error: unknown) => {
        defaultLogger.error('Shutdown failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exitCode = 1;
      });
    });
  }
}

main();
