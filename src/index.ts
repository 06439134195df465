/**
 * Top-up Assistant - Main Entry Point
 *
 * Loads configuration, connects Redis and serves the WhatsApp webhook.
 *
 * @module index
 */

import { serve, type ServerType } from '@hono/node-server';

import { createTopupBot } from './bot';
import { MENU_COMMANDS } from './commands';
import { loadEnvConfig, type EnvConfig } from './config';
import { RedisMessageLedger, closeRedisConnection, getRedisClient, initRedis, isRedisReady } from './db';
import { log, maskUrlCredentials, setLogLevel } from './logger';
import { createIntentClassifier } from './parsing';
import { BackendClient } from './services/backend';
import { WhatsAppClient } from './services/whatsapp';

// ============================================================================
// Graceful Shutdown
// ============================================================================

let server: ServerType | null = null;
let isShuttingDown = false;

function closeServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server) {
      resolve();
      return;
    }
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Handle graceful shutdown of the server and connections.
 */
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    log('warn', 'Shutdown already in progress');
    return;
  }

  isShuttingDown = true;
  log('info', `Received ${signal}, starting graceful shutdown`);

  try {
    log('info', 'Closing HTTP server');
    await closeServer();

    log('info', 'Closing Redis connection');
    await closeRedisConnection();

    log('info', 'Shutdown completed successfully');
    process.exit(0);
  } catch (error) {
    log('error', 'Error during shutdown', { error });
    process.exit(1);
  }
}

/**
 * Register shutdown handlers for graceful termination.
 */
function registerShutdownHandlers(): void {
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    log('error', 'Uncaught exception', { error });
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    log('error', 'Unhandled rejection', { error: reason });
    void shutdown('unhandledRejection');
  });
}

// ============================================================================
// Initialization
// ============================================================================

/**
 * Initialize Redis connection and verify it's ready.
 */
async function initializeRedis(redisUrl: string): Promise<void> {
  log('info', 'Initializing Redis connection');

  await initRedis(redisUrl);

  // Wait for connection with timeout
  const timeout = 10000; // 10 seconds
  const startTime = Date.now();

  while (!isRedisReady() && Date.now() - startTime < timeout) {
    await new Promise((resolve) => setTimeout(resolve, 100));
  }

  if (!isRedisReady()) {
    throw new Error('Redis connection timeout');
  }

  await getRedisClient().ping();
  log('info', 'Redis connection established');
}

/**
 * Build the webhook app and start listening.
 */
function startServer(config: EnvConfig): void {
  const classifier = createIntentClassifier(config.classifier);
  const backend = new BackendClient(config.backend);

  const app = createTopupBot({
    classifier,
    sender: new WhatsAppClient(config.whatsapp),
    ledger: new RedisMessageLedger(),
    accounts: backend,
    orders: backend,
    verifyToken: config.whatsapp.verifyToken,
    appSecret: config.whatsapp.appSecret,
  });

  server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log('info', 'Top-up assistant started successfully', {
      port: info.port,
      commands: classifier.priority,
      menu: MENU_COMMANDS.map((command) => `${command.option}. ${command.title}`),
    });
  });
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  log('info', 'Starting top-up assistant');

  try {
    const config = loadEnvConfig();
    setLogLevel(config.logLevel);
    log('info', 'Environment configuration loaded', {
      port: config.port,
      redisUrl: maskUrlCredentials(config.redisUrl),
      backendUrl: config.backend.baseUrl,
      signatureCheck: config.whatsapp.appSecret !== undefined,
    });

    registerShutdownHandlers();

    await initializeRedis(config.redisUrl);

    startServer(config);
  } catch (error) {
    log('error', 'Failed to start top-up assistant', { error });
    process.exit(1);
  }
}

void main();
