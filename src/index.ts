/**
 * Group ID Relay Entry Point
 *
 * Telegram bot that sends a group's ID privately to a group admin.
 * This service:
 * - Registers users who start the bot privately
 * - Verifies admin status when the command is sent in a group
 * - Delivers the group ID by private message only
 * - Keeps every request in RAM for a few minutes and nothing on disk
 */

import { getRegistryTtlMs, getSweepIntervalMs, loadConfig, type Config } from './config.js';
import {
  RegistrationRegistry,
  RegistrySweepJob,
  RequestCoordinator,
  SecureLogger,
} from './services/index.js';
import { createBot, startTelegramBot, stopTelegramBot } from './telegram/bot.js';
import { registerAllCommands } from './telegram/commands/index.js';
import { TelegramTransport } from './telegram/transport.js';
import { ConfigurationError } from './utils/errors.js';
import { createLogger, logger, setLogLevel } from './utils/logger.js';

async function main(config: Config): Promise<void> {
  const baseLogger = createLogger({ level: config.logging.level });
  const secureLogger = new SecureLogger(baseLogger, { digestKey: config.logging.digestKey });

  secureLogger.record('service.starting', {
    ttlSeconds: config.registry.ttlSeconds,
    sweepIntervalSeconds: config.registry.sweepIntervalSeconds,
    digestKeyConfigured: config.logging.digestKey !== undefined,
  });

  const registry = new RegistrationRegistry({
    ttlMs: getRegistryTtlMs(config),
    logger: secureLogger,
  });
  const sweepJob = new RegistrySweepJob(registry, secureLogger, getSweepIntervalMs(config));

  const bot = createBot(config.telegram.botToken, secureLogger);

  const transport = new TelegramTransport({
    api: bot.api,
    ttlSeconds: config.registry.ttlSeconds,
    adminCheckTimeoutMs: config.adminCheck.timeoutMs,
    adminCheckResetMs: config.adminCheck.resetMs,
    logger: baseLogger,
  });

  const coordinator = new RequestCoordinator({
    registry,
    transport,
    logger: secureLogger,
    adminCheckTimeoutMs: config.adminCheck.timeoutMs,
  });

  registerAllCommands(bot, {
    coordinator,
    logger: secureLogger,
    ttlSeconds: config.registry.ttlSeconds,
    health: () => ({
      adminCheckCircuit: transport.adminCheckState(),
      droppedLogRecords: secureLogger.droppedRecords,
    }),
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    secureLogger.record('service.shutdown', { signal });

    sweepJob.stop();
    await stopTelegramBot(bot, secureLogger);
    transport.shutdown();

    const cleared = registry.clear();
    secureLogger.record('service.memory_cleared', { cleared });
  };

  process.once('SIGINT', (signal) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error }, 'Shutdown failed');
      process.exitCode = 1;
    });
  });
  process.once('SIGTERM', (signal) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error }, 'Shutdown failed');
      process.exitCode = 1;
    });
  });

  sweepJob.start();

  // Resolves when the bot is stopped
  await startTelegramBot(bot, secureLogger, {
    dropPendingUpdates: config.telegram.dropPendingUpdates,
  });
}

let config: Config;
try {
  config = loadConfig();
  setLogLevel(config.logging.level);
} catch (error) {
  if (error instanceof ConfigurationError) {
    logger.fatal({ errors: error.issues }, 'Configuration validation failed');
  } else {
    logger.fatal({ error }, 'Failed to load configuration');
  }
  process.exit(1);
}

main(config).catch((error) => {
  logger.fatal({ error }, 'Group ID relay crashed');
  process.exit(1);
});
