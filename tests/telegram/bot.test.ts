/**
 * Bot lifecycle tests
 */

import { describe, it, expect } from 'vitest';
import { createBot, stopTelegramBot } from '../../src/telegram/bot.js';
import { SecureLogger } from '../../src/services/SecureLogger.js';
import { createLogger } from '../../src/utils/logger.js';

const TOKEN = '12345678:test-token-placeholder-abcdefgh';

function captureLogger() {
  const events: string[] = [];
  const logger = new SecureLogger(
    createLogger({
      level: 'debug',
      destination: { write: (msg: string) => { events.push(JSON.parse(msg).event); } },
    })
  );
  return { logger, events };
}

describe('createBot', () => {
  it('requires a token', () => {
    const { logger } = captureLogger();

    expect(() => createBot('', logger)).toThrow('TELEGRAM_BOT_TOKEN is required');
  });

  it('builds a bot without contacting Telegram', () => {
    const { logger, events } = captureLogger();

    const bot = createBot(TOKEN, logger);

    expect(bot.token).toBe(TOKEN);
    expect(bot.isRunning()).toBe(false);
    expect(events).toEqual([]);
  });
});

describe('stopTelegramBot', () => {
  it('does nothing for a bot that is not running', async () => {
    const { logger, events } = captureLogger();
    const bot = createBot(TOKEN, logger);

    await stopTelegramBot(bot, logger);

    expect(events).toEqual([]);
  });
});
