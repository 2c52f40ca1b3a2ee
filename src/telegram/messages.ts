/**
 * Telegram message texts
 *
 * Everything the bot says lives here. Only privateGroupIdMessage ever
 * contains a group id.
 */

import { InlineKeyboard } from 'grammy';
import type { ContextReply, HealthSnapshot, PrivatePayload } from '../types/index.js';

/** Callback data of the support button */
export const SUPPORT_CALLBACK = 'support';

/** Command users send to register and to request a group id */
export const REGISTER_COMMAND = 'groupid';

/**
 * Escape legacy-Markdown control characters in user-supplied text
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

function formatTtl(ttlSeconds: number): string {
  if (ttlSeconds % 60 === 0) {
    const minutes = ttlSeconds / 60;
    return minutes === 1 ? '1 minute' : `${minutes} minutes`;
  }
  return ttlSeconds === 1 ? '1 second' : `${ttlSeconds} seconds`;
}

/**
 * Generic replies posted into the chat a command came from
 */
export function contextReplyText(reply: ContextReply, ttlSeconds: number): string {
  switch (reply) {
    case 'registration_instructions':
      return (
        `👋 Hi! I fetch Telegram group IDs without posting them in the group.\n\n` +
        `How it works:\n` +
        `1. Add me to a group you administer\n` +
        `2. Send /${REGISTER_COMMAND} in that group\n` +
        `3. I'll message you the group's ID here\n` +
        `4. I forget everything after ${formatTtl(ttlSeconds)}.`
      );
    case 'check_private_messages':
      return '✅ Done! Check your private messages with me.';
    case 'unauthorized':
      return 'Sorry, only group admins can use this command.';
    case 'transient_failure':
      return "I couldn't complete that request right now. Please try again in a moment.";
    case 'delivery_failed':
      return (
        `I couldn't message you privately. Open a private chat with me, ` +
        `send /${REGISTER_COMMAND}, then try again here.`
      );
  }
}

/**
 * The one message that discloses a group id
 */
export function privateGroupIdMessage(payload: PrivatePayload, ttlSeconds: number): string {
  const title = payload.groupTitle ? escapeMarkdown(payload.groupTitle) : 'Unnamed group';
  return (
    `🆔 *Group ID*\n\n` +
    `📝 Title: ${title}\n` +
    `ID: \`${payload.groupId}\`\n\n` +
    `Tap the ID to copy it. This request is forgotten after ${formatTtl(ttlSeconds)}.`
  );
}

/**
 * Inline keyboard attached to the private id message
 */
export function supportKeyboard(): InlineKeyboard {
  return new InlineKeyboard().text('⭐ Support the bot', SUPPORT_CALLBACK);
}

export function helpText(ttlSeconds: number): string {
  return (
    `*Group ID Relay*\n\n` +
    `I send you a group's ID privately, so it never shows up in the group.\n\n` +
    `*How to use:*\n` +
    `1. Send /${REGISTER_COMMAND} to me in a private chat\n` +
    `2. Add me to your group\n` +
    `3. Send /${REGISTER_COMMAND} in that group (admins only)\n` +
    `4. I'll message you the group ID\n\n` +
    `*Privacy:* requests live in memory only and are forgotten after ${formatTtl(ttlSeconds)}.\n\n` +
    `*Commands:*\n` +
    `/${REGISTER_COMMAND} - Register privately or get a group ID\n` +
    `/help - Show this help message\n` +
    `/status - Show current memory usage`
  );
}

const CIRCUIT_LABELS: Record<HealthSnapshot['adminCheckCircuit'], string> = {
  closed: 'OK',
  halfOpen: 'recovering',
  open: 'unavailable',
};

export function statusText(
  liveEntryCount: number,
  ttlSeconds: number,
  health: HealthSnapshot
): string {
  return (
    `*Relay Status*\n\n` +
    `Pending requests: ${liveEntryCount}\n` +
    `Request TTL: ${ttlSeconds} seconds\n` +
    `Admin checks: ${CIRCUIT_LABELS[health.adminCheckCircuit]}\n` +
    `Dropped log records: ${health.droppedLogRecords}\n\n` +
    `All data is kept in RAM only and expires automatically.`
  );
}

export const SUPPORT_TEXT =
  `Thanks for wanting to support the bot!\n\n` +
  `To send Telegram Stars:\n` +
  `1. Tap the attachment (📎) button below\n` +
  `2. Select 'Payment'\n` +
  `3. Choose 'Send Stars'\n` +
  `4. Pick any amount you like`;

export const PRIVATE_FALLBACK_TEXT = `Use /${REGISTER_COMMAND} to get started, or /help for more info.`;

export const GENERIC_ERROR_TEXT = 'Something went wrong. Please try again later.';
