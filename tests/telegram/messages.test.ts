/**
 * Message text tests
 */

import { describe, it, expect } from 'vitest';
import {
  contextReplyText,
  escapeMarkdown,
  helpText,
  privateGroupIdMessage,
  statusText,
  supportKeyboard,
} from '../../src/telegram/messages.js';
import type { ContextReply } from '../../src/types/index.js';

const ALL_REPLIES: ContextReply[] = [
  'registration_instructions',
  'check_private_messages',
  'unauthorized',
  'transient_failure',
  'delivery_failed',
];

describe('escapeMarkdown', () => {
  it('escapes legacy Markdown control characters', () => {
    expect(escapeMarkdown('a_b*c`d[e')).toBe('a\\_b\\*c\\`d\\[e');
  });

  it('leaves plain text alone', () => {
    expect(escapeMarkdown('Release Crew 2')).toBe('Release Crew 2');
  });
});

describe('privateGroupIdMessage', () => {
  it('shows the escaped title and the id in code', () => {
    expect(privateGroupIdMessage({ groupId: -1001234, groupTitle: 'Team_A' }, 300)).toBe(
      '🆔 *Group ID*\n\n📝 Title: Team\\_A\nID: `-1001234`\n\n' +
        'Tap the ID to copy it. This request is forgotten after 5 minutes.'
    );
  });

  it('falls back when the group has no title', () => {
    const text = privateGroupIdMessage({ groupId: -42 }, 60);

    expect(text).toContain('📝 Title: Unnamed group\n');
    expect(text.endsWith('This request is forgotten after 1 minute.')).toBe(true);
  });

  it('states a TTL that is not whole minutes in seconds', () => {
    expect(privateGroupIdMessage({ groupId: -42 }, 90)).toMatch(/forgotten after 90 seconds\.$/);
  });
});

describe('contextReplyText', () => {
  it.each(ALL_REPLIES)('never contains a digit-run id for %s', (reply) => {
    expect(contextReplyText(reply, 300)).not.toMatch(/-?\d{5,}/);
  });

  it('gives fixed generic texts', () => {
    expect(contextReplyText('check_private_messages', 300)).toBe(
      '✅ Done! Check your private messages with me.'
    );
    expect(contextReplyText('unauthorized', 300)).toBe(
      'Sorry, only group admins can use this command.'
    );
    expect(contextReplyText('transient_failure', 300)).toBe(
      "I couldn't complete that request right now. Please try again in a moment."
    );
  });

  it('mentions the command and the TTL in the instructions', () => {
    const text = contextReplyText('registration_instructions', 300);

    expect(text).toContain('2. Send /groupid in that group\n');
    expect(text).toContain('4. I forget everything after 5 minutes.');
  });

  it('tells the user how to open a private chat when delivery fails', () => {
    expect(contextReplyText('delivery_failed', 300)).toBe(
      "I couldn't message you privately. Open a private chat with me, send /groupid, then try again here."
    );
  });
});

describe('supportKeyboard', () => {
  it('has a single support button', () => {
    expect(supportKeyboard().inline_keyboard).toEqual([
      [{ text: '⭐ Support the bot', callback_data: 'support' }],
    ]);
  });
});

describe('helpText and statusText', () => {
  it('lists every command in help', () => {
    const text = helpText(300);

    expect(text).toContain('/groupid - Register privately or get a group ID');
    expect(text).toContain('/help - Show this help message');
    expect(text).toContain('/status - Show current memory usage');
    expect(text).toContain('forgotten after 5 minutes');
  });

  it('reports the live count and TTL', () => {
    const text = statusText(3, 300, { adminCheckCircuit: 'halfOpen', droppedLogRecords: 1 });

    expect(text).toBe(
      '*Relay Status*\n\n' +
        'Pending requests: 3\n' +
        'Request TTL: 300 seconds\n' +
        'Admin checks: recovering\n' +
        'Dropped log records: 1\n\n' +
        'All data is kept in RAM only and expires automatically.'
    );
  });
});
