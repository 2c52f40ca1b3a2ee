/**
 * SecureLogger - audit-safe event recording
 *
 * Every chat or user id that reaches the log sink is replaced with a keyed
 * digest first. Operators can still group events for the same user or
 * group, but cannot get the id back from the logs.
 *
 * Digest: HMAC-SHA-256 over the decimal/string form of the id, truncated to
 * 16 hex characters. Telegram ids are small integers, so an unkeyed hash
 * could be reversed by enumerating them; the HMAC key is either configured
 * or generated once per process.
 *
 * @module services/SecureLogger
 */

import * as crypto from 'node:crypto';
import type { Logger } from 'pino';

/** Hex characters kept from the HMAC output */
export const DIGEST_LENGTH = 16;

/** Field names whose values are always digested */
export const DEFAULT_SENSITIVE_FIELDS = ['subjectId', 'groupId', 'chatId', 'userId'] as const;

export type RecordLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SecureLoggerOptions {
  /** HMAC key; random per process when omitted */
  digestKey?: string;
  /** Overrides DEFAULT_SENSITIVE_FIELDS */
  sensitiveFields?: readonly string[];
}

export class SecureLogger {
  private readonly key: Buffer;
  private readonly sensitiveFields: ReadonlySet<string>;
  private dropped = 0;

  constructor(
    private readonly sink: Logger,
    options: SecureLoggerOptions = {}
  ) {
    this.key = options.digestKey
      ? Buffer.from(options.digestKey, 'utf8')
      : crypto.randomBytes(32);
    this.sensitiveFields = new Set(options.sensitiveFields ?? DEFAULT_SENSITIVE_FIELDS);
  }

  /**
   * One-way digest of an identifier
   */
  digest(value: number | string): string {
    return crypto
      .createHmac('sha256', this.key)
      .update(String(value))
      .digest('hex')
      .slice(0, DIGEST_LENGTH);
  }

  /**
   * Write one event. Never throws; a failing sink only bumps droppedRecords.
   */
  record(event: string, fields: Record<string, unknown> = {}, level: RecordLevel = 'info'): void {
    try {
      this.sink[level]({ event, ...this.scrub(fields) }, event);
    } catch {
      this.dropped += 1;
    }
  }

  /**
   * Events the sink refused since startup
   */
  get droppedRecords(): number {
    return this.dropped;
  }

  private scrub(fields: Record<string, unknown>): Record<string, unknown> {
    const safe: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(fields)) {
      if (
        this.sensitiveFields.has(name) &&
        (typeof value === 'number' || typeof value === 'string')
      ) {
        safe[name] = this.digest(value);
      } else if (this.sensitiveFields.has(name) && value !== undefined && value !== null) {
        safe[name] = '[REDACTED]';
      } else {
        safe[name] = value;
      }
    }
    return safe;
  }
}
