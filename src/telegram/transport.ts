/**
 * TelegramTransport - ChatTransport on the Telegram Bot API
 *
 * - isGroupAdmin goes through a circuit breaker, so an unreachable API
 *   fails fast instead of holding every request until its deadline.
 *   Only network errors, flood control and 5xx count against the circuit;
 *   a 4xx is about one request, not about Telegram
 * - deliverPrivate retries network errors, flood control and 5xx
 * - replyInContext sends fixed texts only
 */

import { GrammyError } from 'grammy';
import type { InlineKeyboardMarkup, ParseMode } from 'grammy/types';
import type { Logger } from 'pino';
import { CircuitBreaker, type CircuitState } from '../resilience/CircuitBreaker.js';
import type {
  ChatTransport,
  CommandContext,
  ContextReply,
  GroupId,
  PrivatePayload,
  SubjectId,
} from '../types/index.js';
import { isClientError, TransportError, withRetry, type RetryConfig } from '../utils/errors.js';
import { contextReplyText, privateGroupIdMessage, supportKeyboard } from './messages.js';

/** Member statuses that count as group admin */
const ADMIN_STATUSES: ReadonlySet<string> = new Set(['creator', 'administrator']);

/** getChatMember errors meaning the user is not in the group */
const NOT_A_MEMBER = /user not found|member not found|participant_id_invalid/i;

/**
 * The slice of grammY's Api this transport calls
 */
export interface TelegramApi {
  getChatMember(chatId: number | string, userId: number): Promise<{ status: string }>;
  sendMessage(
    chatId: number | string,
    text: string,
    other?: { parse_mode?: ParseMode; reply_markup?: InlineKeyboardMarkup }
  ): Promise<unknown>;
}

export interface TelegramTransportConfig {
  api: TelegramApi;
  /** Shown in texts that mention how long data is kept */
  ttlSeconds: number;
  /** Circuit breaker call timeout */
  adminCheckTimeoutMs: number;
  /** Circuit breaker reset timeout */
  adminCheckResetMs?: number;
  /** Backoff for private delivery */
  retry?: Partial<RetryConfig>;
  logger?: Logger;
}

export class TelegramTransport implements ChatTransport {
  private readonly api: TelegramApi;
  private readonly ttlSeconds: number;
  private readonly retry: Partial<RetryConfig>;
  private readonly adminCheck: CircuitBreaker<[number | string, number], { status: string }>;

  constructor(config: TelegramTransportConfig) {
    this.api = config.api;
    this.ttlSeconds = config.ttlSeconds;
    this.retry = config.retry ?? { maxAttempts: 3, initialDelayMs: 500, maxDelayMs: 5000 };
    this.adminCheck = new CircuitBreaker(
      (chatId: number | string, userId: number) => this.api.getChatMember(chatId, userId),
      {
        name: 'telegram-get-chat-member',
        timeout: config.adminCheckTimeoutMs,
        resetTimeout: config.adminCheckResetMs ?? 30000,
        errorFilter: isClientError,
        logger: config.logger,
      }
    );
  }

  async isGroupAdmin(subjectId: SubjectId, groupId: GroupId): Promise<boolean> {
    const userId = toUserId(subjectId);
    try {
      const member = await this.adminCheck.fire(groupId, userId);
      return ADMIN_STATUSES.has(member.status);
    } catch (error) {
      if (isNotAMember(error)) {
        return false;
      }
      throw new TransportError('getChatMember', error);
    }
  }

  async deliverPrivate(subjectId: SubjectId, payload: PrivatePayload): Promise<void> {
    const text = privateGroupIdMessage(payload, this.ttlSeconds);
    try {
      await withRetry(
        () =>
          this.api.sendMessage(subjectId, text, {
            parse_mode: 'Markdown',
            reply_markup: supportKeyboard(),
          }),
        this.retry,
        'deliverPrivate'
      );
    } catch (error) {
      throw new TransportError('sendMessage', error);
    }
  }

  async replyInContext(context: CommandContext, reply: ContextReply): Promise<void> {
    try {
      await this.api.sendMessage(context.chatId, contextReplyText(reply, this.ttlSeconds));
    } catch (error) {
      throw new TransportError('sendMessage', error);
    }
  }

  /**
   * Admin check circuit state, shown by /status
   */
  adminCheckState(): CircuitState {
    return this.adminCheck.getState();
  }

  /**
   * Release breaker timers
   */
  shutdown(): void {
    this.adminCheck.shutdown();
  }
}

/**
 * getChatMember takes a numeric user id
 */
function toUserId(subjectId: SubjectId): number {
  const userId = typeof subjectId === 'number' ? subjectId : Number(subjectId);
  if (!Number.isSafeInteger(userId)) {
    throw new TransportError('getChatMember', new Error('Subject id is not a Telegram user id'));
  }
  return userId;
}

function isNotAMember(error: unknown): boolean {
  return (
    error instanceof GrammyError &&
    error.error_code === 400 &&
    NOT_A_MEMBER.test(error.description)
  );
}
