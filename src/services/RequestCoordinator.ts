/**
 * RequestCoordinator - admin-gated group id relay
 *
 * Decides, for each registration command, whether to store a pending
 * private registration, deliver a group id privately, or refuse.
 *
 * Flow per subject:
 *
 *   private command  -> store awaiting_group_contact, reply with instructions
 *   group command    -> admin check (always, with a deadline)
 *                         not admin   -> unauthorized, registry untouched
 *                         check fails -> transient_failure, registry untouched
 *                         admin       -> put fulfilled + take, deliver privately,
 *                                        generic acknowledgement in the group
 *
 * A private registration is not required before the group command. It only
 * opens the private chat Telegram needs before the bot may message the user.
 *
 * Group ids only ever leave through ChatTransport.deliverPrivate.
 *
 * @module services/RequestCoordinator
 */

import type {
  ChatTransport,
  CommandContext,
  ContextReply,
  Outcome,
  RelayStatus,
  SubjectId,
} from '../types/index.js';
import { describeError, TimeoutError, withTimeout } from '../utils/errors.js';
import type { RegistrationRegistry } from './RegistrationRegistry.js';
import type { SecureLogger } from './SecureLogger.js';

/** Default admin check deadline */
export const DEFAULT_ADMIN_CHECK_TIMEOUT_MS = 5000;

export interface CoordinatorConfig {
  registry: RegistrationRegistry;
  transport: ChatTransport;
  logger: SecureLogger;
  /** Deadline for isGroupAdmin */
  adminCheckTimeoutMs?: number;
}

export class RequestCoordinator {
  private readonly registry: RegistrationRegistry;
  private readonly transport: ChatTransport;
  private readonly logger: SecureLogger;
  private readonly adminCheckTimeoutMs: number;

  constructor(config: CoordinatorConfig) {
    this.registry = config.registry;
    this.transport = config.transport;
    this.logger = config.logger;
    this.adminCheckTimeoutMs = config.adminCheckTimeoutMs ?? DEFAULT_ADMIN_CHECK_TIMEOUT_MS;
  }

  /**
   * Handle one registration command. Never rejects.
   */
  async handleCommand(subjectId: SubjectId, context: CommandContext): Promise<Outcome> {
    if (context.kind === 'private') {
      return this.handlePrivate(subjectId, context);
    }
    return this.handleGroup(subjectId, context);
  }

  /**
   * Read-only status for health checks and /status
   */
  status(): RelayStatus {
    return { liveEntryCount: this.registry.size() };
  }

  private async handlePrivate(
    subjectId: SubjectId,
    context: Extract<CommandContext, { kind: 'private' }>
  ): Promise<Outcome> {
    this.registry.put(subjectId, 'awaiting_group_contact');
    this.logger.record('request.registered', { subjectId });

    await this.reply(context, 'registration_instructions');
    return 'acknowledged';
  }

  private async handleGroup(
    subjectId: SubjectId,
    context: Extract<CommandContext, { kind: 'group' }>
  ): Promise<Outcome> {
    const groupId = context.chatId;
    const preRegistered = this.registry.get(subjectId) !== null;

    this.logger.record(
      'request.group_received',
      { subjectId, groupId, preRegistered },
      'debug'
    );

    // No registry access is held across this await
    let isAdmin: boolean;
    try {
      isAdmin = await withTimeout(
        this.transport.isGroupAdmin(subjectId, groupId),
        this.adminCheckTimeoutMs,
        'isGroupAdmin'
      );
    } catch (error) {
      this.logger.record(
        'request.admin_check_failed',
        {
          subjectId,
          groupId,
          reason: error instanceof TimeoutError ? 'timeout' : 'error',
          error: describeError(error),
        },
        'warn'
      );
      await this.reply(context, 'transient_failure');
      return 'transient_failure';
    }

    if (!isAdmin) {
      this.logger.record('request.unauthorized', { subjectId, groupId }, 'warn');
      await this.reply(context, 'unauthorized');
      return 'unauthorized';
    }

    this.registry.put(subjectId, 'fulfilled', groupId);
    const entry = this.registry.take(subjectId);
    if (entry?.groupId === undefined) {
      // put and take run back to back without yielding, so this means the
      // registry rejected the entry outright
      this.logger.record('request.entry_missing', { subjectId, groupId }, 'error');
      await this.reply(context, 'transient_failure');
      return 'transient_failure';
    }

    try {
      await this.transport.deliverPrivate(subjectId, {
        groupId: entry.groupId,
        groupTitle: context.title,
      });
    } catch (error) {
      this.logger.record(
        'request.delivery_failed',
        { subjectId, groupId, error: describeError(error) },
        'warn'
      );
      await this.reply(context, 'delivery_failed');
      return 'transient_failure';
    }

    this.logger.record('request.delivered', { subjectId, groupId, preRegistered });
    await this.reply(context, 'check_private_messages');
    return 'delivered';
  }

  /**
   * Context replies are best-effort; a failed reply never changes the outcome
   */
  private async reply(context: CommandContext, reply: ContextReply): Promise<void> {
    try {
      await this.transport.replyInContext(context, reply);
    } catch (error) {
      this.logger.record(
        'request.reply_failed',
        { chatId: context.chatId, reply, error: describeError(error) },
        'warn'
      );
    }
  }
}
