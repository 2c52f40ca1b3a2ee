import type { CircuitState } from '../resilience/CircuitBreaker.js';

/**
 * Platform-assigned user identifier (Telegram user id)
 */
export type SubjectId = number | string;

/**
 * Platform-assigned group identifier (Telegram chat id, negative for groups)
 */
export type GroupId = number | string;

/**
 * Registration lifecycle state
 */
export type RegistrationState = 'awaiting_group_contact' | 'fulfilled';

/**
 * One user's interaction state, as held by the registry
 */
export interface RegistrationEntry {
  /** Requesting user */
  readonly subjectId: SubjectId;
  /** Where the user is in the request flow */
  readonly state: RegistrationState;
  /** Group being resolved, set once a group-context command matched */
  readonly groupId?: GroupId;
  /** Clock reading (ms) when the entry was stored */
  readonly createdAt: number;
  /** createdAt + TTL */
  readonly expiresAt: number;
}

/**
 * Chat the command was issued from
 */
export type CommandContext =
  | { kind: 'private'; chatId: SubjectId }
  | { kind: 'group'; chatId: GroupId; title?: string };

/**
 * Result of handling one command
 */
export type Outcome = 'acknowledged' | 'delivered' | 'unauthorized' | 'transient_failure';

/**
 * Generic replies sent back into the originating chat.
 * None of them carries an identifier.
 */
export type ContextReply =
  | 'registration_instructions'
  | 'check_private_messages'
  | 'unauthorized'
  | 'transient_failure'
  | 'delivery_failed';

/**
 * Content of the private message that discloses a group id
 */
export interface PrivatePayload {
  groupId: GroupId;
  groupTitle?: string;
}

/**
 * Capabilities the coordinator needs from the chat platform
 */
export interface ChatTransport {
  /** Whether the subject is creator or administrator of the group; may reject */
  isGroupAdmin(subjectId: SubjectId, groupId: GroupId): Promise<boolean>;
  /** Send a message only the subject can see */
  deliverPrivate(subjectId: SubjectId, payload: PrivatePayload): Promise<void>;
  /** Send a non-sensitive reply into the chat the command came from */
  replyInContext(context: CommandContext, reply: ContextReply): Promise<void>;
}

/**
 * Read-only health surface
 */
export interface RelayStatus {
  liveEntryCount: number;
}

/**
 * Process health reported next to RelayStatus in /status
 */
export interface HealthSnapshot {
  adminCheckCircuit: CircuitState;
  /** Log records the sink refused since startup */
  droppedLogRecords: number;
}
