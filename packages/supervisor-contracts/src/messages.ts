/**
 * @module @switchboard/supervisor-contracts/messages
 * Conversation message model shared by the supervisor and its workers.
 *
 * Messages are produced as drafts (no sequence index) by callers and agent
 * steps. The runtime's transcript assigns `sequenceIndex` at append time and
 * freezes the message; nothing mutates or reorders it afterwards.
 */

/**
 * Sender used for caller-authored messages.
 */
export const USER_SENDER = 'user';

/**
 * Message kinds.
 *
 * - `human`            — caller input
 * - `ai`               — model-authored content from the supervisor or a worker
 * - `handoff_request`  — supervisor transfers control to a worker
 * - `handoff_response` — control marker recorded when a worker hands back
 */
export type MessageKind = 'human' | 'ai' | 'handoff_request' | 'handoff_response';

interface BaseMessage {
  kind: MessageKind;
  /** Agent name, or `"user"` for human messages */
  sender: string;
  /** Agent name the message is addressed to (absent for broadcast/final output) */
  recipient?: string;
  content: string;
  /** Monotonic position in the transcript, assigned at append time */
  sequenceIndex: number;
}

export interface HumanMessage extends BaseMessage {
  kind: 'human';
}

export interface AIMessage extends BaseMessage {
  kind: 'ai';
}

export interface HandoffRequestMessage extends BaseMessage {
  kind: 'handoff_request';
  recipient: string;
}

export interface HandoffResponseMessage extends BaseMessage {
  kind: 'handoff_response';
  recipient: string;
}

export type Message =
  | HumanMessage
  | AIMessage
  | HandoffRequestMessage
  | HandoffResponseMessage;

type Draft<T> = T extends BaseMessage ? Omit<T, 'sequenceIndex'> : never;

/**
 * A message before it is appended to a transcript.
 */
export type MessageDraft = Draft<Message>;

/**
 * Handoff messages carry control markers only and are never model-authored.
 */
export function isHandoffMessage<T extends Pick<Message, 'kind'>>(
  message: T,
): message is Extract<T, { kind: 'handoff_request' | 'handoff_response' }> {
  return message.kind === 'handoff_request' || message.kind === 'handoff_response';
}
