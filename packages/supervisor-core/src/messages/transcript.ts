/**
 * Transcript — append-only message log of one invocation.
 *
 * appendMessage() is the only way to add history: it assigns the next
 * sequence index and freezes the message. Indices are contiguous from
 * `startIndex`.
 */

import {
  TranscriptLimitExceededError,
  type Message,
  type MessageDraft,
} from '@switchboard/supervisor-contracts';

export interface TranscriptOptions {
  /** First sequence index. Default: 0 */
  startIndex?: number;
  /** Maximum number of messages (unbounded when absent) */
  messageLimit?: number;
}

export class Transcript {
  private readonly messages: Message[] = [];
  private readonly startIndex: number;
  private readonly messageLimit?: number;

  constructor(options: TranscriptOptions = {}) {
    this.startIndex = options.startIndex ?? 0;
    this.messageLimit = options.messageLimit;
  }

  append(draft: MessageDraft): Message {
    if (this.messageLimit !== undefined && this.messages.length >= this.messageLimit) {
      throw new TranscriptLimitExceededError(this.messageLimit);
    }

    const message: Message = Object.freeze({
      ...draft,
      sequenceIndex: this.nextIndex,
    });
    this.messages.push(message);
    return message;
  }

  appendAll(drafts: readonly MessageDraft[]): Message[] {
    return drafts.map((draft) => this.append(draft));
  }

  get nextIndex(): number {
    return this.startIndex + this.messages.length;
  }

  get length(): number {
    return this.messages.length;
  }

  last(): Message | undefined {
    return this.messages[this.messages.length - 1];
  }

  /** Snapshot; later appends do not show up in it */
  toArray(): readonly Message[] {
    return Object.freeze([...this.messages]);
  }
}
