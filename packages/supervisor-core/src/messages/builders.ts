/**
 * Message draft helpers.
 */

import { USER_SENDER, type Message, type MessageDraft } from '@switchboard/supervisor-contracts';

export function humanMessage(content: string): MessageDraft {
  return { kind: 'human', sender: USER_SENDER, content };
}

export function aiMessage(sender: string, content: string, recipient?: string): MessageDraft {
  return recipient === undefined
    ? { kind: 'ai', sender, content }
    : { kind: 'ai', sender, content, recipient };
}

/**
 * Content of the last `ai` message, or undefined if there is none.
 */
export function finalAnswerOf(messages: readonly Message[]): string | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message.kind === 'ai') {
      return message.content;
    }
  }
  return undefined;
}
