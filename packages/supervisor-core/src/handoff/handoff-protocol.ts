/**
 * HandoffProtocol — control transfers as first-class transcript entries.
 *
 * Rules:
 *   - only the supervisor may activate a worker (single active agent,
 *     single writer of the conversation state)
 *   - the target must be a registered worker; validation happens before any
 *     message is produced, so a bad route never leaves a partial handoff
 *   - handing control back may be marked with a `handoff_response` carrying
 *     nothing but a control marker
 *
 * Marker names follow the handoff tool names `transfer_to_<worker>` and
 * `transfer_back_to_<supervisor>`.
 */

import {
  IllegalHandoffError,
  UnknownAgentRouteError,
  isHandoffMessage,
  type AgentDescriptor,
  type HandoffRecord,
  type HandoffRequestMessage,
  type HandoffResponseMessage,
  type Message,
  type MessageDraft,
} from '@switchboard/supervisor-contracts';
import type { AgentRegistry } from '../registry/agent-registry.js';

export interface HandoffRequest {
  to: string;
  reason?: string;
}

export type HandoffRequestDraft = Extract<MessageDraft, { kind: 'handoff_request' }>;
export type HandoffResponseDraft = Extract<MessageDraft, { kind: 'handoff_response' }>;

export interface HandoffProtocolOptions {
  addHandoffBackMessages: boolean;
}

export function handoffMarker(target: string): string {
  return `transfer_to_${target}`;
}

export function handoffBackMarker(supervisor: string): string {
  return `transfer_back_to_${supervisor}`;
}

export class HandoffProtocol {
  constructor(
    private readonly registry: AgentRegistry,
    private readonly options: HandoffProtocolOptions,
  ) {}

  /**
   * Validate a routing decision and build its `handoff_request`.
   *
   * @param activeAgent agent currently holding control
   * @returns the target worker and the draft to append
   */
  requestHandoff(
    activeAgent: string,
    request: HandoffRequest,
  ): { target: AgentDescriptor; draft: HandoffRequestDraft } {
    const supervisor = this.registry.supervisor.name;

    if (activeAgent !== supervisor) {
      throw new IllegalHandoffError(activeAgent, request.to);
    }
    if (!this.registry.has(request.to)) {
      throw new UnknownAgentRouteError(activeAgent, request.to);
    }

    const target = this.registry.resolve(request.to);
    const reason = request.reason?.trim();

    return {
      target,
      draft: {
        kind: 'handoff_request',
        sender: supervisor,
        recipient: target.name,
        content: reason ? reason : handoffMarker(target.name),
      },
    };
  }

  /**
   * Marker recorded when `worker` hands control back, or null when
   * handoff-back messages are disabled.
   */
  returnControl(worker: AgentDescriptor): HandoffResponseDraft | null {
    if (!this.options.addHandoffBackMessages) {
      return null;
    }

    const supervisor = this.registry.supervisor.name;
    return {
      kind: 'handoff_response',
      sender: worker.name,
      recipient: supervisor,
      content: handoffBackMarker(supervisor),
    };
  }

  isControlMarker(message: Message | MessageDraft): boolean {
    return isHandoffMessage(message);
  }
}

export function toHandoffRecord(message: HandoffRequestMessage | HandoffResponseMessage): HandoffRecord {
  return {
    from: message.sender,
    to: message.recipient,
    reason: message.content,
    sequenceIndex: message.sequenceIndex,
  };
}

/**
 * Rebuild the audit trail of control transfers from a transcript.
 */
export function extractHandoffs(messages: readonly Message[]): HandoffRecord[] {
  return messages.flatMap((message) => (isHandoffMessage(message) ? [toHandoffRecord(message)] : []));
}
