/**
 * @module @switchboard/supervisor-contracts/state
 * Runtime phases, conversation status and invocation results.
 */

import type { Message } from './messages.js';
import type { SupervisorError } from './errors.js';

/**
 * Phases of the orchestration state machine.
 */
export type RuntimePhase =
  | 'awaiting_decision'
  | 'dispatched'
  | 'aggregating'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const TERMINAL_PHASES: readonly RuntimePhase[] = ['completed', 'failed', 'cancelled'];

export type ConversationStatus = 'running' | 'completed' | 'failed' | 'cancelled';

/**
 * A control transfer, derived from a handoff message.
 */
export interface HandoffRecord {
  from: string;
  to: string;
  reason: string;
  /** Index of the handoff message that recorded the transfer */
  sequenceIndex: number;
}

interface InvocationResultBase {
  runId: string;
  messages: readonly Message[];
  stepCount: number;
  handoffs: HandoffRecord[];
}

export interface CompletedInvocation extends InvocationResultBase {
  status: 'completed';
  finalAnswer: string;
}

export interface CancelledInvocation extends InvocationResultBase {
  status: 'cancelled';
  reason: string;
}

export interface FailedInvocation extends InvocationResultBase {
  status: 'failed';
  error: SupervisorError;
}

/**
 * Outcome of one `invoke`. Cancelled and failed results keep the partial
 * transcript for forensics.
 */
export type InvocationResult = CompletedInvocation | CancelledInvocation | FailedInvocation;
