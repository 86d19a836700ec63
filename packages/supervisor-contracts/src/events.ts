/**
 * @module @switchboard/supervisor-contracts/events
 * Observer events emitted at state-machine transition points.
 *
 * Observers are passive: they cannot change the run, and a throwing observer
 * is isolated from the runtime and from other observers.
 */

import type { AgentRole } from './agent.js';
import type { ConversationStatus, HandoffRecord, RuntimePhase } from './state.js';

// ─────────────────────────────────────────────────────────────────────────────
// SupervisorEventMap — typed event payloads
// ─────────────────────────────────────────────────────────────────────────────

export interface SupervisorEventMap {
  'run:start':    { inputCount: number; supervisor: string; workers: string[] };
  'phase':        { from: RuntimePhase; to: RuntimePhase };
  'step:start':   { agent: string; role: AgentRole; stepCount: number };
  'step:end':     { agent: string; role: AgentRole; stepCount: number; turnCount: number; durationMs: number };
  'handoff':      { record: HandoffRecord };
  'handoff:back': { from: string; to: string; record?: HandoffRecord };
  'aggregate':    { agent: string; produced: number; kept: number };
  'run:end':      { status: Exclude<ConversationStatus, 'running'>; stepCount: number; messageCount: number; durationMs: number; error?: string };
}

export type SupervisorEventType = keyof SupervisorEventMap;

export interface SupervisorEventOf<K extends SupervisorEventType> {
  type: K;
  timestamp: string;        // ISO 8601
  runId: string;
  data: SupervisorEventMap[K];
}

export type SupervisorEvent = {
  [K in SupervisorEventType]: SupervisorEventOf<K>;
}[SupervisorEventType];

export type SupervisorObserver = (event: SupervisorEvent) => void;

export type Unsubscribe = () => void;
