/**
 * @module @switchboard/progress-reporter/types
 * Type definitions for progress feedback system.
 */

import type { AgentRole, InvocationResult } from "@switchboard/supervisor-contracts";

/**
 * Progress event types.
 */
export type ProgressEventType =
  | "run_started"
  | "agent_started"
  | "agent_completed"
  | "handoff"
  | "handoff_back"
  | "run_completed";

/**
 * Base progress event.
 */
export interface BaseProgressEvent {
  type: ProgressEventType;
  timestamp: number;
  runId: string;
}

/**
 * Run started event.
 */
export interface RunStartedEvent extends BaseProgressEvent {
  type: "run_started";
  data: {
    supervisor: string;
    workers: string[];
  };
}

/**
 * Agent step event.
 */
export interface AgentStartedEvent extends BaseProgressEvent {
  type: "agent_started";
  data: {
    agent: string;
    role: AgentRole;
    step: number; // 1-based
  };
}

export interface AgentCompletedEvent extends BaseProgressEvent {
  type: "agent_completed";
  data: {
    agent: string;
    role: AgentRole;
    step: number;
    turnCount: number;
    durationMs: number;
  };
}

/**
 * Control transfer event.
 */
export interface HandoffEvent extends BaseProgressEvent {
  type: "handoff" | "handoff_back";
  data: {
    from: string;
    to: string;
    reason?: string; // Only for 'handoff'
  };
}

/**
 * Run completed event.
 */
export interface RunCompletedEvent extends BaseProgressEvent {
  type: "run_completed";
  data: {
    status: InvocationResult["status"];
    steps: number;
    messages: number;
    totalDuration: number;
    error?: string; // Only for 'failed'
  };
}

/**
 * Union of all progress events.
 */
export type ProgressEvent =
  | RunStartedEvent
  | AgentStartedEvent
  | AgentCompletedEvent
  | HandoffEvent
  | RunCompletedEvent;

/**
 * Progress callback function.
 */
export type ProgressCallback = (event: ProgressEvent) => void;

/**
 * One display row of a conversation.
 */
export interface ConversationRow {
  role: "Human" | "AI";
  sender: string;
  content: string;
}
