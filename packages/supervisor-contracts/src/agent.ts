/**
 * @module @switchboard/supervisor-contracts/agent
 * Agent descriptors and the opaque step contract.
 *
 * The core never looks inside a step: it hands over the visible transcript and
 * gets back new turns plus, for the supervisor, a routing decision.
 */

import type { Message } from './messages.js';

// ═══════════════════════════════════════════════════════════════════════
// Roles
// ═══════════════════════════════════════════════════════════════════════

/**
 * - `supervisor` — decides routing and produces the final answer
 * - `worker`     — specialist invoked only through the supervisor
 */
export type AgentRole = 'supervisor' | 'worker';

/**
 * Default reserved name of the supervisor node.
 */
export const DEFAULT_SUPERVISOR_NAME = 'supervisor';

// ═══════════════════════════════════════════════════════════════════════
// Step contract
// ═══════════════════════════════════════════════════════════════════════

/**
 * Routing decision returned by the supervisor step.
 */
export type SupervisorDecision =
  | { action: 'handoff'; to: string; reason?: string }
  | { action: 'finish'; answer: string };

/**
 * One model-authored turn emitted by a step (reasoning, tool summary, answer).
 */
export interface AgentTurn {
  content: string;
}

export interface StepResult {
  /** Turns in production order; appended as `ai` messages from the agent */
  turns?: readonly AgentTurn[];
  /** Required for the supervisor; workers may only `finish` */
  decision?: SupervisorDecision;
}

export interface StepContext {
  runId: string;
  agent: AgentDescriptor;
  /** Transcript visible at the time of the call */
  messages: readonly Message[];
  /** Steps executed so far in this invocation (this one excluded) */
  stepCount: number;
  /** Cancellation/deadline token; steps should honour it */
  signal: AbortSignal;
}

/**
 * The opaque reasoning/tool loop of one agent, invoked as a single atomic step.
 */
export type AgentStep = (ctx: StepContext) => Promise<StepResult>;

// ═══════════════════════════════════════════════════════════════════════
// Descriptors
// ═══════════════════════════════════════════════════════════════════════

/**
 * Agent as declared in a workflow definition.
 */
export interface AgentSpec {
  name: string;
  /** Capability ids (tools the agent may use); opaque to the core */
  capabilities?: readonly string[];
  /** System instruction handed to the step collaborator */
  instruction: string;
  step: AgentStep;
}

/**
 * Supervisor spec; the name defaults to {@link DEFAULT_SUPERVISOR_NAME}.
 */
export type SupervisorSpec = Omit<AgentSpec, 'name'> & { name?: string };

/**
 * Registered, frozen agent.
 */
export interface AgentDescriptor {
  readonly name: string;
  readonly role: AgentRole;
  readonly capabilities: readonly string[];
  readonly instruction: string;
  readonly step: AgentStep;
}
