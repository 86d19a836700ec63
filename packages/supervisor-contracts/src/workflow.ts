/**
 * @module @switchboard/supervisor-contracts/workflow
 * Workflow definition and invocation options.
 */

import type { AgentDescriptor, AgentSpec, SupervisorSpec } from './agent.js';
import type { SupervisorObserver } from './events.js';
import type { ILogger } from './logger.js';
import type { MessageDraft } from './messages.js';
import type { OutputMode } from './schemas.js';

/**
 * Messages produced by one worker activation, before folding.
 */
export interface WorkerSpan {
  agent: AgentDescriptor;
  messages: readonly MessageDraft[];
}

/**
 * Decides which messages of a worker span become visible in the transcript.
 * Must return a subsequence of `span.messages`, in order.
 */
export type AggregationPolicy = (span: WorkerSpan) => readonly MessageDraft[];

/**
 * Build-time workflow definition. Immutable once compiled.
 */
export interface WorkflowDefinition {
  supervisor: SupervisorSpec;
  /** Workers in registration order */
  agents: readonly AgentSpec[];
  /** Default: `last_message` */
  outputMode?: OutputMode;
  /** Default: `true` */
  addHandoffBackMessages?: boolean;
  /** Maximum agent steps per invocation. Default: 25 */
  iterationLimit?: number;
  /** Maximum transcript length per invocation (unbounded when absent) */
  messageLimit?: number;
  /** Replaces the built-in rule of `outputMode` */
  aggregation?: AggregationPolicy;
  /** Attached to every invocation */
  observers?: readonly SupervisorObserver[];
  /** Default: silent */
  logger?: ILogger;
}

export interface InvokeOptions {
  /** External cancellation token */
  signal?: AbortSignal;
  /** Deadline; when reached the run is cancelled before its next step */
  timeoutMs?: number;
  /** First `sequenceIndex` of the returned transcript. Default: 0 */
  startIndex?: number;
  /** Correlation id for logs and events. Default: random UUID */
  runId?: string;
  /** Observers for this invocation only */
  observers?: readonly SupervisorObserver[];
}
