/**
 * @switchboard/supervisor-core
 *
 * Supervisor orchestration: registry, handoff protocol, history aggregation,
 * star workflow graph and the invocation runtime.
 */

// Workflow
export { createSupervisor, SupervisorWorkflow } from './workflow.js';
export type { CompiledSupervisor } from './workflow.js';

// Registry and file-based definitions
export { AgentRegistry } from './registry/agent-registry.js';
export { loadWorkflowDefinition, parseWorkflowDefinition } from './registry/definition-loader.js';
export type { WorkflowDefinitionOverrides } from './registry/definition-loader.js';

// Messages
export { Transcript } from './messages/transcript.js';
export type { TranscriptOptions } from './messages/transcript.js';
export { humanMessage, aiMessage, finalAnswerOf } from './messages/builders.js';

// Handoff protocol
export {
  HandoffProtocol,
  handoffMarker,
  handoffBackMarker,
  toHandoffRecord,
  extractHandoffs,
} from './handoff/handoff-protocol.js';
export type {
  HandoffRequest,
  HandoffRequestDraft,
  HandoffResponseDraft,
  HandoffProtocolOptions,
} from './handoff/handoff-protocol.js';

// History aggregation
export { HistoryAggregator, fullHistoryPolicy, lastMessagePolicy } from './history/history-aggregator.js';
export type { FoldResult } from './history/history-aggregator.js';

// Graph
export { WorkflowGraph } from './graph/workflow-graph.js';
export { toMermaid } from './graph/mermaid.js';
export type { MermaidOptions } from './graph/mermaid.js';

// Execution
export { SupervisorRuntime } from './execution/runtime.js';
export type { RuntimeConfig } from './execution/runtime.js';
export { RuntimeStateMachine } from './execution/state-machine.js';
export type { PhaseTransition } from './execution/state-machine.js';
export { createCancellation } from './execution/cancellation.js';
export type { Cancellation } from './execution/cancellation.js';

// Events
export { createObserverBus, createEvent } from './events/observer-bus.js';
export type { ObserverBus } from './events/observer-bus.js';

// Logging
export { createLogger, fromPino, createNoopLogger } from './logging/logger.js';
export type { LoggerOptions } from './logging/logger.js';
