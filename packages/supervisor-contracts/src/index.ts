// ============================================
// Switchboard - Supervisor Type Contracts
// ============================================

// Message Model
export type {
  MessageKind,
  HumanMessage,
  AIMessage,
  HandoffRequestMessage,
  HandoffResponseMessage,
  Message,
  MessageDraft,
} from './messages.js';
export { USER_SENDER, isHandoffMessage } from './messages.js';

// Agents and steps
export type {
  AgentRole,
  SupervisorDecision,
  AgentTurn,
  StepResult,
  StepContext,
  AgentStep,
  AgentSpec,
  SupervisorSpec,
  AgentDescriptor,
} from './agent.js';
export { DEFAULT_SUPERVISOR_NAME } from './agent.js';

// Graph view
export type { GraphNode, GraphEdge, GraphView } from './graph.js';

// Runtime state and results
export type {
  RuntimePhase,
  ConversationStatus,
  HandoffRecord,
  CompletedInvocation,
  CancelledInvocation,
  FailedInvocation,
  InvocationResult,
} from './state.js';
export { TERMINAL_PHASES } from './state.js';

// Observer events
export type {
  SupervisorEventMap,
  SupervisorEventType,
  SupervisorEventOf,
  SupervisorEvent,
  SupervisorObserver,
  Unsubscribe,
} from './events.js';

// Workflow definition
export type {
  WorkerSpan,
  AggregationPolicy,
  WorkflowDefinition,
  InvokeOptions,
} from './workflow.js';

// Logger
export type { LogMeta, ILogger } from './logger.js';

// Errors
export type { SupervisorErrorCode } from './errors.js';
export {
  SupervisorError,
  DuplicateAgentNameError,
  RegistrySealedError,
  UnknownAgentError,
  UnknownAgentRouteError,
  IllegalHandoffError,
  AgentExecutionError,
  IterationLimitExceededError,
  TranscriptLimitExceededError,
  CancellationError,
  WorkflowConfigError,
  StateTransitionError,
  isSupervisorError,
} from './errors.js';

// Zod Schemas
export type {
  OutputMode,
  WorkflowOptionsInput,
  WorkflowOptions,
  AgentDefinition,
  WorkflowFile,
} from './schemas.js';
export {
  DEFAULT_ITERATION_LIMIT,
  AgentNameSchema,
  OutputModeSchema,
  WorkflowOptionsSchema,
  InvokeOptionsSchema,
  StepResultSchema,
  AgentDefinitionSchema,
  WorkflowFileSchema,
  formatIssues,
} from './schemas.js';
