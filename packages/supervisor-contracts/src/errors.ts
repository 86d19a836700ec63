/**
 * @module @switchboard/supervisor-contracts/errors
 * Typed error taxonomy for workflow construction and invocation.
 *
 * Build-time errors are thrown. Invocation errors are resolved by the runtime
 * into a `failed` result that keeps the partial transcript.
 */

import type { ZodIssue } from 'zod';

export type SupervisorErrorCode =
  | 'DUPLICATE_AGENT_NAME'
  | 'REGISTRY_SEALED'
  | 'UNKNOWN_AGENT'
  | 'UNKNOWN_AGENT_ROUTE'
  | 'ILLEGAL_HANDOFF'
  | 'AGENT_EXECUTION_FAILED'
  | 'ITERATION_LIMIT_EXCEEDED'
  | 'TRANSCRIPT_LIMIT_EXCEEDED'
  | 'CANCELLED'
  | 'INVALID_WORKFLOW_CONFIG'
  | 'INVALID_STATE_TRANSITION';

export abstract class SupervisorError extends Error {
  abstract readonly code: SupervisorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ═══════════════════════════════════════════════════════════════════════
// Registry
// ═══════════════════════════════════════════════════════════════════════

export class DuplicateAgentNameError extends SupervisorError {
  readonly code = 'DUPLICATE_AGENT_NAME';

  constructor(readonly agentName: string, reserved = false) {
    super(
      reserved
        ? `Agent name "${agentName}" is reserved for the supervisor`
        : `Agent "${agentName}" is already registered`,
    );
  }
}

export class RegistrySealedError extends SupervisorError {
  readonly code = 'REGISTRY_SEALED';

  constructor(readonly agentName: string) {
    super(`Cannot register "${agentName}": the registry is sealed after compile()`);
  }
}

export class UnknownAgentError extends SupervisorError {
  readonly code = 'UNKNOWN_AGENT';

  constructor(readonly agentName: string) {
    super(`Unknown agent: "${agentName}"`);
  }
}

// ═══════════════════════════════════════════════════════════════════════
// Handoff
// ═══════════════════════════════════════════════════════════════════════

export class UnknownAgentRouteError extends SupervisorError {
  readonly code = 'UNKNOWN_AGENT_ROUTE';

  constructor(readonly from: string, readonly to: string) {
    super(`"${from}" routed to "${to}", which is not a registered worker`);
  }
}

export class IllegalHandoffError extends SupervisorError {
  readonly code = 'ILLEGAL_HANDOFF';

  constructor(readonly from: string, readonly to: string) {
    super(`"${from}" cannot hand off to "${to}": only the supervisor may route`);
  }
}

// ═══════════════════════════════════════════════════════════════════════
// Execution
// ═══════════════════════════════════════════════════════════════════════

export class AgentExecutionError extends SupervisorError {
  readonly code = 'AGENT_EXECUTION_FAILED';

  constructor(readonly agentName: string, cause: unknown) {
    super(`Agent "${agentName}" failed: ${describeCause(cause)}`, { cause });
  }
}

export class IterationLimitExceededError extends SupervisorError {
  readonly code = 'ITERATION_LIMIT_EXCEEDED';

  constructor(readonly limit: number) {
    super(`Iteration limit of ${limit} steps exceeded`);
  }
}

export class TranscriptLimitExceededError extends SupervisorError {
  readonly code = 'TRANSCRIPT_LIMIT_EXCEEDED';

  constructor(readonly limit: number) {
    super(`Transcript limit of ${limit} messages exceeded`);
  }
}

/**
 * Describes a cancelled run. Not a failure: the runtime returns it as the
 * `reason` of a `cancelled` result.
 */
export class CancellationError extends SupervisorError {
  readonly code = 'CANCELLED';

  constructor(reason = 'Invocation cancelled') {
    super(reason);
  }
}

// ═══════════════════════════════════════════════════════════════════════
// Configuration / internal
// ═══════════════════════════════════════════════════════════════════════

export class WorkflowConfigError extends SupervisorError {
  readonly code = 'INVALID_WORKFLOW_CONFIG';

  constructor(message: string, readonly issues: ZodIssue[] = []) {
    super(message);
  }
}

export class StateTransitionError extends SupervisorError {
  readonly code = 'INVALID_STATE_TRANSITION';

  constructor(readonly from: string, readonly to: string) {
    super(`Invalid state transition: ${from} -> ${to}`);
  }
}

export function isSupervisorError(error: unknown): error is SupervisorError {
  return error instanceof SupervisorError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
