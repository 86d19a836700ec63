/**
 * @module @switchboard/progress-reporter
 * UX-only progress feedback for supervisor workflows.
 *
 * Provides real-time progress events for CLI and Web UI.
 * Events are invisible to the runtime.
 *
 * @example
 * ```typescript
 * import { ProgressReporter, renderConversation } from '@switchboard/progress-reporter';
 * import { createLogger } from '@switchboard/supervisor-core';
 *
 * // CLI usage
 * const reporter = new ProgressReporter(createLogger());
 * const result = await workflow.invoke(messages, { observers: [reporter.observer] });
 * console.log(renderConversation(result.messages));
 *
 * // Web UI usage (with callback)
 * const reporter = new ProgressReporter(logger, (event) => {
 *   ws.send(JSON.stringify(event));
 * });
 * ```
 */

export { ProgressReporter } from './reporter.js';
export { formatConversation, renderConversation } from './conversation.js';

export type {
  ProgressEvent,
  ProgressEventType,
  ProgressCallback,
  BaseProgressEvent,
  RunStartedEvent,
  AgentStartedEvent,
  AgentCompletedEvent,
  HandoffEvent,
  RunCompletedEvent,
  ConversationRow,
} from './types.js';
