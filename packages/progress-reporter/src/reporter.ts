/**
 * @module @switchboard/progress-reporter/reporter
 * Progress reporter for supervisor workflows.
 *
 * UX-only component - progress events are NOT visible to the runtime.
 * Used for real-time progress feedback in CLI and Web UI.
 */

import type {
  AgentRole,
  ILogger,
  SupervisorEvent,
  SupervisorObserver,
} from "@switchboard/supervisor-contracts";
import type { ProgressEvent, ProgressCallback } from "./types.js";

/**
 * Progress reporter - turns runtime events into progress events and log lines.
 *
 * Attach `reporter.observer` to a workflow or a single invocation. Phase and
 * aggregation events are internal and not reported.
 *
 * @example
 * ```typescript
 * import { ProgressReporter } from '@switchboard/progress-reporter';
 * import { createLogger } from '@switchboard/supervisor-core';
 *
 * const reporter = new ProgressReporter(createLogger(), (event) => {
 *   // Stream to Web UI via WebSocket/SSE
 *   ws.send(JSON.stringify(event));
 * });
 *
 * await workflow.invoke(messages, { observers: [reporter.observer] });
 * ```
 */
export class ProgressReporter {
  private events: ProgressEvent[] = [];

  constructor(
    private logger: ILogger,
    private onProgress?: ProgressCallback
  ) {}

  /**
   * Observer to register with the runtime.
   */
  readonly observer: SupervisorObserver = (event) => this.handle(event);

  /**
   * Map one runtime event.
   */
  handle(event: SupervisorEvent): void {
    const timestamp = Date.parse(event.timestamp);
    const { runId } = event;

    switch (event.type) {
      case "run:start": {
        const { supervisor, workers } = event.data;
        this.emit({ type: "run_started", timestamp, runId, data: { supervisor, workers } });
        this.logger.info(
          `🎯 Run started: ${supervisor} with ${workers.length} worker(s)${workers.length > 0 ? ` (${workers.join(", ")})` : ""}`
        );
        break;
      }

      case "step:start": {
        const { agent, role } = event.data;
        const step = event.data.stepCount + 1;
        this.emit({ type: "agent_started", timestamp, runId, data: { agent, role, step } });
        this.logger.info(`${this.getRoleEmoji(role)} [${step}] ${agent} working...`);
        break;
      }

      case "step:end": {
        const { agent, role, turnCount, durationMs } = event.data;
        const step = event.data.stepCount;
        this.emit({
          type: "agent_completed",
          timestamp,
          runId,
          data: { agent, role, step, turnCount, durationMs },
        });
        this.logger.debug(`✅ [${step}] ${agent} done: ${turnCount} turn(s) in ${durationMs}ms`);
        break;
      }

      case "handoff": {
        const { from, to, reason } = event.data.record;
        this.emit({ type: "handoff", timestamp, runId, data: { from, to, reason } });
        this.logger.info(`➡️  ${from} → ${to}: ${reason}`);
        break;
      }

      case "handoff:back": {
        const { from, to } = event.data;
        this.emit({ type: "handoff_back", timestamp, runId, data: { from, to } });
        this.logger.info(`↩️  ${from} → ${to}`);
        break;
      }

      case "run:end": {
        const { status, stepCount, messageCount, durationMs, error } = event.data;
        this.emit({
          type: "run_completed",
          timestamp,
          runId,
          data: { status, steps: stepCount, messages: messageCount, totalDuration: durationMs, error },
        });

        const summary = `${stepCount} step(s), ${messageCount} message(s) in ${(durationMs / 1000).toFixed(1)}s`;
        if (status === "completed") {
          this.logger.info(`✅ Run completed: ${summary}`);
        } else if (status === "cancelled") {
          this.logger.warn(`⏹️  Run cancelled: ${summary}`);
        } else {
          this.logger.error(`❌ Run failed: ${error ?? "Unknown error"}`);
        }
        break;
      }

      default:
        break;
    }
  }

  /**
   * Get all emitted events (for debugging/testing).
   */
  getEvents(): readonly ProgressEvent[] {
    return [...this.events];
  }

  /**
   * Clear all events.
   */
  clear(): void {
    this.events = [];
  }

  /**
   * Emit event to callback and store in history.
   */
  private emit(event: ProgressEvent): void {
    this.events.push(event);
    if (this.onProgress) {
      this.onProgress(event);
    }
  }

  private getRoleEmoji(role: AgentRole): string {
    switch (role) {
      case "supervisor":
        return "🧭";
      case "worker":
        return "🛠️";
    }
  }
}
