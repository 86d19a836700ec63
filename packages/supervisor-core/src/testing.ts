/**
 * @switchboard/supervisor-core/testing
 *
 * Scripted steps and mocks for testing workflows without a model behind the
 * agents. Import from this sub-path, never from the main index.
 *
 * @example
 *   import { scriptedSupervisor, scriptedWorker, makeMockLogger } from '@switchboard/supervisor-core/testing';
 *
 * makeMockLogger() uses vitest's `vi.fn()`; vitest must be available in the test env.
 */

import { vi } from 'vitest';
import type {
  AgentStep,
  ILogger,
  StepContext,
  StepResult,
  SupervisorDecision,
} from '@switchboard/supervisor-contracts';

// ─── Supervisor scripts ───────────────────────────────────────────────────────

export interface ScriptedDecision {
  /** Turns emitted before the decision */
  turns?: string[];
  decision: SupervisorDecision;
}

/**
 * Supervisor step that plays back decisions in order. Running past the end of
 * the script rejects, which the runtime reports as an AgentExecutionError.
 */
export function scriptedSupervisor(script: ScriptedDecision[]): AgentStep & { calls: StepContext[] } {
  const calls: StepContext[] = [];
  const step = async (ctx: StepContext): Promise<StepResult> => {
    const entry = script[calls.length];
    calls.push(ctx);
    if (!entry) {
      throw new Error(`Supervisor script exhausted after ${script.length} decisions`);
    }
    return {
      turns: (entry.turns ?? []).map((content) => ({ content })),
      decision: entry.decision,
    };
  };
  return Object.assign(step, { calls });
}

export function handoffTo(to: string, reason?: string): ScriptedDecision {
  return { decision: { action: 'handoff', to, reason } };
}

export function finishWith(answer: string): ScriptedDecision {
  return { decision: { action: 'finish', answer } };
}

// ─── Worker scripts ───────────────────────────────────────────────────────────

/**
 * Worker step returning the given turns on every activation.
 */
export function scriptedWorker(...turns: string[]): AgentStep & { calls: StepContext[] } {
  const calls: StepContext[] = [];
  const step = async (ctx: StepContext): Promise<StepResult> => {
    calls.push(ctx);
    return { turns: turns.map((content) => ({ content })) };
  };
  return Object.assign(step, { calls });
}

/**
 * Step that never settles on its own: it rejects with the signal's reason
 * once the run is cancelled.
 */
export function blockingStep(onStart?: (ctx: StepContext) => void): AgentStep {
  return (ctx) =>
    new Promise<StepResult>((_resolve, reject) => {
      if (ctx.signal.aborted) {
        reject(ctx.signal.reason);
        return;
      }
      ctx.signal.addEventListener('abort', () => reject(ctx.signal.reason), { once: true });
      onStart?.(ctx);
    });
}

export function failingStep(error: unknown): AgentStep {
  return async () => {
    throw error;
  };
}

// ─── Logger mock ──────────────────────────────────────────────────────────────

export function makeMockLogger(): ILogger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
