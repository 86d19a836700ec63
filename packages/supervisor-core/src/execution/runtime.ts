/**
 * SupervisorRuntime — drives the supervisor/worker step loop of one invocation.
 *
 *   awaiting_decision ──handoff(W)──▶ dispatched ──worker done──▶ aggregating ──fold──▶ awaiting_decision
 *          │                              │
 *          └──finish──▶ completed         └── (any non-terminal) ──▶ failed | cancelled
 *
 * Suspension points are the agent steps only; every transition in between is
 * synchronous. Each invoke() owns a fresh ConversationState, so one compiled
 * workflow can serve concurrent invocations without locking.
 */

import { randomUUID } from 'node:crypto';
import {
  AgentExecutionError,
  IllegalHandoffError,
  InvokeOptionsSchema,
  IterationLimitExceededError,
  StepResultSchema,
  WorkflowConfigError,
  formatIssues,
  isSupervisorError,
  type AgentDescriptor,
  type AgentTurn,
  type AggregationPolicy,
  type ILogger,
  type InvocationResult,
  type InvokeOptions,
  type MessageDraft,
  type RuntimePhase,
  type StepResult,
  type SupervisorError,
  type SupervisorObserver,
  type WorkerSpan,
  type WorkflowOptions,
} from '@switchboard/supervisor-contracts';
import type { AgentRegistry } from '../registry/agent-registry.js';
import { HandoffProtocol, extractHandoffs, toHandoffRecord } from '../handoff/handoff-protocol.js';
import { HistoryAggregator } from '../history/history-aggregator.js';
import { Transcript } from '../messages/transcript.js';
import { aiMessage } from '../messages/builders.js';
import { createEvent, createObserverBus, type ObserverBus } from '../events/observer-bus.js';
import { RuntimeStateMachine } from './state-machine.js';
import { createCancellation, type Cancellation } from './cancellation.js';

export interface RuntimeConfig {
  registry: AgentRegistry;
  options: WorkflowOptions;
  aggregation?: AggregationPolicy;
  observers: readonly SupervisorObserver[];
  logger: ILogger;
}

type Outcome =
  | { status: 'completed'; finalAnswer: string }
  | { status: 'cancelled'; reason: string }
  | { status: 'failed'; error: SupervisorError };

/**
 * Per-invocation state. Only the runtime writes to it.
 */
interface ConversationState {
  runId: string;
  transcript: Transcript;
  machine: RuntimeStateMachine;
  activeAgent: string;
  stepCount: number;
  outcome?: Outcome;
  cancellation: Cancellation;
  bus: ObserverBus;
  logger: ILogger;
}

export class SupervisorRuntime {
  private readonly protocol: HandoffProtocol;
  private readonly aggregator: HistoryAggregator;

  constructor(private readonly config: RuntimeConfig) {
    this.protocol = new HandoffProtocol(config.registry, {
      addHandoffBackMessages: config.options.addHandoffBackMessages,
    });
    this.aggregator = new HistoryAggregator(config.options.outputMode, config.aggregation);
  }

  /**
   * @throws WorkflowConfigError on invalid options, before any run starts
   */
  async invoke(input: readonly MessageDraft[], options: InvokeOptions = {}): Promise<InvocationResult> {
    const checked = InvokeOptionsSchema.safeParse({
      timeoutMs: options.timeoutMs,
      startIndex: options.startIndex,
      runId: options.runId,
    });
    if (!checked.success) {
      throw new WorkflowConfigError(
        `Invalid invoke options: ${formatIssues(checked.error.issues)}`,
        checked.error.issues,
      );
    }

    const { registry } = this.config;
    const runId = options.runId ?? randomUUID();
    const logger = this.config.logger.child?.({ runId }) ?? this.config.logger;
    const startedAt = Date.now();

    const state: ConversationState = {
      runId,
      transcript: new Transcript({
        startIndex: options.startIndex,
        messageLimit: this.config.options.messageLimit,
      }),
      machine: new RuntimeStateMachine(),
      activeAgent: registry.supervisor.name,
      stepCount: 0,
      cancellation: createCancellation(options.signal, options.timeoutMs),
      bus: createObserverBus(logger, [...this.config.observers, ...(options.observers ?? [])]),
      logger,
    };

    state.bus.emit(createEvent('run:start', runId, {
      inputCount: input.length,
      supervisor: registry.supervisor.name,
      workers: registry.getAll().map((agent) => agent.name),
    }));
    logger.debug('Run started', { inputCount: input.length });

    try {
      state.transcript.appendAll(input);
      await this.loop(state);
    } catch (error) {
      if (!isSupervisorError(error)) {
        throw error;
      }
      this.settle(state, 'failed', { status: 'failed', error }, error.message);
    } finally {
      state.cancellation.dispose();
    }

    return this.finish(state, Date.now() - startedAt);
  }

  // ─── Loop ─────────────────────────────────────────────────────────────────

  private async loop(state: ConversationState): Promise<void> {
    while (!state.machine.isTerminal()) {
      // Aggregation runs inside workerTurn, so no produced output is pending here.
      if (state.cancellation.signal.aborted) {
        const reason = state.cancellation.reason();
        this.settle(state, 'cancelled', { status: 'cancelled', reason }, reason);
        return;
      }

      switch (state.machine.getCurrent()) {
        case 'awaiting_decision':
          await this.supervisorTurn(state);
          break;
        case 'dispatched':
          await this.workerTurn(state);
          break;
        default:
          return;
      }
    }
  }

  private async supervisorTurn(state: ConversationState): Promise<void> {
    const supervisor = this.config.registry.supervisor;
    const result = await this.runStep(state, supervisor);
    if (!result) {return;}

    const decision = result.decision;
    if (!decision) {
      throw new AgentExecutionError(supervisor.name, new Error('Supervisor step returned no routing decision'));
    }

    if (decision.action === 'finish') {
      state.transcript.appendAll(toDrafts(supervisor.name, result.turns));
      state.transcript.append(aiMessage(supervisor.name, decision.answer));
      this.settle(state, 'completed', { status: 'completed', finalAnswer: decision.answer }, 'final answer');
      return;
    }

    // Validated before anything is appended: a bad route leaves no partial handoff.
    const handoff = this.protocol.requestHandoff(state.activeAgent, decision);
    state.transcript.appendAll(toDrafts(supervisor.name, result.turns));

    const { sequenceIndex } = state.transcript.append(handoff.draft);
    state.activeAgent = handoff.target.name;
    this.transition(state, 'dispatched', `handoff to ${handoff.target.name}`);
    state.bus.emit(createEvent('handoff', state.runId, {
      record: toHandoffRecord({ ...handoff.draft, sequenceIndex }),
    }));
  }

  private async workerTurn(state: ConversationState): Promise<void> {
    const worker = this.config.registry.resolve(state.activeAgent);
    const result = await this.runStep(state, worker);
    if (!result) {return;}

    const messages = toDrafts(worker.name, result.turns);
    if (result.decision?.action === 'handoff') {
      throw new IllegalHandoffError(worker.name, result.decision.to);
    } else if (result.decision?.action === 'finish') {
      messages.push(aiMessage(worker.name, result.decision.answer));
    }

    this.transition(state, 'aggregating');
    this.aggregate(state, { agent: worker, messages });
  }

  private aggregate(state: ConversationState, span: WorkerSpan): void {
    const supervisor = this.config.registry.supervisor.name;
    const { visible, kept } = this.aggregator.fold(span);
    state.transcript.appendAll(visible);
    state.bus.emit(createEvent('aggregate', state.runId, {
      agent: span.agent.name,
      produced: span.messages.length,
      kept,
    }));

    const marker = this.protocol.returnControl(span.agent);
    const record = marker
      ? toHandoffRecord({ ...marker, sequenceIndex: state.transcript.append(marker).sequenceIndex })
      : undefined;

    state.activeAgent = supervisor;
    this.transition(state, 'awaiting_decision', `${span.agent.name} returned control`);
    state.bus.emit(createEvent('handoff:back', state.runId, {
      from: span.agent.name,
      to: supervisor,
      record,
    }));
  }

  /**
   * Run one opaque agent step.
   *
   * @returns null when the step rejected because the run was cancelled
   */
  private async runStep(state: ConversationState, agent: AgentDescriptor): Promise<StepResult | null> {
    const limit = this.config.options.iterationLimit;
    if (state.stepCount >= limit) {
      throw new IterationLimitExceededError(limit);
    }

    const stepCount = state.stepCount;
    state.stepCount++;
    state.bus.emit(createEvent('step:start', state.runId, { agent: agent.name, role: agent.role, stepCount }));
    state.logger.debug(`Step ${state.stepCount}: ${agent.name}`, { role: agent.role });

    const startedAt = Date.now();
    let raw: unknown;
    try {
      raw = await agent.step({
        runId: state.runId,
        agent,
        messages: state.transcript.toArray(),
        stepCount,
        signal: state.cancellation.signal,
      });
    } catch (error) {
      if (state.cancellation.signal.aborted) {
        state.logger.debug(`Step of ${agent.name} rejected after cancellation`);
        return null;
      }
      throw new AgentExecutionError(agent.name, error);
    }

    const parsed = StepResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AgentExecutionError(
        agent.name,
        new Error(`Step result is invalid: ${formatIssues(parsed.error.issues)}`),
      );
    }
    const result: StepResult = parsed.data;

    state.bus.emit(createEvent('step:end', state.runId, {
      agent: agent.name,
      role: agent.role,
      stepCount: state.stepCount,
      turnCount: result.turns?.length ?? 0,
      durationMs: Date.now() - startedAt,
    }));
    return result;
  }

  // ─── Transitions ──────────────────────────────────────────────────────────

  private transition(state: ConversationState, to: RuntimePhase, reason?: string): void {
    const { from } = state.machine.transition(to, reason);
    state.logger.debug(`Phase ${from} -> ${to}`, reason ? { reason } : undefined);
    state.bus.emit(createEvent('phase', state.runId, { from, to }));
  }

  private settle(state: ConversationState, to: 'completed' | 'failed' | 'cancelled', outcome: Outcome, reason: string): void {
    if (state.machine.isTerminal()) {return;}
    state.outcome = outcome;
    this.transition(state, to, reason);
  }

  private finish(state: ConversationState, durationMs: number): InvocationResult {
    const outcome = state.outcome;
    if (!outcome) {
      throw new Error(`Run ${state.runId} stopped without reaching a terminal phase`);
    }

    const messages = state.transcript.toArray();
    const base = {
      runId: state.runId,
      messages,
      stepCount: state.stepCount,
      handoffs: extractHandoffs(messages),
    };

    state.bus.emit(createEvent('run:end', state.runId, {
      status: outcome.status,
      stepCount: state.stepCount,
      messageCount: messages.length,
      durationMs,
      error: outcome.status === 'failed' ? outcome.error.message : undefined,
    }));

    switch (outcome.status) {
      case 'completed':
        state.logger.info(`Run completed in ${state.stepCount} steps`, { messageCount: messages.length });
        return { ...base, status: 'completed', finalAnswer: outcome.finalAnswer };
      case 'cancelled':
        state.logger.warn(`Run cancelled: ${outcome.reason}`, { stepCount: state.stepCount });
        return { ...base, status: 'cancelled', reason: outcome.reason };
      case 'failed':
        state.logger.error(`Run failed: ${outcome.error.message}`, { code: outcome.error.code });
        return { ...base, status: 'failed', error: outcome.error };
    }
  }
}

function toDrafts(sender: string, turns: readonly AgentTurn[] | undefined): MessageDraft[] {
  return (turns ?? []).map((turn) => aiMessage(sender, turn.content));
}
