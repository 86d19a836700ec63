/**
 * @module @switchboard/supervisor-core/workflow
 * Build-time entry point: definition → registry → graph → compiled workflow.
 *
 * @example
 * ```typescript
 * const workflow = createSupervisor({
 *   supervisor: { instruction: 'Route math to math_expert', step: routeStep },
 *   agents: [{ name: 'math_expert', capabilities: ['add'], instruction: 'Do math', step: mathStep }],
 *   outputMode: 'full_history',
 * }).compile();
 *
 * const result = await workflow.invoke([humanMessage('what is 2 + 2?')]);
 * ```
 */

import {
  WorkflowConfigError,
  WorkflowOptionsSchema,
  formatIssues,
  type GraphView,
  type InvocationResult,
  type InvokeOptions,
  type MessageDraft,
  type WorkflowDefinition,
  type WorkflowOptions,
} from '@switchboard/supervisor-contracts';
import { AgentRegistry } from './registry/agent-registry.js';
import { WorkflowGraph } from './graph/workflow-graph.js';
import { SupervisorRuntime } from './execution/runtime.js';
import { createNoopLogger } from './logging/logger.js';

export interface CompiledSupervisor {
  readonly options: WorkflowOptions;
  readonly registry: AgentRegistry;
  readonly graph: WorkflowGraph;
  /** Run one conversation to a terminal status */
  invoke(input: readonly MessageDraft[], options?: InvokeOptions): Promise<InvocationResult>;
  /** Node/edge lists of the compiled star graph */
  getGraph(): GraphView;
}

export class SupervisorWorkflow {
  readonly registry: AgentRegistry;
  readonly options: WorkflowOptions;

  constructor(private readonly definition: WorkflowDefinition) {
    const parsed = WorkflowOptionsSchema.safeParse({
      supervisorName: definition.supervisor.name,
      outputMode: definition.outputMode,
      addHandoffBackMessages: definition.addHandoffBackMessages,
      iterationLimit: definition.iterationLimit,
      messageLimit: definition.messageLimit,
    });
    if (!parsed.success) {
      throw new WorkflowConfigError(
        `Invalid workflow options: ${formatIssues(parsed.error.issues)}`,
        parsed.error.issues,
      );
    }
    this.options = parsed.data;

    this.registry = new AgentRegistry({
      ...definition.supervisor,
      name: this.options.supervisorName,
    });
    for (const agent of definition.agents) {
      this.registry.register(agent);
    }
  }

  /**
   * Seal the registry and build the graph. The result is immutable and may be
   * invoked any number of times, concurrently.
   */
  compile(): CompiledSupervisor {
    this.registry.seal();
    const graph = WorkflowGraph.build(this.registry);
    const runtime = new SupervisorRuntime({
      registry: this.registry,
      options: this.options,
      aggregation: this.definition.aggregation,
      observers: this.definition.observers ?? [],
      logger: this.definition.logger ?? createNoopLogger(),
    });

    return Object.freeze({
      options: this.options,
      registry: this.registry,
      graph,
      invoke: (input: readonly MessageDraft[], options?: InvokeOptions) => runtime.invoke(input, options),
      getGraph: () => graph.toView(),
    });
  }
}

/**
 * Validate a definition and register its agents.
 *
 * @throws WorkflowConfigError on invalid options
 * @throws DuplicateAgentNameError on a name collision (including the supervisor's)
 */
export function createSupervisor(definition: WorkflowDefinition): SupervisorWorkflow {
  return new SupervisorWorkflow(definition);
}
