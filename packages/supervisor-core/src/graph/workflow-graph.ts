/**
 * @module @switchboard/supervisor-core/graph/workflow-graph
 * Static star graph compiled from the agent registry.
 *
 * nodes = {supervisor} ∪ workers
 * edges = (supervisor, w) and (w, supervisor) for every worker w
 *
 * There are no worker-to-worker edges: every route passes through the
 * supervisor. The graph is built once per workflow and shared read-only by
 * all invocations.
 */

import {
  DuplicateAgentNameError,
  WorkflowConfigError,
  type GraphEdge,
  type GraphNode,
  type GraphView,
} from '@switchboard/supervisor-contracts';
import type { AgentRegistry } from '../registry/agent-registry.js';

export class WorkflowGraph {
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
  readonly supervisor: string;

  private constructor(supervisor: string, nodes: GraphNode[], edges: GraphEdge[]) {
    this.supervisor = supervisor;
    this.nodes = Object.freeze(nodes.map((node) => Object.freeze(node)));
    this.edges = Object.freeze(edges.map((edge) => Object.freeze(edge)));
    Object.freeze(this);
  }

  /**
   * Compile and validate the graph for a registry.
   */
  static build(registry: AgentRegistry): WorkflowGraph {
    const supervisor = registry.supervisor.name;
    const workers = registry.getAll();

    const nodes: GraphNode[] = [{ id: supervisor, role: 'supervisor' }];
    for (const worker of workers) {
      if (worker.name === supervisor) {
        throw new DuplicateAgentNameError(worker.name, true);
      }
      nodes.push({ id: worker.name, role: 'worker' });
    }

    const edges: GraphEdge[] = [
      ...workers.map((worker) => ({ from: supervisor, to: worker.name })),
      ...workers.map((worker) => ({ from: worker.name, to: supervisor })),
    ];

    const graph = new WorkflowGraph(supervisor, nodes, edges);
    graph.validate();
    return graph;
  }

  hasEdge(from: string, to: string): boolean {
    return this.edges.some((edge) => edge.from === from && edge.to === to);
  }

  successors(id: string): string[] {
    return this.edges.filter((edge) => edge.from === id).map((edge) => edge.to);
  }

  /**
   * Plain node/edge lists for diagram renderers.
   */
  toView(): GraphView {
    return {
      nodes: this.nodes.map((node) => ({ ...node })),
      edges: this.edges.map((edge) => ({ ...edge })),
    };
  }

  private validate(): void {
    for (const node of this.nodes) {
      if (node.role !== 'worker') {continue;}

      if (!this.hasEdge(this.supervisor, node.id) || !this.hasEdge(node.id, this.supervisor)) {
        throw new WorkflowConfigError(`Worker "${node.id}" is not connected to the supervisor`);
      }
    }

    for (const edge of this.edges) {
      if (edge.from !== this.supervisor && edge.to !== this.supervisor) {
        throw new WorkflowConfigError(`Worker-to-worker edge ${edge.from} -> ${edge.to} is not allowed`);
      }
    }
  }
}
