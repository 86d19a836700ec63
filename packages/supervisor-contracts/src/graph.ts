/**
 * @module @switchboard/supervisor-contracts/graph
 * Serializable view of a compiled workflow graph, for external diagram renderers.
 */

import type { AgentRole } from './agent.js';

export interface GraphNode {
  id: string;
  role: AgentRole;
}

export interface GraphEdge {
  from: string;
  to: string;
}

export interface GraphView {
  /** Supervisor first, then workers in registration order */
  nodes: GraphNode[];
  /** `supervisor → w` edges, then `w → supervisor` edges */
  edges: GraphEdge[];
}
