import { describe, it, expect } from 'vitest';
import { AgentRegistry } from '../registry/agent-registry.js';
import { WorkflowGraph } from '../graph/workflow-graph.js';
import { toMermaid } from '../graph/mermaid.js';
import { scriptedWorker } from '../testing.js';

function makeRegistry(...workers: string[]): AgentRegistry {
  const registry = new AgentRegistry({ name: 'supervisor', instruction: 'Route', step: scriptedWorker() });
  for (const name of workers) {
    registry.register({ name, instruction: name, step: scriptedWorker() });
  }
  return registry;
}

describe('WorkflowGraph', () => {
  it('should build a star around the supervisor', () => {
    const graph = WorkflowGraph.build(makeRegistry('math_expert', 'research_expert'));

    expect(graph.toView()).toEqual({
      nodes: [
        { id: 'supervisor', role: 'supervisor' },
        { id: 'math_expert', role: 'worker' },
        { id: 'research_expert', role: 'worker' },
      ],
      edges: [
        { from: 'supervisor', to: 'math_expert' },
        { from: 'supervisor', to: 'research_expert' },
        { from: 'math_expert', to: 'supervisor' },
        { from: 'research_expert', to: 'supervisor' },
      ],
    });
  });

  it('should have no worker-to-worker edges', () => {
    const graph = WorkflowGraph.build(makeRegistry('math_expert', 'research_expert'));

    expect(graph.hasEdge('math_expert', 'research_expert')).toBe(false);
    expect(graph.successors('math_expert')).toEqual(['supervisor']);
    expect(graph.successors('supervisor')).toEqual(['math_expert', 'research_expert']);
  });

  it('should build a single-node graph without workers', () => {
    const graph = WorkflowGraph.build(makeRegistry());

    expect(graph.toView()).toEqual({ nodes: [{ id: 'supervisor', role: 'supervisor' }], edges: [] });
  });

  it('should be immutable and hand out copies', () => {
    const graph = WorkflowGraph.build(makeRegistry('math_expert'));
    const view = graph.toView();
    view.nodes.push({ id: 'intruder', role: 'worker' });

    expect(Object.isFrozen(graph)).toBe(true);
    expect(graph.toView().nodes).toHaveLength(2);
  });
});

describe('toMermaid', () => {
  it('should render the star graph', () => {
    const view = WorkflowGraph.build(makeRegistry('math_expert')).toView();

    expect(toMermaid(view)).toBe(
      [
        'graph TD;',
        '\tsupervisor([supervisor]):::supervisor;',
        '\tmath_expert[math_expert];',
        '\tsupervisor --> math_expert;',
        '\tmath_expert --> supervisor;',
        '\tclassDef supervisor fill:#f2f0ff,stroke:#6b5fd3;',
      ].join('\n'),
    );
  });

  it('should honour the direction', () => {
    const view = WorkflowGraph.build(makeRegistry()).toView();

    expect(toMermaid(view, { direction: 'LR' }).split('\n')[0]).toBe('graph LR;');
  });
});
