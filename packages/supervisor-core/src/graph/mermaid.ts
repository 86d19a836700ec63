/**
 * Mermaid flowchart export of a graph view. Rendering is left to the caller.
 */

import type { GraphView } from '@switchboard/supervisor-contracts';

export interface MermaidOptions {
  /** Flowchart direction. Default: 'TD' */
  direction?: 'TD' | 'LR';
}

export function toMermaid(view: GraphView, options: MermaidOptions = {}): string {
  const lines = [`graph ${options.direction ?? 'TD'};`];

  for (const node of view.nodes) {
    lines.push(
      node.role === 'supervisor'
        ? `\t${node.id}([${node.id}]):::supervisor;`
        : `\t${node.id}[${node.id}];`,
    );
  }

  for (const edge of view.edges) {
    lines.push(`\t${edge.from} --> ${edge.to};`);
  }

  lines.push('\tclassDef supervisor fill:#f2f0ff,stroke:#6b5fd3;');
  return lines.join('\n');
}
