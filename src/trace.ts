/**
 * Read-only views of an execution graph for debugging and rendering
 */

import type { ExecutionGraph } from './graph.js';

/**
 * Get execution path of the graph
 *
 * Returns the stable topological order of task names, i.e. the order the
 * sequential executor runs them in.
 *
 * @example
 * getTrace(graph); // ['writeX', 'writeY', 'sum']
 */
export function getTrace<S extends object>(graph: ExecutionGraph<S>): string[] {
  return graph.topologicalOrder();
}

/**
 * Get DAG structure for visualization
 *
 * Returns array of edges [from, to], explicit precedences first.
 *
 * @example
 * getEdges(graph); // [['writeX', 'sum'], ['writeY', 'sum']]
 */
export function getEdges<S extends object>(graph: ExecutionGraph<S>): Array<[string, string]> {
  return graph.edges.map((edge) => [edge.from, edge.to]);
}

const quote = (value: string) => `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

/**
 * Graphviz source for the graph; inferred edges are dashed and labelled
 * with the variables they protect
 */
export function toDot<S extends object>(graph: ExecutionGraph<S>): string {
  const lines = ['digraph tasks {'];
  for (const spec of graph.tasks) {
    lines.push(`  ${quote(spec.name)};`);
  }
  for (const edge of graph.edges) {
    if (edge.kind === 'explicit') {
      lines.push(`  ${quote(edge.from)} -> ${quote(edge.to)};`);
    } else {
      const variables = [...new Set(edge.hazards.map((h) => h.variable))].join(',');
      lines.push(`  ${quote(edge.from)} -> ${quote(edge.to)} [style=dashed, label=${quote(variables)}];`);
    }
  }
  lines.push('}');
  return lines.join('\n');
}
