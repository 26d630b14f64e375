import { Value, opSymbol } from './Value';

export type Edge = readonly [operand: Value, consumer: Value];

export interface TracedGraph {
  /** Topological order, leaves first. */
  nodes: Value[];
  /** One entry per distinct operand/consumer pair. */
  edges: Edge[];
}

export interface DotOptions {
  rankdir?: 'LR' | 'RL' | 'TB' | 'BT';
}

/**
 * Collects every node and edge below root. Reads graph state only.
 */
export function traceGraph(root: Value): TracedGraph {
  const nodes = Value.topologicalOrder(root);
  const edges: Edge[] = [];
  const seen = new Set<string>();
  for (const consumer of nodes) {
    for (const operand of consumer.operands) {
      const key = `${operand.id}->${consumer.id}`;
      if (seen.has(key)) continue;
      seen.add(key);
      edges.push([operand, consumer]);
    }
  }
  return { nodes, edges };
}

function escapeRecord(text: string): string {
  return text.replace(/[\\{}|<>"]/g, '\\$&');
}

function nodeName(v: Value): string {
  return `n${v.id}`;
}

/**
 * Graphviz DOT source for the graph below root: a record per value showing
 * label, data and grad, plus a small node per operation feeding it.
 */
export function toDot(root: Value, opts: DotOptions = {}): string {
  const { nodes, edges } = traceGraph(root);
  const lines = ['digraph G {', `  rankdir=${opts.rankdir ?? 'BT'};`];

  for (const n of nodes) {
    const label = `{ ${escapeRecord(n.label)} | data ${n.data.toFixed(4)} | grad ${n.grad.toFixed(4)} }`;
    lines.push(`  "${nodeName(n)}" [label="${label}", shape=record];`);
    if (!n.isLeaf) {
      lines.push(`  "${nodeName(n)}op" [label="${escapeRecord(opSymbol(n.op))}"];`);
      lines.push(`  "${nodeName(n)}op" -> "${nodeName(n)}";`);
    }
  }
  for (const [operand, consumer] of edges) {
    lines.push(`  "${nodeName(operand)}" -> "${nodeName(consumer)}op";`);
  }

  lines.push('}');
  return lines.join('\n');
}
