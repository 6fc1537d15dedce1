import type { GraphObserver } from './dependency-graph.js';

export interface DotRenderer extends GraphObserver {
  toDot: () => string;
}

const quote = (value: string): string => `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

/**
 * Collect node and edge events into a Graphviz digraph
 */
export const createDotRenderer = ({
  graphName = 'stacks',
}: {
  graphName?: string;
} = {}): DotRenderer => {
  const nodeIds: string[] = [];
  const edges: Array<[string, string]> = [];

  return {
    onNodeCreated: (node) => {
      nodeIds.push(node.id);
    },
    onEdgeCreated: (from, to) => {
      edges.push([from.id, to.id]);
    },
    toDot: () =>
      [
        `digraph ${quote(graphName)} {`,
        ...nodeIds.map((id) => `  ${quote(id)};`),
        ...edges.map(([from, to]) => `  ${quote(from)} -> ${quote(to)};`),
        '}',
      ].join('\n'),
  };
};
