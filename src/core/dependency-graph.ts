import { statSync } from 'fs';
import { join } from 'path';
import { DEFAULT_STACK_CONFIG } from '../types/index.js';
import type { StackConfig, StackNode } from '../types/index.js';
import { CycleDetectedError, UnknownDependencyError } from './errors.js';
import { logger as defaultLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';

/**
 * Receives every node and edge as it is added. Observers never influence
 * the graph or the resulting order.
 */
export interface GraphObserver {
  onNodeCreated?: (node: StackNode) => void;
  onEdgeCreated?: (from: StackNode, to: StackNode) => void;
}

export interface StackGraph {
  baseDirectory: string;
  nodes: Map<string, StackNode>;
  directoryExists: (path: string) => boolean;
  observer?: GraphObserver;
  logger: Logger;
}

const CONFIG_FIELDS = [
  'runnerLabel',
  'plannedChanges',
  'skipWhenDestroying',
] as const satisfies readonly (keyof StackConfig)[];

const CONFIG_FIELD_NAMES: Record<keyof StackConfig, string> = {
  runnerLabel: 'runner-label',
  plannedChanges: 'planned-changes',
  skipWhenDestroying: 'skip_when_destroying',
};

const isDirectory = (path: string): boolean =>
  statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;

/**
 * Create an empty graph rooted at a base directory
 */
export const createStackGraph = ({
  baseDirectory,
  directoryExists = isDirectory,
  observer,
  logger = defaultLogger,
}: {
  baseDirectory: string;
  directoryExists?: (path: string) => boolean;
  observer?: GraphObserver;
  logger?: Logger;
}): StackGraph => ({
  baseDirectory,
  nodes: new Map(),
  directoryExists,
  observer,
  logger,
});

const createNode = ({
  graph,
  stackId,
  config,
}: {
  graph: StackGraph;
  stackId: string;
  config: StackConfig;
}): StackNode => {
  const node: StackNode = {
    id: stackId,
    config: { ...config },
    hasBackingDirectory: graph.directoryExists(join(graph.baseDirectory, stackId)),
    isDeclared: false,
    dependsOn: [],
  };

  graph.nodes.set(stackId, node);
  graph.logger.debug(`${stackId} was created as a node`);
  graph.observer?.onNodeCreated?.(node);

  return node;
};

/**
 * Overwrite a node's metadata, warning about every field that changes
 */
const mergeConfig = ({
  graph,
  node,
  config,
}: {
  graph: StackGraph;
  node: StackNode;
  config: StackConfig;
}): void => {
  CONFIG_FIELDS.forEach((field) => {
    const previous = node.config[field];
    const next = config[field];
    if (previous === next) return;

    graph.logger.warn(
      `${node.id}: ${CONFIG_FIELD_NAMES[field]} changed from ${String(previous)} to ${String(next)}`
    );
  });

  node.config = { ...config };
};

/**
 * Add a stack and its declared dependencies to the graph.
 *
 * A stack seen earlier only as someone's dependency keeps its position and
 * takes the declared configuration. Edges are appended in declaration order;
 * an edge that already exists is not added twice.
 *
 * @throws UnknownDependencyError when a dependency has no directory under the base directory
 */
export const insertStack = ({
  graph,
  stackId,
  dependencyIds,
  config,
}: {
  graph: StackGraph;
  stackId: string;
  dependencyIds: readonly string[];
  config: StackConfig;
}): StackNode => {
  const existing = graph.nodes.get(stackId);
  const node = existing ?? createNode({ graph, stackId, config });

  if (existing) {
    mergeConfig({ graph, node: existing, config });
  }
  node.isDeclared = true;

  for (const dependencyId of dependencyIds) {
    const dependency =
      graph.nodes.get(dependencyId) ??
      createNode({ graph, stackId: dependencyId, config: DEFAULT_STACK_CONFIG });

    if (!dependency.hasBackingDirectory) {
      throw new UnknownDependencyError(stackId, dependencyId);
    }

    if (node.dependsOn.includes(dependency)) {
      graph.logger.debug(`${stackId} already depends on ${dependencyId}`);
      continue;
    }

    node.dependsOn.push(dependency);
    graph.logger.debug(`Added ${dependencyId} as edge to node ${stackId}`);
    graph.observer?.onEdgeCreated?.(node, dependency);
  }

  return node;
};

/**
 * Prove the graph is acyclic using DFS.
 *
 * @throws CycleDetectedError naming the edge that closes the first cycle found
 */
export const validateAcyclic = ({ graph }: { graph: StackGraph }): void => {
  const finished = new Set<StackNode>();
  const path = new Set<StackNode>();

  const dfs = (node: StackNode): void => {
    path.add(node);

    for (const dependency of node.dependsOn) {
      if (finished.has(dependency)) continue;
      if (path.has(dependency)) {
        throw new CycleDetectedError(node.id, dependency.id);
      }
      dfs(dependency);
    }

    path.delete(node);
    finished.add(node);
  };

  for (const node of graph.nodes.values()) {
    if (!finished.has(node)) {
      dfs(node);
    }
  }
};

/**
 * Order nodes so every dependency precedes its dependents (DFS postorder).
 * With `reverse` the finished list is reversed, giving the teardown order.
 */
export const topologicalSort = ({
  graph,
  reverse = false,
}: {
  graph: StackGraph;
  reverse?: boolean;
}): StackNode[] => {
  const sortedNodes: StackNode[] = [];
  const visited = new Set<StackNode>();
  const inProgress = new Set<StackNode>();

  const visit = (node: StackNode): void => {
    if (visited.has(node)) return;
    inProgress.add(node);

    for (const dependency of node.dependsOn) {
      // Only reachable when validateAcyclic was skipped
      if (inProgress.has(dependency)) {
        throw new CycleDetectedError(node.id, dependency.id);
      }
      visit(dependency);
    }

    inProgress.delete(node);
    visited.add(node);
    sortedNodes.push(node);
  };

  for (const node of graph.nodes.values()) {
    visit(node);
  }

  return reverse ? sortedNodes.reverse() : sortedNodes;
};
