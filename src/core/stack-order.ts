import type { StackDefinition, StackNode, StackOrderRecord } from '../types/index.js';
import {
  createStackGraph,
  insertStack,
  topologicalSort,
  validateAcyclic,
} from './dependency-graph.js';
import type { GraphObserver, StackGraph } from './dependency-graph.js';
import { DEFAULT_CONFIG_FILE_NAME, DEFAULT_MAX_DEPTH, loadAllStacks } from './stack-parser.js';
import { logger as defaultLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';

/**
 * Build a graph from parsed stack definitions, in the order given
 */
export const buildStackGraph = ({
  baseDirectory,
  stacks,
  observer,
  logger = defaultLogger,
  directoryExists,
}: {
  baseDirectory: string;
  stacks: StackDefinition[];
  observer?: GraphObserver;
  logger?: Logger;
  directoryExists?: (path: string) => boolean;
}): StackGraph => {
  const graph = createStackGraph({ baseDirectory, directoryExists, observer, logger });

  stacks.forEach((stack) => {
    insertStack({
      graph,
      stackId: stack.stackId,
      dependencyIds: stack.dependencyIds,
      config: stack.config,
    });
  });

  return graph;
};

/**
 * Convert ordered nodes to the records handed to the workflow
 */
export const toOrderRecords = (nodes: StackNode[]): StackOrderRecord[] =>
  nodes.map((node, index) => ({
    directory: node.id,
    runner_label: node.config.runnerLabel,
    planned_changes: node.config.plannedChanges,
    order: index + 1,
    skip_when_destroying: node.config.skipWhenDestroying,
  }));

/**
 * Discover, validate and order every stack under the base directory
 */
export const resolveStackOrder = async ({
  baseDirectory,
  maxDepth = DEFAULT_MAX_DEPTH,
  configFileName = DEFAULT_CONFIG_FILE_NAME,
  reverse = false,
  observer,
  logger = defaultLogger,
}: {
  baseDirectory: string;
  maxDepth?: number;
  configFileName?: string;
  reverse?: boolean;
  observer?: GraphObserver;
  logger?: Logger;
}): Promise<{
  graph: StackGraph;
  nodes: StackNode[];
  records: StackOrderRecord[];
}> => {
  const stacks = await loadAllStacks({ baseDirectory, maxDepth, configFileName });
  logger.debug(`Found ${stacks.length} stack configuration files under ${baseDirectory}`);

  const graph = buildStackGraph({ baseDirectory, stacks, observer, logger });
  validateAcyclic({ graph });

  const nodes = topologicalSort({ graph, reverse });

  return {
    graph,
    nodes,
    records: toOrderRecords(nodes),
  };
};
