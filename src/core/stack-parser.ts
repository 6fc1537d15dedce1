import fg from 'fast-glob';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { DEFAULT_STACK_CONFIG, RUNNER_LABELS, isRunnerLabel } from '../types/index.js';
import type { StackConfig, StackDefinition } from '../types/index.js';
import { InvalidRunnerLabelError, SchemaViolationError } from './errors.js';
import { normalizeStackId, stackIdFromConfigFile } from './stack-id.js';

export const DEFAULT_CONFIG_FILE_NAME = 'dependencies.json';
export const DEFAULT_MAX_DEPTH = 2;

const ABSOLUTE_PATH = /^([\\/]|[A-Za-z]:)/;

const StackFileSchema = z.object({
  dependencies: z.object({
    paths: z.array(
      z.string().refine((path) => !ABSOLUTE_PATH.test(path), {
        message: 'Expected a path relative to the base directory',
      })
    ),
  }),
  'runner-label': z.string().default(DEFAULT_STACK_CONFIG.runnerLabel),
  'planned-changes': z.boolean().default(DEFAULT_STACK_CONFIG.plannedChanges),
  skip_when_destroying: z.boolean().default(DEFAULT_STACK_CONFIG.skipWhenDestroying),
});

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');

/**
 * Find configuration files at most `maxDepth` directories below the base directory
 */
export const findStackFiles = async ({
  baseDirectory,
  maxDepth = DEFAULT_MAX_DEPTH,
  configFileName = DEFAULT_CONFIG_FILE_NAME,
}: {
  baseDirectory: string;
  maxDepth?: number;
  configFileName?: string;
}): Promise<string[]> => {
  const matches = await fg(`**/${fg.escapePath(configFileName)}`, {
    cwd: baseDirectory,
    deep: maxDepth + 1,
    onlyFiles: true,
    ignore: ['**/node_modules/**'],
  });

  // Sorted so the graph's insertion order never depends on readdir order
  return matches
    .filter((match) => match.split('/').length - 1 <= maxDepth)
    .sort()
    .map((match) => join(baseDirectory, match));
};

/**
 * Validate the raw text of a configuration file and apply defaults
 */
export const parseStackConfig = ({
  filePath,
  content,
}: {
  filePath: string;
  content: string;
}): { dependencyIds: string[]; config: StackConfig } => {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : 'invalid JSON';
    throw new SchemaViolationError(filePath, detail, { cause: error });
  }

  const parsed = StackFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new SchemaViolationError(filePath, formatIssues(parsed.error), {
      cause: parsed.error,
    });
  }

  const runnerLabel = parsed.data['runner-label'];
  if (!isRunnerLabel(runnerLabel)) {
    throw new InvalidRunnerLabelError(filePath, runnerLabel, RUNNER_LABELS);
  }

  return {
    dependencyIds: parsed.data.dependencies.paths.map(normalizeStackId),
    config: {
      runnerLabel,
      plannedChanges: parsed.data['planned-changes'],
      skipWhenDestroying: parsed.data.skip_when_destroying,
    },
  };
};

/**
 * Read and validate a single configuration file
 */
export const parseStackFile = async ({
  baseDirectory,
  filePath,
}: {
  baseDirectory: string;
  filePath: string;
}): Promise<StackDefinition> => {
  const content = await readFile(filePath, 'utf-8');
  const { dependencyIds, config } = parseStackConfig({ filePath, content });

  return {
    stackId: stackIdFromConfigFile({ baseDirectory, filePath }),
    filePath,
    dependencyIds,
    config,
  };
};

/**
 * Discover and parse every stack under the base directory, in discovery order
 */
export const loadAllStacks = async ({
  baseDirectory,
  maxDepth = DEFAULT_MAX_DEPTH,
  configFileName = DEFAULT_CONFIG_FILE_NAME,
}: {
  baseDirectory: string;
  maxDepth?: number;
  configFileName?: string;
}): Promise<StackDefinition[]> => {
  const stackFiles = await findStackFiles({ baseDirectory, maxDepth, configFileName });

  return Promise.all(
    stackFiles.map((filePath) => parseStackFile({ baseDirectory, filePath }))
  );
};
