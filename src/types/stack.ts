export const RUNNER_LABELS = ['ubuntu-latest', 'self-hosted'] as const;

export type RunnerLabel = (typeof RUNNER_LABELS)[number];

export const DEFAULT_RUNNER_LABEL: RunnerLabel = 'ubuntu-latest';

export const isRunnerLabel = (value: string): value is RunnerLabel =>
  (RUNNER_LABELS as readonly string[]).includes(value);

export interface StackConfig {
  runnerLabel: RunnerLabel;
  plannedChanges: boolean;
  skipWhenDestroying: boolean;
}

export const DEFAULT_STACK_CONFIG: Readonly<StackConfig> = {
  runnerLabel: DEFAULT_RUNNER_LABEL,
  plannedChanges: true,
  skipWhenDestroying: false,
};

export interface StackNode {
  id: string;
  config: StackConfig;
  hasBackingDirectory: boolean;
  isDeclared: boolean;
  dependsOn: StackNode[];
}

/**
 * One parsed configuration file, ready to be inserted into a graph
 */
export interface StackDefinition {
  stackId: string;
  filePath: string;
  dependencyIds: string[];
  config: StackConfig;
}
