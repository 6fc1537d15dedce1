import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../../config/index.js';
import { resolveStackOrder } from '../../core/stack-order.js';
import { createLogger } from '../../lib/logger.js';
import type { RunnerLabel, StackNode } from '../../types/index.js';
import { reportCommandError } from '../errors.js';

const RUNNER_ICONS: Record<RunnerLabel, string> = {
  'ubuntu-latest': '●',
  'self-hosted': '◆',
};

const RUNNER_COLORS: Record<RunnerLabel, (text: string) => string> = {
  'ubuntu-latest': chalk.green,
  'self-hosted': chalk.magenta,
};

export interface LsOptions {
  reverse?: boolean;
  baseDir?: string;
  maxDepth?: string;
}

/**
 * Render ordered stacks as a numbered list
 */
export const renderStackList = ({
  nodes,
  reverse = false,
}: {
  nodes: StackNode[];
  reverse?: boolean;
}): string[] => {
  const lines: string[] = [];

  if (nodes.length === 0) {
    lines.push(chalk.gray('No stacks found.'));
    return lines;
  }

  lines.push(chalk.dim(reverse ? 'Stacks in destroy order:' : 'Stacks in apply order:'));
  lines.push('');

  nodes.forEach((node, index) => {
    const { runnerLabel, plannedChanges, skipWhenDestroying } = node.config;
    const icon = RUNNER_COLORS[runnerLabel](RUNNER_ICONS[runnerLabel]);
    const deps = node.dependsOn.length;

    lines.push(
      `${chalk.dim(`${(index + 1).toString().padStart(3)}.`)} ${icon} ${node.id}${deps > 0 ? chalk.dim(` (${deps} deps)`) : ''}`
    );

    const notes = [
      runnerLabel,
      ...(plannedChanges ? [] : ['no planned changes']),
      ...(skipWhenDestroying ? ['skipped when destroying'] : []),
      ...(node.isDeclared ? [] : ['no configuration file']),
    ];
    lines.push(`      ${chalk.dim(notes.join(' | '))}`);
  });

  lines.push('');
  lines.push(chalk.dim(`Total: ${nodes.length} stacks`));

  return lines;
};

export const lsCommand = async ({
  options,
}: {
  options: LsOptions;
}): Promise<void> => {
  const spinner = ora({ text: 'Discovering stacks', spinner: 'dots' });

  try {
    const config = loadConfig({
      overrides: { baseDirectory: options.baseDir, maxDepth: options.maxDepth },
    });
    const logger = createLogger({ level: config.logLevel });

    spinner.start();
    const { nodes } = await resolveStackOrder({
      baseDirectory: config.baseDirectory,
      maxDepth: config.maxDepth,
      configFileName: config.configFileName,
      reverse: options.reverse ?? false,
      logger,
    });
    spinner.succeed(`Resolved ${nodes.length} stacks under ${config.baseDirectory}`);

    console.log();
    renderStackList({ nodes, reverse: options.reverse }).forEach((line) => console.log(line));
    console.log();
    console.log(chalk.dim('Legend:'));
    console.log(
      `  ${RUNNER_COLORS['ubuntu-latest'](RUNNER_ICONS['ubuntu-latest'])} ubuntu-latest  ${RUNNER_COLORS['self-hosted'](RUNNER_ICONS['self-hosted'])} self-hosted`
    );
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail('Could not resolve stack order');
    }
    reportCommandError({ action: 'list stacks', error });
  }
};
