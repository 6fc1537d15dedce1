import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildStackGraph, resolveStackOrder, toOrderRecords } from './stack-order.js';
import { createDotRenderer } from './dot-renderer.js';
import { CycleDetectedError, InvalidRunnerLabelError, UnknownDependencyError } from './errors.js';
import { createLogger } from '../lib/logger.js';
import { DEFAULT_STACK_CONFIG } from '../types/index.js';

const logger = createLogger({ level: 'silent' });

describe('stack-order', () => {
  let baseDirectory: string;

  const writeStack = async (stackDir: string, document: unknown): Promise<void> => {
    await mkdir(join(baseDirectory, stackDir), { recursive: true });
    await writeFile(join(baseDirectory, stackDir, 'dependencies.json'), JSON.stringify(document));
  };

  const writeDependencies = (stackDir: string, paths: string[]): Promise<void> =>
    writeStack(stackDir, { dependencies: { paths } });

  const writeChain = async (): Promise<void> => {
    await writeDependencies('stack1', ['./stack3']);
    await writeDependencies('stack2', ['./stack1']);
    await writeDependencies('stack3', ['./stack4']);
    await writeDependencies('stack4', []);
  };

  const orderedIds = async (reverse = false): Promise<string[]> => {
    const { records } = await resolveStackOrder({ baseDirectory, reverse, logger });
    return records.map((record) => record.directory);
  };

  beforeEach(async () => {
    baseDirectory = await mkdtemp(join(tmpdir(), 'stack-order-'));
  });

  afterEach(async () => {
    await rm(baseDirectory, { recursive: true, force: true });
  });

  it('returns stacks in apply order', async () => {
    await writeChain();

    expect(await orderedIds()).toEqual(['./stack4', './stack3', './stack1', './stack2']);
  });

  it('returns the exact reverse for a destroy run', async () => {
    await writeChain();

    expect(await orderedIds(true)).toEqual(['./stack2', './stack1', './stack3', './stack4']);
  });

  it('fails on circular dependencies before ordering', async () => {
    await writeDependencies('stack1', ['./stack2']);
    await writeDependencies('stack2', ['./stack3']);
    await writeDependencies('stack3', ['./stack1']);

    await expect(resolveStackOrder({ baseDirectory, logger })).rejects.toThrow(
      CycleDetectedError
    );
    await expect(resolveStackOrder({ baseDirectory, logger })).rejects.toThrow(
      'Circular reference detected: ./stack3 -> ./stack1'
    );
  });

  it('handles a directory with no stacks', async () => {
    const { records } = await resolveStackOrder({ baseDirectory, logger });

    expect(records).toEqual([]);
  });

  it('orders several stacks without dependencies', async () => {
    await writeDependencies('stack1', []);
    await writeDependencies('stack2', []);
    await writeDependencies('stack3', ['./stack1']);

    expect(await orderedIds()).toEqual(['./stack1', './stack2', './stack3']);
  });

  it('fails when a dependency has no directory', async () => {
    await writeDependencies('stack1', ['./stack2']);

    await expect(resolveStackOrder({ baseDirectory, logger })).rejects.toThrow(
      new UnknownDependencyError('./stack1', './stack2').message
    );
  });

  it('fails on an unsupported runner label', async () => {
    await writeStack('stack1', {
      dependencies: { paths: [] },
      'runner-label': 'windows-latest',
    });

    await expect(resolveStackOrder({ baseDirectory, logger })).rejects.toThrow(
      InvalidRunnerLabelError
    );
  });

  it('ignores standalone directories nobody references', async () => {
    await writeChain();
    await mkdir(join(baseDirectory, 'stack99'));
    await writeFile(join(baseDirectory, 'stack99', 'main.tf'), '');

    const ids = await orderedIds();

    expect(ids).toHaveLength(4);
    expect(ids).not.toContain('./stack99');
  });

  it('includes a referenced directory that has no configuration file', async () => {
    await mkdir(join(baseDirectory, 'shared'));
    await writeDependencies('app', ['./shared']);

    const { records } = await resolveStackOrder({ baseDirectory, logger });

    expect(records).toEqual([
      {
        directory: './shared',
        runner_label: 'ubuntu-latest',
        planned_changes: true,
        order: 1,
        skip_when_destroying: false,
      },
      {
        directory: './app',
        runner_label: 'ubuntu-latest',
        planned_changes: true,
        order: 2,
        skip_when_destroying: false,
      },
    ]);
  });

  it('lets a declared configuration win over dependency defaults', async () => {
    await writeDependencies('app', ['./network']);
    await writeStack('network', {
      dependencies: { paths: [] },
      'runner-label': 'self-hosted',
      'planned-changes': false,
      skip_when_destroying: true,
    });

    const { records } = await resolveStackOrder({ baseDirectory, logger });

    expect(records[0]).toEqual({
      directory: './network',
      runner_label: 'self-hosted',
      planned_changes: false,
      order: 1,
      skip_when_destroying: true,
    });
  });

  it('produces the same order with or without a renderer attached', async () => {
    await writeChain();
    const renderer = createDotRenderer();

    const withRenderer = await resolveStackOrder({ baseDirectory, logger, observer: renderer });
    const withoutRenderer = await resolveStackOrder({ baseDirectory, logger });

    expect(withRenderer.records).toEqual(withoutRenderer.records);
    expect(renderer.toDot()).toContain('"./stack1" -> "./stack3";');
  });

  describe('buildStackGraph', () => {
    it('inserts definitions in the order given', () => {
      const graph = buildStackGraph({
        baseDirectory: '/stacks',
        directoryExists: () => true,
        logger,
        stacks: [
          {
            stackId: './b',
            filePath: '/stacks/b/dependencies.json',
            dependencyIds: ['./c'],
            config: DEFAULT_STACK_CONFIG,
          },
          {
            stackId: './a',
            filePath: '/stacks/a/dependencies.json',
            dependencyIds: [],
            config: DEFAULT_STACK_CONFIG,
          },
        ],
      });

      expect([...graph.nodes.keys()]).toEqual(['./b', './c', './a']);
    });
  });

  describe('toOrderRecords', () => {
    it('numbers records from one', () => {
      const records = toOrderRecords([
        {
          id: './a',
          config: { runnerLabel: 'self-hosted', plannedChanges: false, skipWhenDestroying: true },
          hasBackingDirectory: true,
          isDeclared: true,
          dependsOn: [],
        },
      ]);

      expect(records).toEqual([
        {
          directory: './a',
          runner_label: 'self-hosted',
          planned_changes: false,
          order: 1,
          skip_when_destroying: true,
        },
      ]);
    });
  });
});
