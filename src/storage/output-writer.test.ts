import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { appendGithubOutput, writeDotFile } from './output-writer.js';

describe('output-writer', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'stack-order-output-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('writes a DOT file into a new directory', async () => {
    const filePath = join(directory, 'graphs', 'stacks.dot');

    await writeDotFile({ filePath, dot: 'digraph "stacks" {\n}' });

    expect(await readFile(filePath, 'utf-8')).toBe('digraph "stacks" {\n}\n');
  });

  it('appends name=value lines to the GitHub output file', async () => {
    const filePath = join(directory, 'github_output');
    await writeFile(filePath, 'existing=1\n');

    await appendGithubOutput({ filePath, name: 'order', value: '[]' });

    expect(await readFile(filePath, 'utf-8')).toBe('existing=1\norder=[]\n');
  });

  it('refuses multi-line values', async () => {
    await expect(
      appendGithubOutput({ filePath: join(directory, 'out'), name: 'order', value: '[\n]' })
    ).rejects.toThrow("Output 'order' must be a single line");
  });
});
