import { appendFile, mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Write a DOT graph to disk, creating the parent directory if needed
 */
export const writeDotFile = async ({
  filePath,
  dot,
}: {
  filePath: string;
  dot: string;
}): Promise<void> => {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${dot}\n`);
};

/**
 * Append a `name=value` line to a GitHub Actions output file
 */
export const appendGithubOutput = async ({
  filePath,
  name,
  value,
}: {
  filePath: string;
  name: string;
  value: string;
}): Promise<void> => {
  if (value.includes('\n')) {
    throw new Error(`Output '${name}' must be a single line`);
  }
  await appendFile(filePath, `${name}=${value}\n`);
};
