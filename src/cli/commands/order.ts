import { resolve } from 'path';
import { loadConfig } from '../../config/index.js';
import { createDotRenderer } from '../../core/dot-renderer.js';
import { resolveStackOrder } from '../../core/stack-order.js';
import { appendGithubOutput, writeDotFile } from '../../storage/output-writer.js';
import { createLogger } from '../../lib/logger.js';
import { reportCommandError } from '../errors.js';

export const DEFAULT_DOT_FILE = 'dependencies.dot';
export const DEFAULT_OUTPUT_NAME = 'order';

export interface OrderOptions {
  reverse?: boolean;
  draw?: string | boolean;
  baseDir?: string;
  maxDepth?: string;
  githubOutput?: string | boolean;
}

/**
 * Print the stacks as JSON records in apply (or, reversed, destroy) order
 */
export const orderCommand = async ({
  options,
}: {
  options: OrderOptions;
}): Promise<void> => {
  try {
    const config = loadConfig({
      overrides: { baseDirectory: options.baseDir, maxDepth: options.maxDepth },
    });
    const logger = createLogger({ level: config.logLevel });
    const renderer = options.draw ? createDotRenderer() : undefined;

    const outputFile = options.githubOutput ? process.env.GITHUB_OUTPUT : undefined;
    if (options.githubOutput && !outputFile) {
      throw new Error('--github-output requires the GITHUB_OUTPUT environment variable');
    }

    const { records } = await resolveStackOrder({
      baseDirectory: config.baseDirectory,
      maxDepth: config.maxDepth,
      configFileName: config.configFileName,
      reverse: options.reverse ?? false,
      observer: renderer,
      logger,
    });

    const json = JSON.stringify(records);

    // stdout gets the result only after the side files are written
    if (renderer) {
      const filePath = resolve(typeof options.draw === 'string' ? options.draw : DEFAULT_DOT_FILE);
      await writeDotFile({ filePath, dot: renderer.toDot() });
      logger.info(`Wrote dependency graph to ${filePath}`);
    }

    if (outputFile) {
      const name = typeof options.githubOutput === 'string' ? options.githubOutput : DEFAULT_OUTPUT_NAME;
      await appendGithubOutput({ filePath: outputFile, name, value: json });
    }

    console.log(json);
  } catch (error) {
    reportCommandError({ action: 'order stacks', error });
  }
};
