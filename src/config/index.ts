import { resolve } from 'path';
import { z } from 'zod';
import { LOG_LEVELS } from '../lib/logger.js';
import { InvalidConfigError } from '../core/errors.js';
import { DEFAULT_CONFIG_FILE_NAME, DEFAULT_MAX_DEPTH } from '../core/stack-parser.js';

const ConfigSchema = z.object({
  baseDirectory: z.string().min(1),
  maxDepth: z.coerce.number().int().min(0),
  configFileName: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface ConfigOverrides {
  baseDirectory?: string;
  maxDepth?: string | number;
  configFileName?: string;
  logLevel?: string;
}

export const DEFAULT_CONFIG: Config = {
  baseDirectory: process.cwd(),
  maxDepth: DEFAULT_MAX_DEPTH,
  configFileName: DEFAULT_CONFIG_FILE_NAME,
  logLevel: 'warn',
};

const isBlank = (value: unknown): boolean =>
  value === undefined || (typeof value === 'string' && value.trim() === '');

// CI often passes an empty string for an unset input; treat it as not given
const withoutBlank = (values: ConfigOverrides): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, value]) => !isBlank(value)));

/**
 * Resolve the tool configuration: defaults, then environment, then CLI overrides
 */
export const loadConfig = ({
  overrides = {},
  env = process.env,
}: {
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
} = {}): Config => {
  const fromEnv: ConfigOverrides = {
    baseDirectory: env.STACK_ORDER_BASE_DIR,
    maxDepth: env.STACK_ORDER_MAX_DEPTH,
    logLevel: env.LOG_LEVEL?.trim().toLowerCase(),
  };

  const parsed = ConfigSchema.safeParse({
    ...DEFAULT_CONFIG,
    ...withoutBlank(fromEnv),
    ...withoutBlank(overrides),
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(detail);
  }

  return {
    ...parsed.data,
    baseDirectory: resolve(parsed.data.baseDirectory),
  };
};
