import { posix, relative, dirname } from 'path';

/**
 * Normalize a stack path so that 'net', './net' and 'net/' all name './net'
 */
export const normalizeStackId = (rawPath: string): string => {
  const normalized = posix.normalize(rawPath.replace(/\\/g, '/')).replace(/(.)\/+$/, '$1');

  if (normalized === '' || normalized === '.') return '.';
  if (normalized === '..' || normalized.startsWith('../')) return normalized;
  if (normalized.startsWith('/')) return normalized;

  return `./${normalized}`;
};

/**
 * Derive the stack identifier of a configuration file from its directory
 */
export const stackIdFromConfigFile = ({
  baseDirectory,
  filePath,
}: {
  baseDirectory: string;
  filePath: string;
}): string => normalizeStackId(relative(baseDirectory, dirname(filePath)));
