import path from 'path';
import { ConfigError } from '../errors';

/**
 * Normalizes a path to use forward slashes, the form git and the PR provider
 * report file paths in.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Normalizes a repository-relative file path: forward slashes, no leading
 * `./` or `/`, no `.` segments.
 *
 * @throws ConfigError when the path is empty or climbs out of the repository
 */
export function toRepoPath(filePath: string): string {
  const normalized = path.posix.normalize(normalizePath(filePath).replace(/^\/+/, ''));
  if (normalized === '.' || normalized === '') {
    throw new ConfigError('Target file path is empty');
  }
  if (normalized === '..' || normalized.startsWith('../')) {
    throw new ConfigError(`Target file path '${filePath}' escapes the repository`);
  }
  return normalized;
}

/**
 * Resolves a repository-relative path against a checkout root.
 */
export function resolveInRepo(root: string, filePath: string): string {
  return path.join(root, ...toRepoPath(filePath).split('/'));
}
