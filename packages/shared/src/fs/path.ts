import path from 'node:path';
import { SandboxViolationError } from '../errors';

/**
 * Normalizes a path to use forward slashes, the form resource identifiers are stored in.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins path segments and normalizes the result to forward slashes.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

export function isInside(root: string, candidate: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(root, candidate));
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/**
 * Resolves `resource` against `root` and returns the absolute path.
 *
 * @throws {SandboxViolationError} if the result lies outside `root`
 */
export function resolveInside(root: string, resource: string): string {
  if (!isInside(root, resource)) {
    throw new SandboxViolationError(resource);
  }
  return path.resolve(root, resource);
}
