import * as path from 'path';
import { Errors } from '../../core/errors';

/**
 * Resolve a sandbox path against the working directory.
 *
 * Relative paths are joined onto the working directory; absolute ones must
 * already lie inside it. Any `..` segment or NUL byte is rejected before
 * normalization so that `a/../b` is refused even though it would stay inside.
 */
export function resolveRemotePath(remotePath: string, workingDirectory: string): string {
  if (remotePath.includes('\0')) {
    throw Errors.pathViolation(remotePath, workingDirectory);
  }

  const segments = remotePath.split(/[\\/]+/);
  if (segments.includes('..')) {
    throw Errors.pathViolation(remotePath, workingDirectory);
  }

  const root = path.posix.normalize(workingDirectory);
  const resolved = path.posix.isAbsolute(remotePath)
    ? path.posix.normalize(remotePath)
    : path.posix.join(root, remotePath);

  if (!isWithin(resolved, root)) {
    throw Errors.pathViolation(remotePath, workingDirectory);
  }

  return resolved;
}

function isWithin(candidate: string, root: string): boolean {
  const trimmedRoot = root.length > 1 && root.endsWith('/') ? root.slice(0, -1) : root;
  const trimmed = candidate.length > 1 && candidate.endsWith('/') ? candidate.slice(0, -1) : candidate;
  if (trimmed === trimmedRoot) return true;
  const prefix = trimmedRoot === '/' ? '/' : `${trimmedRoot}/`;
  return trimmed.startsWith(prefix);
}
