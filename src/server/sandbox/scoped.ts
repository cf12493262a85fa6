/**
 * Single-runtime helper for callers that do not need sessions
 */

import type { RuntimeAdapter, RuntimeConfigInput } from './types';
import type { RuntimeFactory } from './factory';
import { resolveRuntimeConfig } from '../config';
import { logger } from '../logger';

/**
 * Boot a runtime, hand it to fn and always terminate it afterwards
 *
 * @example
 * ```typescript
 * const out = await withSandbox(createRuntimeFactory(), { backend: 'docker' }, (sandbox) =>
 *   sandbox.execute('print(2 + 2)', 'python')
 * );
 * ```
 */
export async function withSandbox<T>(
  factory: RuntimeFactory,
  config: RuntimeConfigInput,
  fn: (runtime: RuntimeAdapter) => Promise<T>
): Promise<T> {
  const runtime = factory(resolveRuntimeConfig(config));
  try {
    await runtime.start();
    return await fn(runtime);
  } finally {
    const outcome = await runtime.terminate();
    if (!outcome.ok) {
      logger.warn('Scoped sandbox did not terminate cleanly', { error: outcome.error });
    }
  }
}
