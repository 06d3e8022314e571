/**
 * Runtime Middleware - Track step execution time
 */

import { performance } from 'node:perf_hooks';
import type { StepResult } from '../result.js';
import type { Step } from '../workflow/step.js';

/**
 * Middleware that records a step's execution time in milliseconds using a monotonic clock.
 *
 * @example
 * ```typescript
 * configure((config) => {
 *   config.middlewares.register(RuntimeMiddleware);
 * });
 * ```
 */
export async function RuntimeMiddleware(
  _step: Step,
  next: () => Promise<StepResult>
): Promise<StepResult> {
  const startTime = performance.now();
  const result = await next();
  const endTime = performance.now();

  // Results are frozen; attach the runtime to a copy.
  return result.withMetadata({ runtime: Math.round(endTime - startTime) });
}
