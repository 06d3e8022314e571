/**
 * RuntimeMiddleware Tests
 */

import { describe, it, expect } from 'vitest';
import { RuntimeMiddleware } from './runtime.js';
import { Step } from '../workflow/step.js';
import { createChain } from '../chain.js';
import { createContext } from '../context.js';
import { createServices } from '../testing/fixtures.js';
import type { RequestContext } from '../workflow/types.js';

class WaitingStep extends Step {
  override async work(): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.skip('Waited', { code: 'NOT_FOUND' });
  }
}

describe('RuntimeMiddleware', () => {
  it('should add the runtime to the result metadata', async () => {
    const chain = createChain();
    const step = new WaitingStep(createContext<RequestContext>(), chain, createServices());
    const result = await step.execute([RuntimeMiddleware]);

    expect(result.skipped).toBe(true);
    expect(result.metadata.code).toBe('NOT_FOUND');
    expect(result.metadata.runtime).toBeGreaterThanOrEqual(4);
    expect(chain.steps).toEqual(['WaitingStep:skipped']);
  });
});
