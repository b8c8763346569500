/**
 * AsyncLocalStorage Context Management
 *
 * Propagates correlation and run identifiers across a pipeline run and the
 * worker job that started it.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  documentId?: string;
  runId?: string;
  declaredCategory?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function in a child context that inherits the caller's
 * identifiers and overrides the given ones.
 */
export async function runInChildContext<T>(
  overrides: Partial<RequestContext>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  const context: RequestContext = {
    ...parent,
    ...overrides,
    correlationId: overrides.correlationId || parent?.correlationId || ulid(),
  };
  return asyncLocalStorage.run(context, fn);
}
