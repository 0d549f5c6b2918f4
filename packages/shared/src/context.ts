/**
 * Request Context
 *
 * Every API request and queue job carries a correlation id; work on a
 * specific contract also carries its document id. Both ride along in
 * AsyncLocalStorage so log lines pick them up without threading arguments.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  documentId?: string;
}

const contextStore = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return contextStore.getStore();
}

/**
 * Correlation id of the active request or job; a fresh ulid outside of one
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

export function getDocumentId(): string | undefined {
  return getContext()?.documentId;
}

/**
 * Run `fn` with `context` as the active request context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return contextStore.run(context, fn);
}

/**
 * Async variant of runWithContext; the context follows every await inside `fn`
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return contextStore.run(context, fn);
}

/**
 * Scope `fn` to one contract, keeping the surrounding correlation id
 */
export function withDocumentId<T>(documentId: string, fn: () => T): T {
  return contextStore.run({ correlationId: getCorrelationId(), documentId }, fn);
}
