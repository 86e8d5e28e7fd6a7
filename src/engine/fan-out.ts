/**
 * Concurrent agent dispatch under a cycle deadline.
 *
 * AbortController hierarchy: one parent per cycle (deadline timer plus any
 * external signal), one child per agent. At the deadline every outstanding
 * call is cancelled and settled as unavailable; a result arriving later is
 * discarded because its promise has already lost the race.
 */

import { AgentUnavailableError, isEngineError, errorMessage, type EngineError } from '../errors.js';
import type { AgentAdapter } from '../agents/adapter.js';
import type { AgentType, AnomalyCategory, Prediction, TelemetryWindow } from '../types.js';

export type AgentOutcome =
  | { agentType: AgentType; category: AnomalyCategory; status: 'ok'; prediction: Prediction; latencyMs: number }
  | { agentType: AgentType; category: AnomalyCategory; status: 'failed'; error: EngineError; latencyMs: number };

export interface FanOutOptions {
  deadlineMs: number;
  /** Cancels the whole cycle (engine stop) */
  signal?: AbortSignal;
  now?: () => number;
}

function raceAbort<T>(work: Promise<T>, signal: AbortSignal, onAbort: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const abort = (): void => reject(onAbort());
    if (signal.aborted) abort();
    else signal.addEventListener('abort', abort, { once: true });
    // A settle after the abort is a no-op on the already rejected promise
    work.then(
      value => {
        signal.removeEventListener('abort', abort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', abort);
        reject(err);
      },
    );
  });
}

function toEngineError(agentType: AgentType, err: unknown): EngineError {
  if (isEngineError(err)) return err;
  return new AgentUnavailableError(agentType, errorMessage(err), { cause: err });
}

/** Run every adapter on the window concurrently; never rejects. */
export async function fanOut(
  adapters: readonly AgentAdapter[],
  window: TelemetryWindow,
  options: FanOutOptions,
): Promise<AgentOutcome[]> {
  const now = options.now ?? Date.now;
  const parentAbort = new AbortController();
  const timeoutId = setTimeout(() => parentAbort.abort(), options.deadlineMs);
  const external = options.signal;
  const onExternalAbort = (): void => parentAbort.abort();
  if (external?.aborted) parentAbort.abort();
  else external?.addEventListener('abort', onExternalAbort, { once: true });

  try {
    const calls = adapters.map(async (adapter): Promise<AgentOutcome> => {
      const childAbort = new AbortController();
      if (parentAbort.signal.aborted) childAbort.abort();
      else parentAbort.signal.addEventListener('abort', () => childAbort.abort(), { once: true });
      const start = now();
      const base = { agentType: adapter.agentType, category: adapter.category };

      try {
        const work = Promise.resolve().then(() => adapter.predict(window, childAbort.signal));
        const prediction = await raceAbort(work, childAbort.signal, () =>
          new AgentUnavailableError(adapter.agentType, `no response within ${options.deadlineMs}ms`, { timedOut: true }),
        );
        return { ...base, status: 'ok', prediction, latencyMs: now() - start };
      } catch (err) {
        return { ...base, status: 'failed', error: toEngineError(adapter.agentType, err), latencyMs: now() - start };
      }
    });
    return await Promise.all(calls);
  } finally {
    clearTimeout(timeoutId);
    external?.removeEventListener('abort', onExternalAbort);
    // Cancel anything still running past this point
    parentAbort.abort();
  }
}
