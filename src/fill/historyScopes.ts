/**
 * Scoped history control.
 *
 * Each helper acquires a host history scope, runs the body, and releases the
 * scope on every exit path, including a throwing body.
 */

import type { HistoryControl } from '../host/types';

/**
 * Run `body` with history recording suppressed
 */
export function withHistorySuppressed<T>(host: HistoryControl, body: () => T): T {
  host.beginHistorySuppression();
  try {
    return body();
  } finally {
    host.endHistorySuppression();
  }
}

export interface TransactionScope {
  /** Mark the transaction as complete; without it the scope aborts on exit */
  complete(): void;
}

/**
 * Run `body` inside a named transaction. The transaction closes (one history
 * entry) when the body calls `complete()`, and aborts otherwise, including
 * when the body throws.
 */
export function withTransaction<T>(
  host: HistoryControl,
  name: string,
  body: (scope: TransactionScope) => T
): T {
  let completed = false;
  host.openTransaction(name);
  try {
    return body({
      complete: () => {
        completed = true;
      },
    });
  } finally {
    if (completed) {
      host.closeTransaction();
    } else {
      host.abortTransaction();
    }
  }
}
