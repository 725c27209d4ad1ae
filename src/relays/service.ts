/**
 * Relays Module - Service Layer
 *
 * Relay feedback tracker for one shade. Holds the last reported state
 * of the open and close relays and wakes pending waits on every update.
 */
import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";

import type { RelayWaitError } from "./errors.js";
import { feedbackTimeout, waitAborted } from "./errors.js";
import type {
  RelayPredicate,
  RelayRole,
  RelaySnapshot,
  WaitOptions,
} from "./schema.js";
import { INITIAL_RELAY_SNAPSHOT } from "./schema.js";
import { applyRelayFeedback, isConflicting } from "./transform.js";

type Waiter = {
  predicate: RelayPredicate;
  settle: (result: Result<RelaySnapshot, RelayWaitError>) => void;
};

export type RelayTracker = Readonly<{
  getSnapshot: () => RelaySnapshot;
  update: (role: RelayRole, isOn: boolean) => void;
  waitFor: (
    predicate: RelayPredicate,
    options: WaitOptions,
  ) => Promise<Result<RelaySnapshot, RelayWaitError>>;
  pendingWaits: () => number;
}>;

/**
 * Create a feedback tracker.
 *
 * @param log - Logger carrying the shade context
 */
export function createRelayTracker(log: Logger): RelayTracker {
  let snapshot: RelaySnapshot = INITIAL_RELAY_SNAPSHOT;
  const waiters = new Set<Waiter>();

  function update(role: RelayRole, isOn: boolean): void {
    snapshot = applyRelayFeedback(snapshot, role, isOn);

    if (isConflicting(snapshot)) {
      log.warn({ relays: snapshot }, "Both relays report ON");
    }

    for (const waiter of [...waiters]) {
      if (waiter.predicate(snapshot)) {
        waiter.settle(ok(snapshot));
      }
    }
  }

  function waitFor(
    predicate: RelayPredicate,
    options: WaitOptions,
  ): Promise<Result<RelaySnapshot, RelayWaitError>> {
    if (predicate(snapshot)) {
      return Promise.resolve(ok(snapshot));
    }

    const { timeoutMs, signal } = options;
    if (signal?.aborted) {
      return Promise.resolve(err(waitAborted(snapshot)));
    }

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const onAbort = () => waiter.settle(err(waitAborted(snapshot)));

      const waiter: Waiter = {
        predicate,
        settle: (result) => {
          waiters.delete(waiter);
          if (timer) clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
          resolve(result);
        },
      };

      waiters.add(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });

      if (timeoutMs !== null) {
        timer = setTimeout(() => {
          waiter.settle(err(feedbackTimeout(timeoutMs, snapshot)));
        }, timeoutMs);
      }
    });
  }

  return {
    getSnapshot: () => snapshot,
    update,
    waitFor,
    pendingWaits: () => waiters.size,
  };
}
