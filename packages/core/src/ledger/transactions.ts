/**
 * Serialization and atomicity for ledger entry points.
 *
 * Every entry point runs in one FIFO queue per ledger. Inside its turn it may
 * await (the attestation fetch), then applies all reads and writes in a single
 * synchronous SQLite transaction (sql.js). Events emitted inside the transaction are
 * stored with it and delivered to listeners only after commit.
 */

import { AsyncLocalStorage } from "node:async_hooks";

import type { Logger } from "pino";

import { ReentrantCallError } from "../errors/catalog.js";

import type { LedgerStore } from "./store.js";
import type { LedgerEvent, NewLedgerEvent } from "./types.js";

export interface LedgerTx {
  readonly store: LedgerStore;
  /** Unix seconds, fixed for the whole transaction. */
  readonly now: number;
  emit(event: NewLedgerEvent): LedgerEvent;
}

export type LedgerEventListener = (event: LedgerEvent) => void;

export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export class LedgerRunner {
  private tail: Promise<void> = Promise.resolve();
  private readonly inProgress = new AsyncLocalStorage<string>();
  private listeners: LedgerEventListener[] = [];

  constructor(
    readonly store: LedgerStore,
    private readonly logger: Logger,
    readonly clock: Clock = systemClock,
  ) {}

  /**
   * Queue `fn` behind every earlier entry point. Calling back into the
   * ledger from inside a queued operation rejects with ReentrantCallError.
   */
  serialize<T>(operation: string, fn: () => Promise<T> | T): Promise<T> {
    const active = this.inProgress.getStore();
    if (active !== undefined) {
      return Promise.reject(new ReentrantCallError({ operation, active }));
    }

    const run = this.tail.then(() => this.inProgress.run(operation, fn));
    // The queue advances whether or not `run` fails; callers observe the failure through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Run `fn` in one SQLite transaction, then deliver the events it emitted. */
  atomic<T>(fn: (tx: LedgerTx) => T): T {
    const emitted: LedgerEvent[] = [];
    const now = this.clock();

    const result = this.store.db.transaction(() => {
      emitted.length = 0;
      const tx: LedgerTx = {
        store: this.store,
        now,
        emit: (event) => {
          const stored = this.store.appendEvent(event, now);
          emitted.push(stored);
          return stored;
        },
      };
      return fn(tx);
    });

    for (const event of emitted) {
      this.deliver(event);
    }
    return result;
  }

  /** Register a listener for committed events. Returns an unsubscribe function. */
  onEvent(listener: LedgerEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private deliver(event: LedgerEvent): void {
    this.logger.debug({ event }, "Ledger event");
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error({ err, eventId: event.id }, "Ledger event listener failed");
      }
    }
  }
}
