/**
 * Event Subscription
 *
 * The receive end of a broker subscription: a bounded queue that can be
 * drained with `for await`, polled with `tryReceive()`, and closed by
 * unsubscribing, aborting its signal, or shutting the broker down.
 */

import type { BrokerEvent } from "./types";

type Waiter<T> = (result: IteratorResult<BrokerEvent<T>>) => void;

export interface EventSubscriptionOptions {
  id: string;

  /** Undelivered events held before new ones are dropped */
  capacity: number;

  /** Aborting the signal unsubscribes */
  signal?: AbortSignal;

  /** Called once when the consumer unsubscribes; removes it from the broker */
  detach?: (id: string) => void;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

export class EventSubscription<T> implements AsyncIterableIterator<BrokerEvent<T>> {
  readonly id: string;

  private readonly capacity: number;
  private readonly queue: BrokerEvent<T>[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private readonly signal?: AbortSignal;
  private readonly detach?: (id: string) => void;
  private isClosed = false;
  private droppedCount = 0;

  private readonly onAbort = (): void => {
    this.unsubscribe();
  };

  constructor(options: EventSubscriptionOptions) {
    this.id = options.id;
    this.capacity = options.capacity;
    this.signal = options.signal;
    this.detach = options.detach;
    this.signal?.addEventListener("abort", this.onAbort, { once: true });
  }

  /** True once no further events will be accepted */
  get closed(): boolean {
    return this.isClosed;
  }

  /** Events queued and not yet received */
  get pending(): number {
    return this.queue.length;
  }

  /** Events rejected because the queue was full */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Offer an event without blocking. Returns false when the subscription is
   * closed or its queue is full; a full queue drops the offered event.
   * @internal
   */
  offer(event: BrokerEvent<T>): boolean {
    if (this.isClosed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: event });
      return true;
    }

    if (this.queue.length >= this.capacity) {
      this.droppedCount++;
      return false;
    }

    this.queue.push(event);
    return true;
  }

  /** Take the next queued event, if any, without waiting. */
  tryReceive(): BrokerEvent<T> | undefined {
    return this.queue.shift();
  }

  async next(): Promise<IteratorResult<BrokerEvent<T>>> {
    const event = this.queue.shift();
    if (event) {
      return { done: false, value: event };
    }
    if (this.isClosed) {
      return DONE;
    }
    return new Promise<IteratorResult<BrokerEvent<T>>>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async return(): Promise<IteratorResult<BrokerEvent<T>>> {
    this.unsubscribe();
    return DONE;
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /**
   * Stop receiving events and leave the broker. Queued events stay readable.
   * Idempotent.
   */
  unsubscribe(): void {
    if (this.isClosed) {
      return;
    }
    this.detach?.(this.id);
    this.close();
  }

  /**
   * Close without detaching; used by the broker when it drops the subscription itself.
   * @internal
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.signal?.removeEventListener("abort", this.onAbort);

    for (const waiter of this.waiters.splice(0)) {
      waiter(DONE);
    }
  }
}
