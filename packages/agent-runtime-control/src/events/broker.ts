/**
 * Event Broker
 *
 * Typed, best-effort fan-out from any number of publishers to any number of
 * subscribers. Publishing never waits on a consumer: when a subscriber's
 * queue is full the event is dropped for that subscriber only.
 */

import { getLogger, type Logger } from "@tollgate/agent-runtime-telemetry";
import { EventSubscription } from "./subscription";
import type { BrokerEvent, EventKind } from "./types";

// ============================================================================
// Types
// ============================================================================

export interface BrokerOptions {
  /** Per-subscriber queue size (default 64) */
  bufferSize?: number;

  /** Ceiling applied to bufferSize (default 1000) */
  maxQueueDepth?: number;

  logger?: Logger;
}

export interface BrokerStats {
  activeSubscriptions: number;
  totalPublished: number;
  totalDelivered: number;
  totalDropped: number;
}

export const DEFAULT_BUFFER_SIZE = 64;
export const DEFAULT_MAX_QUEUE_DEPTH = 1000;

// ============================================================================
// Broker
// ============================================================================

export class Broker<T> {
  private readonly subscribers = new Map<string, EventSubscription<T>>();
  private readonly capacity: number;
  private readonly logger: Logger;

  private subscriptionCounter = 0;
  private totalPublished = 0;
  private totalDelivered = 0;
  private totalDropped = 0;
  private isShutdown = false;

  constructor(options: BrokerOptions = {}) {
    const bufferSize = Math.max(0, options.bufferSize ?? DEFAULT_BUFFER_SIZE);
    const maxQueueDepth = Math.max(0, options.maxQueueDepth ?? DEFAULT_MAX_QUEUE_DEPTH);
    this.capacity = Math.min(bufferSize, maxQueueDepth);
    this.logger = options.logger ?? getLogger("broker");
  }

  /** Queue size each new subscription receives */
  get queueCapacity(): number {
    return this.capacity;
  }

  get closed(): boolean {
    return this.isShutdown;
  }

  /**
   * Register a subscriber. Never blocks. After shutdown, or with an already
   * aborted signal, the returned subscription is closed and receives nothing.
   */
  subscribe(signal?: AbortSignal): EventSubscription<T> {
    const id = this.generateSubscriptionId();

    if (this.isShutdown || signal?.aborted) {
      const closed = new EventSubscription<T>({ id, capacity: 0 });
      closed.close();
      return closed;
    }

    const subscription = new EventSubscription<T>({
      id,
      capacity: this.capacity,
      signal,
      detach: (subscriptionId) => {
        this.subscribers.delete(subscriptionId);
      },
    });
    this.subscribers.set(id, subscription);
    return subscription;
  }

  /**
   * Offer one event to every current subscriber. Returns the number of
   * subscribers whose queue accepted it. A no-op after shutdown.
   */
  publish(kind: EventKind, payload: T): number {
    if (this.isShutdown) {
      return 0;
    }

    const event: BrokerEvent<T> = { type: kind, payload };
    this.totalPublished++;

    let delivered = 0;
    for (const subscription of this.subscribers.values()) {
      if (subscription.offer(event)) {
        delivered++;
        continue;
      }
      this.recordDrop(subscription, kind);
    }

    this.totalDelivered += delivered;
    return delivered;
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }

  getStats(): BrokerStats {
    return {
      activeSubscriptions: this.subscribers.size,
      totalPublished: this.totalPublished,
      totalDelivered: this.totalDelivered,
      totalDropped: this.totalDropped,
    };
  }

  /**
   * Close every subscription and refuse new ones. Idempotent.
   */
  shutdown(): void {
    if (this.isShutdown) {
      return;
    }
    this.isShutdown = true;

    const count = this.subscribers.size;
    for (const subscription of this.subscribers.values()) {
      subscription.close();
    }
    this.subscribers.clear();

    this.logger.debug("Broker shut down", { closedSubscriptions: count });
  }

  private recordDrop(subscription: EventSubscription<T>, kind: EventKind): void {
    this.totalDropped++;
    const data = { subscriptionId: subscription.id, eventType: kind, dropped: subscription.dropped };
    if (subscription.dropped === 1) {
      this.logger.warn("Subscriber queue full, dropping events", data);
    } else {
      this.logger.debug("Dropped event for slow subscriber", data);
    }
  }

  private generateSubscriptionId(): string {
    return `sub_${++this.subscriptionCounter}`;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createBroker<T>(options?: BrokerOptions): Broker<T> {
  return new Broker<T>(options);
}
