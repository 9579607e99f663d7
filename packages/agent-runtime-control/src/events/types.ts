/**
 * Broker event types.
 */

export const CREATED_EVENT = "created";
export const UPDATED_EVENT = "updated";
export const DELETED_EVENT = "deleted";

/** Built-in kinds plus any custom string kind */
export type EventKind =
  | typeof CREATED_EVENT
  | typeof UPDATED_EVENT
  | typeof DELETED_EVENT
  | (string & {});

/**
 * A published event. The payload is shared by reference with every
 * subscriber and must be treated as an immutable snapshot.
 */
export interface BrokerEvent<T> {
  readonly type: EventKind;
  readonly payload: T;
}
