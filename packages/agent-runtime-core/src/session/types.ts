/**
 * Session Types
 *
 * The resumable slice of a conversation session: identity, counters and cost.
 */

/** Resumable session state */
export interface Session {
  id: string;
  parentSessionId?: string;
  title: string;
  messageCount: number;
  promptTokens: number;
  completionTokens: number;
  summaryMessageId?: string;
  cost: number;

  /** Unix timestamp in ms */
  createdAt: number;

  /** Unix timestamp in ms */
  updatedAt: number;
}

/** Prompt plus completion tokens consumed by the session so far. */
export function totalTokens(session: Pick<Session, "promptTokens" | "completionTokens">): number {
  return session.promptTokens + session.completionTokens;
}
