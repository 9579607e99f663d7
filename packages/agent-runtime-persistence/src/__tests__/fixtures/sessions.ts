import type { Session } from "@tollgate/agent-runtime-core";

export function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    id: "session-1",
    title: "Refactor the parser",
    messageCount: 10,
    promptTokens: 1000,
    completionTokens: 500,
    cost: 0.25,
    createdAt: 1_700_000_000_000,
    updatedAt: 1_700_000_060_000,
    ...overrides,
  };
}
