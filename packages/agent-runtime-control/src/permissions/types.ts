/**
 * Permission request and outcome payloads carried over the permission brokers.
 */

import type { EventSubscription } from "../events";

/** What a tool asks for before a side-effecting action */
export interface CreatePermissionRequest {
  sessionId: string;
  toolName: string;
  action: string;

  /** Tool-specific parameters rendered by the UI */
  params?: unknown;

  /** File or directory the action touches */
  path?: string;

  toolCallId?: string;
  description?: string;
}

/** A request awaiting a decision, as published to subscribers */
export interface PermissionRequest extends CreatePermissionRequest {
  id: string;
}

export type PermissionOutcome = "granted" | "denied";

/** Who or what resolved the request */
export type PermissionDecisionReason = "user" | "cancelled" | "shutdown";

/** A resolved request, published for history and audit */
export interface PermissionNotification extends PermissionRequest {
  outcome: PermissionOutcome;
  persistent: boolean;
  reason: PermissionDecisionReason;
}

export interface PermissionRequestOptions {
  /** Aborting resolves the request as denied */
  signal?: AbortSignal;
}

/**
 * Permission arbitration contract shared by the tool runtime and the UI.
 */
export interface IPermissionService {
  request(opts: CreatePermissionRequest, options?: PermissionRequestOptions): Promise<boolean>;
  grant(request: Pick<PermissionRequest, "id">): boolean;
  grantPersistent(request: Pick<PermissionRequest, "id">): boolean;
  deny(request: Pick<PermissionRequest, "id">): boolean;
  autoApproveSession(sessionId: string): void;
  setSkipRequests(skip: boolean): void;
  skipRequests(): boolean;
  subscribe(signal?: AbortSignal): EventSubscription<PermissionRequest>;
  subscribeNotifications(signal?: AbortSignal): EventSubscription<PermissionNotification>;
}
