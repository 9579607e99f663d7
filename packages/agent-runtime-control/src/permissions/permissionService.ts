/**
 * Permission Service
 *
 * Suspends a tool call until a human grants or denies it. Requests are
 * published on a broker for the UI to render; the decision comes back through
 * grant/deny, which settle a one-shot resolver keyed by request ID. Skip mode,
 * auto-approved sessions, allow-listed tools and persistent grants
 * short-circuit to granted without publishing.
 */

import { randomUUID } from "node:crypto";
import { statSync } from "node:fs";
import { dirname } from "node:path";
import {
  describeError,
  PermissionDeniedError,
  resolvePermissionConfig,
} from "@tollgate/agent-runtime-core";
import { getLogger, type Logger } from "@tollgate/agent-runtime-telemetry";
import {
  Broker,
  CREATED_EVENT,
  DELETED_EVENT,
  type EventSubscription,
} from "../events";
import type {
  CreatePermissionRequest,
  IPermissionService,
  PermissionDecisionReason,
  PermissionNotification,
  PermissionOutcome,
  PermissionRequest,
  PermissionRequestOptions,
} from "./types";

// ============================================================================
// Types
// ============================================================================

export interface PermissionServiceOptions {
  /** Directory that "." and empty paths resolve to */
  workingDir?: string;

  /** "tool" or "tool:action" entries granted without asking */
  allowedTools?: string[];

  /** Overridden by TOLLGATE_SKIP_PERMISSIONS when set */
  skipRequests?: boolean;

  /** Queue size of each broker subscription */
  bufferSize?: number;

  logger?: Logger;
}

interface Decision {
  outcome: PermissionOutcome;
  persistent: boolean;
  reason: PermissionDecisionReason;
}

interface PendingPermission {
  request: PermissionRequest;
  settle: (decision: Decision) => void;
}

// ============================================================================
// PermissionService
// ============================================================================

export class PermissionService implements IPermissionService {
  private readonly requests: Broker<PermissionRequest>;
  private readonly notifications: Broker<PermissionNotification>;
  private readonly pending = new Map<string, PendingPermission>();
  private readonly autoApprovedSessions = new Set<string>();
  private readonly persistentGrants = new Set<string>();
  private readonly allowedTools: ReadonlySet<string>;
  private readonly workingDir: string;
  private readonly logger: Logger;
  private skip: boolean;
  private isShutdown = false;

  constructor(options: PermissionServiceOptions = {}) {
    this.logger = options.logger ?? getLogger("permissions");
    this.requests = new Broker({ bufferSize: options.bufferSize, logger: this.logger });
    this.notifications = new Broker({ bufferSize: options.bufferSize, logger: this.logger });
    const config = resolvePermissionConfig({
      allowedTools: options.allowedTools,
      skipRequests: options.skipRequests,
    });
    this.allowedTools = new Set(config.allowedTools);
    this.workingDir = options.workingDir ?? process.cwd();
    this.skip = config.skipRequests;
  }

  /**
   * Resolve to true once the request is granted, false once denied. Aborting
   * `options.signal` denies the request.
   */
  request(opts: CreatePermissionRequest, options: PermissionRequestOptions = {}): Promise<boolean> {
    const logger = this.logger.child({ sessionId: opts.sessionId, toolName: opts.toolName });

    if (this.skip) {
      logger.debug("Permission granted: skip mode", { action: opts.action });
      return Promise.resolve(true);
    }

    if (this.autoApprovedSessions.has(opts.sessionId)) {
      logger.debug("Permission granted: session auto-approved", { action: opts.action });
      return Promise.resolve(true);
    }

    if (this.isAllowListed(opts.toolName, opts.action)) {
      logger.debug("Permission granted: tool allow-listed", { action: opts.action });
      return Promise.resolve(true);
    }

    const path = opts.path === undefined ? undefined : this.normalizePath(opts.path);
    if (this.persistentGrants.has(grantKey(opts, path))) {
      logger.debug("Permission granted: persistent grant", { action: opts.action, path });
      return Promise.resolve(true);
    }

    if (this.isShutdown || options.signal?.aborted) {
      logger.info("Permission denied: request cancelled before it was published", {
        action: opts.action,
      });
      return Promise.resolve(false);
    }

    const request: PermissionRequest = { ...opts, path, id: randomUUID() };
    const signal = options.signal;

    return new Promise<boolean>((resolve) => {
      const onAbort = (): void => {
        this.settle(request.id, { outcome: "denied", persistent: false, reason: "cancelled" });
      };

      this.pending.set(request.id, {
        request,
        settle: (decision) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(decision.outcome === "granted");
        },
      });
      signal?.addEventListener("abort", onAbort, { once: true });

      this.requests.publish(CREATED_EVENT, request);
      logger.child({ requestId: request.id }).debug("Permission requested", {
        action: request.action,
        path: request.path,
      });
    });
  }

  grant(request: Pick<PermissionRequest, "id">): boolean {
    return this.settle(request.id, { outcome: "granted", persistent: false, reason: "user" });
  }

  /**
   * Grant, and grant again without asking for the same session, tool, action
   * and path.
   */
  grantPersistent(request: Pick<PermissionRequest, "id">): boolean {
    return this.settle(request.id, { outcome: "granted", persistent: true, reason: "user" });
  }

  deny(request: Pick<PermissionRequest, "id">): boolean {
    return this.settle(request.id, { outcome: "denied", persistent: false, reason: "user" });
  }

  autoApproveSession(sessionId: string): void {
    this.autoApprovedSessions.add(sessionId);
  }

  setSkipRequests(skip: boolean): void {
    this.skip = skip;
  }

  skipRequests(): boolean {
    return this.skip;
  }

  subscribe(signal?: AbortSignal): EventSubscription<PermissionRequest> {
    return this.requests.subscribe(signal);
  }

  subscribeNotifications(signal?: AbortSignal): EventSubscription<PermissionNotification> {
    return this.notifications.subscribe(signal);
  }

  /** Requests still awaiting a decision, oldest first */
  pendingRequests(): PermissionRequest[] {
    return Array.from(this.pending.values(), (entry) => entry.request);
  }

  /**
   * Deny everything in flight and close both streams. Idempotent.
   */
  shutdown(): void {
    if (this.isShutdown) {
      return;
    }
    this.isShutdown = true;

    for (const id of Array.from(this.pending.keys())) {
      this.settle(id, { outcome: "denied", persistent: false, reason: "shutdown" });
    }
    this.requests.shutdown();
    this.notifications.shutdown();
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  /**
   * First decision wins; later ones for the same ID find nothing and return false.
   */
  private settle(id: string, decision: Decision): boolean {
    const entry = this.pending.get(id);
    if (!entry) {
      return false;
    }
    this.pending.delete(id);

    const { request } = entry;
    if (decision.persistent) {
      this.persistentGrants.add(grantKey(request, request.path));
    }
    entry.settle(decision);

    this.requests.publish(DELETED_EVENT, request);
    this.notifications.publish(CREATED_EVENT, { ...request, ...decision });

    this.logger
      .child({ sessionId: request.sessionId, toolName: request.toolName, requestId: id })
      .info(`Permission ${decision.outcome}`, {
        action: request.action,
        persistent: decision.persistent,
        reason: decision.reason,
      });
    return true;
  }

  private isAllowListed(toolName: string, action: string): boolean {
    return this.allowedTools.has(`${toolName}:${action}`) || this.allowedTools.has(toolName);
  }

  /**
   * Files collapse to their directory so one grant covers sibling edits;
   * "." and "" mean the working directory.
   */
  private normalizePath(path: string): string {
    if (path === "" || path === ".") {
      return this.workingDir;
    }

    try {
      const stats = statSync(path, { throwIfNoEntry: false });
      return stats && !stats.isDirectory() ? dirname(path) : path;
    } catch (error) {
      this.logger.debug("Could not stat permission path", { path, error: describeError(error) });
      return path;
    }
  }
}

function grantKey(
  request: Pick<CreatePermissionRequest, "sessionId" | "toolName" | "action">,
  path: string | undefined
): string {
  return JSON.stringify([request.sessionId, request.toolName, request.action, path ?? null]);
}

// ============================================================================
// Tool Runtime Helpers
// ============================================================================

/**
 * Await a decision and throw PermissionDeniedError unless it was granted.
 */
export async function requirePermission(
  service: Pick<IPermissionService, "request">,
  opts: CreatePermissionRequest,
  options?: PermissionRequestOptions
): Promise<void> {
  const granted = await service.request(opts, options);
  if (!granted) {
    throw new PermissionDeniedError({
      sessionId: opts.sessionId,
      toolName: opts.toolName,
      action: opts.action,
    });
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createPermissionService(options?: PermissionServiceOptions): PermissionService {
  return new PermissionService(options);
}
