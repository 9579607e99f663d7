/**
 * Permission configuration: allow-listed tools and the global skip switch.
 */

import { z } from "zod";
import { readEnvBoolean } from "./env";

export interface PermissionConfig {
  /** Entries are either "tool" (every action) or "tool:action" */
  allowedTools: string[];

  /** Grant everything without prompting (non-interactive runs) */
  skipRequests: boolean;
}

const permissionConfigSchema = z
  .object({
    allowedTools: z.array(z.string().min(1)).default([]),
    skipRequests: z.boolean().default(false),
  })
  .strict();

export function parsePermissionConfig(input: unknown): PermissionConfig | null {
  const parsed = permissionConfigSchema.safeParse(input);
  if (!parsed.success) {
    return null;
  }
  return parsed.data;
}

/**
 * TOLLGATE_SKIP_PERMISSIONS, when set to a truthy or falsy value, overrides skipRequests.
 */
export function resolvePermissionConfig(config?: Partial<PermissionConfig>): PermissionConfig {
  return {
    allowedTools: [...(config?.allowedTools ?? [])],
    skipRequests:
      readEnvBoolean("TOLLGATE_SKIP_PERMISSIONS") ?? config?.skipRequests ?? false,
  };
}
