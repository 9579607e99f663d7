/**
 * Checkpoint configuration: schema, defaults and environment overrides.
 */

import { z } from "zod";
import { readEnvBoolean, readEnvNumber } from "./env";

export interface CheckpointConfig {
  enabled: boolean;

  /** Prompt + completion tokens at which a checkpoint is due; <= 0 disables the rule */
  tokenThreshold: number;

  /** Interval hint for schedulers that checkpoint on a timer */
  intervalSeconds: number;

  /** Checkpoints kept per session by cleanup; <= 0 means the default */
  maxCheckpoints: number;

  /** gzip level; 0 stores state uncompressed */
  compressionLevel: number;
}

export const DEFAULT_CHECKPOINT_CONFIG: Readonly<CheckpointConfig> = Object.freeze({
  enabled: true,
  tokenThreshold: 50_000,
  intervalSeconds: 300,
  maxCheckpoints: 10,
  compressionLevel: 6,
});

/** Retention used when maxCheckpoints is not positive */
export const DEFAULT_MAX_CHECKPOINTS = 10;

const checkpointConfigSchema = z
  .object({
    enabled: z.boolean(),
    tokenThreshold: z.number().int(),
    intervalSeconds: z.number().int().nonnegative(),
    maxCheckpoints: z.number().int(),
    compressionLevel: z.number().int().min(0).max(9),
  })
  .strict();

/**
 * Validate untrusted input (a settings file, a CLI payload) as a full config.
 */
export function parseCheckpointConfig(input: unknown): CheckpointConfig | null {
  const parsed = checkpointConfigSchema.safeParse(input);
  if (!parsed.success) {
    return null;
  }
  return parsed.data;
}

/**
 * Merge defaults, an optional partial config and TOLLGATE_CHECKPOINT_* env vars.
 * Environment values take precedence.
 */
export function resolveCheckpointConfig(config?: Partial<CheckpointConfig>): CheckpointConfig {
  return {
    enabled:
      readEnvBoolean("TOLLGATE_CHECKPOINT_ENABLED") ??
      config?.enabled ??
      DEFAULT_CHECKPOINT_CONFIG.enabled,
    tokenThreshold:
      readEnvNumber("TOLLGATE_CHECKPOINT_TOKEN_THRESHOLD") ??
      config?.tokenThreshold ??
      DEFAULT_CHECKPOINT_CONFIG.tokenThreshold,
    intervalSeconds:
      readEnvNumber("TOLLGATE_CHECKPOINT_INTERVAL_SECONDS") ??
      config?.intervalSeconds ??
      DEFAULT_CHECKPOINT_CONFIG.intervalSeconds,
    maxCheckpoints:
      readEnvNumber("TOLLGATE_CHECKPOINT_MAX") ??
      config?.maxCheckpoints ??
      DEFAULT_CHECKPOINT_CONFIG.maxCheckpoints,
    compressionLevel:
      readEnvNumber("TOLLGATE_CHECKPOINT_COMPRESSION_LEVEL") ??
      config?.compressionLevel ??
      DEFAULT_CHECKPOINT_CONFIG.compressionLevel,
  };
}
