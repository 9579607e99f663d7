export {
  type CheckpointConfig,
  DEFAULT_CHECKPOINT_CONFIG,
  DEFAULT_MAX_CHECKPOINTS,
  parseCheckpointConfig,
  resolveCheckpointConfig,
} from "./checkpoint";
export {
  type PermissionConfig,
  parsePermissionConfig,
  resolvePermissionConfig,
} from "./permission";
