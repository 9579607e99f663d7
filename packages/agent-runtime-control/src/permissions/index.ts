export {
  createPermissionService,
  PermissionService,
  type PermissionServiceOptions,
  requirePermission,
} from "./permissionService";
export type {
  CreatePermissionRequest,
  IPermissionService,
  PermissionDecisionReason,
  PermissionNotification,
  PermissionOutcome,
  PermissionRequest,
  PermissionRequestOptions,
} from "./types";
