export {
  PermissionRequestPlanner,
  createPermissionPlanner,
  type DeleteRequest,
  type ListPermissionsParams,
  type PermissionRequestPlannerDeps,
  type PermissionTarget,
  type ResetPermissionsParams,
  type ResetRequest,
  type UpdatePermissionsParams,
  type UpdateRequest,
} from "./planner.js";
