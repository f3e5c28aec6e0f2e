export {
  normalizePermissionStatus,
  type PermissionProvider,
} from "./permissionProvider";
export {
  permissionMachine,
  shouldRequeryOnResume,
  type PermissionMachineContext,
  type PermissionMachineEvent,
  type PermissionMachineInput,
} from "./permissionMachine";
