import { PermissionState, type PlatformPermissionStatus } from "../../types";

export interface PermissionProvider {
  /** Current status, without showing any prompt. */
  status(): Promise<PlatformPermissionStatus>;
  /** Shows the platform prompt when the user has not decided yet. */
  request(): Promise<PlatformPermissionStatus>;
  /** Resolves to whether a settings screen was actually opened. */
  openSystemSettings(): Promise<boolean>;
}

export function normalizePermissionStatus(
  status: PlatformPermissionStatus,
): PermissionState {
  switch (status) {
    case PermissionState.Granted:
      return PermissionState.Granted;
    case PermissionState.PermanentlyDenied:
      return PermissionState.PermanentlyDenied;
    default:
      return PermissionState.Denied;
  }
}
