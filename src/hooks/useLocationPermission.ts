import { useCallback } from "react";
import { useMachine } from "@xstate/react";
import type { LifecycleState, PermissionState, ResumePolicy } from "../types";
import type { LifecycleNotifier } from "../domain/lifecycle";
import {
  permissionMachine,
  type PermissionProvider,
} from "../domain/permissions";

export interface UseLocationPermissionOptions {
  permissions: PermissionProvider;
  lifecycle: LifecycleNotifier;
  resumePolicy: ResumePolicy;
}

export interface UseLocationPermissionReturn {
  permission: PermissionState;
  lifecycleState: LifecycleState;
  /** True until the first permission check has completed. */
  isChecking: boolean;
  /** True while a later, non-prompting check is in flight. */
  isRechecking: boolean;
  isRequesting: boolean;
  isOpeningSettings: boolean;
  /** True while any permission operation is in flight. */
  isBusy: boolean;
  settingsOpenFailed: boolean;
  queryPermission: () => void;
  /** Shows the platform prompt; call only from a user action. */
  requestPermission: () => void;
  openSettings: () => void;
}

export function useLocationPermission(
  options: UseLocationPermissionOptions,
): UseLocationPermissionReturn {
  const [state, send] = useMachine(permissionMachine, { input: options });

  const queryPermission = useCallback(() => {
    send({ type: "QUERY_PERMISSION" });
  }, [send]);

  const requestPermission = useCallback(() => {
    send({ type: "REQUEST_PERMISSION" });
  }, [send]);

  const openSettings = useCallback(() => {
    send({ type: "OPEN_SETTINGS" });
  }, [send]);

  return {
    permission: state.context.permission,
    lifecycleState: state.context.lifecycleState,
    isChecking: state.matches("initializing"),
    isRechecking: state.matches("querying"),
    isRequesting: state.matches("requesting"),
    isOpeningSettings: state.matches("openingSettings"),
    isBusy: !state.matches("idle"),
    settingsOpenFailed: state.context.settingsOpenFailed,
    queryPermission,
    requestPermission,
    openSettings,
  };
}
