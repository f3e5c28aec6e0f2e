import { PermissionState } from "../../types";
import { useLocationServices } from "../../contexts/locationServicesContext";
import { useLocationPermission } from "../../hooks/useLocationPermission";
import { LocationMapView } from "../LocationMapView";
import { OpenSettingsPanel, RequestLocationPanel } from "../PermissionPanels";

export function DeviceLocationGate() {
  const { permissions, lifecycle, config } = useLocationServices();
  const permission = useLocationPermission({
    permissions,
    lifecycle,
    resumePolicy: config.resumePolicy,
  });

  if (permission.isChecking) {
    return (
      <p className="gate-checking" role="status">
        Checking location permission...
      </p>
    );
  }

  switch (permission.permission) {
    case PermissionState.Granted:
      return <LocationMapView initialAutoPanMode={config.initialAutoPanMode} />;
    case PermissionState.Denied:
      return (
        <RequestLocationPanel
          isRequesting={permission.isRequesting}
          isBusy={permission.isBusy}
          onRequest={permission.requestPermission}
        />
      );
    case PermissionState.PermanentlyDenied:
      return (
        <OpenSettingsPanel
          isOpeningSettings={permission.isOpeningSettings}
          isRechecking={permission.isRechecking}
          settingsOpenFailed={permission.settingsOpenFailed}
          onOpenSettings={permission.openSettings}
          onCheckAgain={permission.queryPermission}
        />
      );
    default: {
      const unhandled: never = permission.permission;
      return unhandled;
    }
  }
}
