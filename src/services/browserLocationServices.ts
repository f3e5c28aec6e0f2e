import type { LocationGateConfig } from "../config/gateConfig";
import type { LocationServices } from "../contexts/locationServicesContext";
import { createLocationDisplay } from "../domain/location";
import { appLifecycle } from "./appLifecycle";
import { BrowserPermissionProvider } from "./browserPermissionProvider";
import { GeolocationDataSource } from "./geolocationDataSource";

export function createBrowserLocationServices(
  config: LocationGateConfig,
): LocationServices {
  return {
    permissions: new BrowserPermissionProvider({
      settingsHelpUrl: config.settingsHelpUrl,
    }),
    lifecycle: appLifecycle,
    createDataSource: () => new GeolocationDataSource(),
    createDisplay: createLocationDisplay,
    config,
  };
}
