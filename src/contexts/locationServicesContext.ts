import { createContext, useContext } from "react";
import type { AutoPanMode } from "../types";
import type { LocationGateConfig } from "../config/gateConfig";
import type { LifecycleNotifier } from "../domain/lifecycle";
import type { LocationDataSource, LocationDisplay } from "../domain/location";
import type { PermissionProvider } from "../domain/permissions";

export interface LocationServices {
  permissions: PermissionProvider;
  lifecycle: LifecycleNotifier;
  createDataSource: () => LocationDataSource;
  createDisplay: (autoPanMode: AutoPanMode) => LocationDisplay;
  config: LocationGateConfig;
}

const LocationServicesContext = createContext<LocationServices | null>(null);

export function useLocationServices(): LocationServices {
  const context = useContext(LocationServicesContext);
  if (!context) {
    throw new Error(
      "useLocationServices must be used within LocationServicesProvider",
    );
  }
  return context;
}

export { LocationServicesContext };
