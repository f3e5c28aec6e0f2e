import { type ReactNode, useMemo } from "react";
import type { LocationGateConfig } from "../config/gateConfig";
import { createBrowserLocationServices } from "../services/browserLocationServices";
import {
  LocationServicesContext,
  type LocationServices,
} from "./locationServicesContext";

interface LocationServicesProviderProps {
  config: LocationGateConfig;
  /** Replaces the browser-backed services, e.g. in tests or a native shell. */
  services?: LocationServices;
  children: ReactNode;
}

export function LocationServicesProvider({
  config,
  services,
  children,
}: LocationServicesProviderProps) {
  const value = useMemo(
    () => services ?? createBrowserLocationServices(config),
    [services, config],
  );

  return (
    <LocationServicesContext.Provider value={value}>
      {children}
    </LocationServicesContext.Provider>
  );
}
