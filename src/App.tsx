import type { LocationGateConfig } from "./config/gateConfig";
import { LocationServicesProvider } from "./contexts/LocationServicesProvider";
import type { LocationServices } from "./contexts/locationServicesContext";
import { DeviceLocationGate } from "./components/DeviceLocationGate";
import { ErrorBoundary } from "./components/ErrorBoundary";

interface AppProps {
  config: LocationGateConfig;
  services?: LocationServices;
}

export function App({ config, services }: AppProps) {
  return (
    <ErrorBoundary
      title="Device location is unavailable"
      description="The location view stopped unexpectedly."
      fullScreen
    >
      <LocationServicesProvider config={config} services={services}>
        <main className="app">
          <header className="app__header">
            <h1>Show device location</h1>
          </header>
          <DeviceLocationGate />
        </main>
      </LocationServicesProvider>
    </ErrorBoundary>
  );
}
