import { useState, useSyncExternalStore } from "react";
import type { AutoPanMode } from "../../types";
import { useLocationServices } from "../../contexts/locationServicesContext";
import { useLocationSession } from "../../hooks/useLocationSession";
import { formatStartError } from "../../utils/startError";
import { AlertDialog } from "../AlertDialog";
import { LocationSettings } from "../LocationSettings";
import { LocationReadout } from "./LocationReadout";

interface LocationMapViewProps {
  initialAutoPanMode: AutoPanMode;
}

// Mounted only while location permission is granted; unmounting stops the
// session and releases the data source.
export function LocationMapView({ initialAutoPanMode }: LocationMapViewProps) {
  const { createDataSource, createDisplay } = useLocationServices();
  const [display] = useState(() => createDisplay(initialAutoPanMode));
  const [dataSource] = useState(() => createDataSource());

  const session = useLocationSession({
    display,
    dataSource,
    autoPanMode: initialAutoPanMode,
  });
  const snapshot = useSyncExternalStore(display.subscribe, display.getSnapshot);

  return (
    <div className="map-view">
      <section
        className={`map-view__surface map-view__surface--${snapshot.autoPanMode}`}
        aria-label="Map"
      >
        <LocationReadout snapshot={snapshot} />
      </section>
      <LocationSettings
        autoPanMode={session.autoPanMode}
        sessionEnabled={session.isRunning}
        status={session.status}
        disabled={!session.isReady}
        onAutoPanModeChange={session.setAutoPanMode}
        onSessionEnabledChange={session.setSessionEnabled}
      />
      {!session.isReady && (
        <div
          className="map-view__overlay"
          role="progressbar"
          aria-label="Starting location"
        >
          <span className="spinner" />
        </div>
      )}
      <AlertDialog
        isOpen={session.startError !== null}
        title={session.startError ? formatStartError(session.startError) : ""}
        message={session.startError?.message ?? ""}
        onDismiss={session.dismissStartError}
      />
    </div>
  );
}
