import type { AutoPanMode, DeviceLocation } from "../../types";
import { DEFAULT_AUTO_PAN_MODE } from "../../utils/constants";
import type { LocationDataSource } from "./locationDataSource";

export interface LocationDisplaySnapshot {
  autoPanMode: AutoPanMode;
  location: DeviceLocation | null;
  hasDataSource: boolean;
}

/**
 * Headless stand-in for a map's location display: it follows whatever data
 * source is attached and remembers the last reported position.
 *
 * `subscribe` and `getSnapshot` are bound so they can be handed straight to
 * `useSyncExternalStore`.
 */
export interface LocationDisplay {
  getDataSource(): LocationDataSource | null;
  setDataSource(dataSource: LocationDataSource | null): void;
  getAutoPanMode(): AutoPanMode;
  setAutoPanMode(mode: AutoPanMode): void;
  getSnapshot: () => LocationDisplaySnapshot;
  subscribe: (listener: () => void) => () => void;
}

class HeadlessLocationDisplay implements LocationDisplay {
  private dataSource: LocationDataSource | null = null;
  private unsubscribeLocation: (() => void) | null = null;
  private snapshot: LocationDisplaySnapshot;
  private listeners = new Set<() => void>();

  constructor(autoPanMode: AutoPanMode) {
    this.snapshot = { autoPanMode, location: null, hasDataSource: false };
  }

  getDataSource(): LocationDataSource | null {
    return this.dataSource;
  }

  setDataSource(dataSource: LocationDataSource | null): void {
    if (this.dataSource === dataSource) return;
    this.unsubscribeLocation?.();
    this.unsubscribeLocation = null;
    this.dataSource = dataSource;
    if (dataSource) {
      this.unsubscribeLocation = dataSource.onLocationChanged((location) => {
        this.update({ location });
      });
    }
    this.update({ hasDataSource: dataSource !== null, location: null });
  }

  getAutoPanMode(): AutoPanMode {
    return this.snapshot.autoPanMode;
  }

  setAutoPanMode(mode: AutoPanMode): void {
    if (this.snapshot.autoPanMode === mode) return;
    this.update({ autoPanMode: mode });
  }

  getSnapshot = (): LocationDisplaySnapshot => this.snapshot;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  private update(patch: Partial<LocationDisplaySnapshot>) {
    this.snapshot = { ...this.snapshot, ...patch };
    this.listeners.forEach((listener) => listener());
  }
}

export function createLocationDisplay(
  autoPanMode: AutoPanMode = DEFAULT_AUTO_PAN_MODE,
): LocationDisplay {
  return new HeadlessLocationDisplay(autoPanMode);
}
