import { LocationSessionStatus, type DeviceLocation } from "../types";
import { LocationDataSourceError } from "../domain/errors";
import type {
  LocationDataSource,
  LocationListener,
  LocationStatusListener,
} from "../domain/location";
import { WATCH_POSITION_OPTIONS } from "../utils/constants";

// GeolocationPositionError codes; the global constructor is missing in some
// environments (jsdom among them).
const PERMISSION_DENIED = 1;
const POSITION_UNAVAILABLE = 2;
const TIMEOUT = 3;

interface PendingStart {
  promise: Promise<void>;
  resolve: (value: void | PromiseLike<void>) => void;
  reject: (reason: LocationDataSourceError) => void;
}

export function toDeviceLocation(position: GeolocationPosition): DeviceLocation {
  const { coords } = position;
  return {
    lat: coords.latitude,
    lon: coords.longitude,
    accuracy: Number.isFinite(coords.accuracy) ? coords.accuracy : null,
    heading:
      coords.heading !== null && Number.isFinite(coords.heading)
        ? coords.heading
        : null,
    speed:
      coords.speed !== null && Number.isFinite(coords.speed)
        ? coords.speed
        : null,
    timestamp: position.timestamp,
  };
}

export function toDataSourceError(
  error: Pick<GeolocationPositionError, "code" | "message">,
): LocationDataSourceError {
  switch (error.code) {
    case PERMISSION_DENIED:
      return new LocationDataSourceError(
        "PermissionDenied",
        error.message || "Location permission denied",
      );
    case POSITION_UNAVAILABLE:
      return new LocationDataSourceError(
        "Unavailable",
        error.message || "Location services disabled",
      );
    case TIMEOUT:
      return new LocationDataSourceError(
        "Timeout",
        error.message || "Timed out waiting for a location fix",
      );
    default:
      return new LocationDataSourceError(
        "Unknown",
        error.message || "Failed to start location updates",
      );
  }
}

/**
 * Continuous device location from `navigator.geolocation.watchPosition`.
 * `start()` settles with the first fix or the first error.
 */
export class GeolocationDataSource implements LocationDataSource {
  private readonly geolocation: Geolocation | undefined;
  private readonly options: PositionOptions;
  private status: LocationSessionStatus = LocationSessionStatus.Stopped;
  private watchId: number | null = null;
  private pendingStart: PendingStart | null = null;
  private statusListeners = new Set<LocationStatusListener>();
  private locationListeners = new Set<LocationListener>();

  constructor(
    geolocation?: Geolocation,
    options: PositionOptions = WATCH_POSITION_OPTIONS,
  ) {
    this.geolocation =
      geolocation ??
      (typeof navigator !== "undefined" && "geolocation" in navigator
        ? navigator.geolocation
        : undefined);
    this.options = options;
  }

  getStatus(): LocationSessionStatus {
    return this.status;
  }

  start(): Promise<void> {
    if (this.status === LocationSessionStatus.Started) {
      return Promise.resolve();
    }
    if (this.pendingStart) {
      return this.pendingStart.promise;
    }

    const geolocation = this.geolocation;
    if (!geolocation) {
      this.setStatus(LocationSessionStatus.FailedToStart);
      return Promise.reject(
        new LocationDataSourceError(
          "Unavailable",
          "Location services are not available on this device",
        ),
      );
    }

    this.setStatus(LocationSessionStatus.Starting);
    let resolveStart: PendingStart["resolve"] = () => {};
    let rejectStart: PendingStart["reject"] = () => {};
    const promise = new Promise<void>((resolve, reject) => {
      resolveStart = resolve;
      rejectStart = reject;
    });
    this.pendingStart = { promise, resolve: resolveStart, reject: rejectStart };
    this.watchId = geolocation.watchPosition(
      this.handlePosition,
      this.handleError,
      this.options,
    );
    return promise;
  }

  async stop(): Promise<void> {
    this.clearWatch();
    const pending = this.pendingStart;
    this.pendingStart = null;
    this.setStatus(LocationSessionStatus.Stopped);
    pending?.reject(
      new LocationDataSourceError(
        "Cancelled",
        "Location updates were stopped before the first fix",
      ),
    );
  }

  onStatusChanged(listener: LocationStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  onLocationChanged(listener: LocationListener): () => void {
    this.locationListeners.add(listener);
    return () => {
      this.locationListeners.delete(listener);
    };
  }

  private handlePosition = (position: GeolocationPosition) => {
    const pending = this.pendingStart;
    if (pending) {
      this.pendingStart = null;
      this.setStatus(LocationSessionStatus.Started);
      pending.resolve();
    }
    if (this.status !== LocationSessionStatus.Started) return;
    const location = toDeviceLocation(position);
    this.locationListeners.forEach((listener) => listener(location));
  };

  private handleError = (error: GeolocationPositionError) => {
    const pending = this.pendingStart;
    if (pending) {
      this.pendingStart = null;
      this.clearWatch();
      this.setStatus(LocationSessionStatus.FailedToStart);
      pending.reject(toDataSourceError(error));
      return;
    }
    if (error.code === PERMISSION_DENIED) {
      console.warn("Location access revoked, stopping updates:", error.message);
      this.clearWatch();
      this.setStatus(LocationSessionStatus.Stopped);
      return;
    }
    // Transient: the watch keeps running and may deliver fixes again.
    console.warn("Location update failed:", error.message);
  };

  private clearWatch() {
    if (this.watchId === null) return;
    this.geolocation?.clearWatch(this.watchId);
    this.watchId = null;
  }

  private setStatus(status: LocationSessionStatus) {
    if (this.status === status) return;
    this.status = status;
    this.statusListeners.forEach((listener) => listener(status));
  }
}
