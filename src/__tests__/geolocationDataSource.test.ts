import { LocationSessionStatus, type DeviceLocation } from "../types";
import { LocationDataSourceError } from "../domain/errors";
import {
  GeolocationDataSource,
  toDataSourceError,
  toDeviceLocation,
} from "../services/geolocationDataSource";
import { WATCH_POSITION_OPTIONS } from "../utils/constants";
import { positionError, testPosition } from "./helpers/geolocation";

const WATCH_ID = 42;

function createGeolocation() {
  let onPosition: PositionCallback | null = null;
  let onError: PositionErrorCallback | null = null;
  const geolocation = {
    getCurrentPosition: jest.fn(),
    watchPosition: jest.fn(
      (success: PositionCallback, error?: PositionErrorCallback | null) => {
        onPosition = success;
        onError = error ?? null;
        return WATCH_ID;
      },
    ),
    clearWatch: jest.fn(),
  };
  return {
    geolocation,
    emitPosition: (position: GeolocationPosition) => onPosition?.(position),
    emitError: (error: GeolocationPositionError) => onError?.(error),
  };
}

describe("toDeviceLocation", () => {
  it("copies coordinates and optional readings", () => {
    expect(
      toDeviceLocation(
        testPosition({ latitude: 10, longitude: 20, heading: 45, speed: 3 }),
      ),
    ).toEqual({
      lat: 10,
      lon: 20,
      accuracy: 8,
      heading: 45,
      speed: 3,
      timestamp: 1_700_000_000_000,
    });
  });

  it("drops readings that are not numbers", () => {
    const location = toDeviceLocation(
      testPosition({
        accuracy: Number.NaN,
        heading: Number.NaN,
        speed: Number.NaN,
      }),
    );

    expect(location.accuracy).toBeNull();
    expect(location.heading).toBeNull();
    expect(location.speed).toBeNull();
  });
});

describe("toDataSourceError", () => {
  it("maps position error codes", () => {
    expect(toDataSourceError(positionError(1, "User denied"))).toMatchObject({
      type: "PermissionDenied",
      message: "User denied",
    });
    expect(toDataSourceError(positionError(2))).toMatchObject({
      type: "Unavailable",
      message: "Location services disabled",
    });
    expect(toDataSourceError(positionError(3))).toMatchObject({
      type: "Timeout",
      message: "Timed out waiting for a location fix",
    });
    expect(toDataSourceError(positionError(99))).toMatchObject({
      type: "Unknown",
      message: "Failed to start location updates",
    });
  });
});

describe("GeolocationDataSource", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("starts watching and resolves with the first fix", async () => {
    const { geolocation, emitPosition } = createGeolocation();
    const dataSource = new GeolocationDataSource(geolocation);
    const statuses: LocationSessionStatus[] = [];
    const locations: DeviceLocation[] = [];
    dataSource.onStatusChanged((status) => statuses.push(status));
    dataSource.onLocationChanged((location) => locations.push(location));

    const started = dataSource.start();
    expect(dataSource.getStatus()).toBe(LocationSessionStatus.Starting);
    expect(geolocation.watchPosition).toHaveBeenCalledWith(
      expect.any(Function),
      expect.any(Function),
      WATCH_POSITION_OPTIONS,
    );

    emitPosition(testPosition({ latitude: 1, longitude: 2 }));
    await started;

    expect(statuses).toEqual([
      LocationSessionStatus.Starting,
      LocationSessionStatus.Started,
    ]);
    expect(locations).toHaveLength(1);
    expect(locations[0].lat).toBe(1);
    expect(locations[0].lon).toBe(2);
  });

  it("shares one watch between overlapping starts", async () => {
    const { geolocation, emitPosition } = createGeolocation();
    const dataSource = new GeolocationDataSource(geolocation);

    const first = dataSource.start();
    const second = dataSource.start();
    emitPosition(testPosition());
    await Promise.all([first, second]);
    await dataSource.start();

    expect(second).toBe(first);
    expect(geolocation.watchPosition).toHaveBeenCalledTimes(1);
  });

  it("fails to start on the first error", async () => {
    const { geolocation, emitError } = createGeolocation();
    const dataSource = new GeolocationDataSource(geolocation);

    const started = dataSource.start();
    emitError(positionError(1, "User denied Geolocation"));

    await expect(started).rejects.toBeInstanceOf(LocationDataSourceError);
    await expect(started).rejects.toMatchObject({
      type: "PermissionDenied",
      message: "User denied Geolocation",
    });
    expect(dataSource.getStatus()).toBe(LocationSessionStatus.FailedToStart);
    expect(geolocation.clearWatch).toHaveBeenCalledWith(WATCH_ID);
  });

  it("fails to start when geolocation is missing", async () => {
    const dataSource = new GeolocationDataSource();

    await expect(dataSource.start()).rejects.toMatchObject({
      type: "Unavailable",
      message: "Location services are not available on this device",
    });
    expect(dataSource.getStatus()).toBe(LocationSessionStatus.FailedToStart);
  });

  it("cancels a pending start when stopped", async () => {
    const { geolocation } = createGeolocation();
    const dataSource = new GeolocationDataSource(geolocation);

    const started = dataSource.start();
    await dataSource.stop();

    await expect(started).rejects.toMatchObject({ type: "Cancelled" });
    expect(geolocation.clearWatch).toHaveBeenCalledWith(WATCH_ID);
    expect(dataSource.getStatus()).toBe(LocationSessionStatus.Stopped);
  });

  it("keeps watching through transient errors", async () => {
    const { geolocation, emitPosition, emitError } = createGeolocation();
    const dataSource = new GeolocationDataSource(geolocation);
    const started = dataSource.start();
    emitPosition(testPosition());
    await started;

    emitError(positionError(3));

    expect(dataSource.getStatus()).toBe(LocationSessionStatus.Started);
    expect(geolocation.clearWatch).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith("Location update failed:", "");
  });

  it("stops when access is revoked while running", async () => {
    const { geolocation, emitPosition, emitError } = createGeolocation();
    const dataSource = new GeolocationDataSource(geolocation);
    const started = dataSource.start();
    emitPosition(testPosition());
    await started;

    emitError(positionError(1, "Revoked"));

    expect(dataSource.getStatus()).toBe(LocationSessionStatus.Stopped);
    expect(geolocation.clearWatch).toHaveBeenCalledWith(WATCH_ID);
  });

  it("stops delivering locations after stop", async () => {
    const { geolocation, emitPosition } = createGeolocation();
    const dataSource = new GeolocationDataSource(geolocation);
    const listener = jest.fn();
    dataSource.onLocationChanged(listener);
    const started = dataSource.start();
    emitPosition(testPosition());
    await started;

    await dataSource.stop();
    emitPosition(testPosition());

    expect(listener).toHaveBeenCalledTimes(1);
    expect(dataSource.getStatus()).toBe(LocationSessionStatus.Stopped);
  });
});
