import type { DeviceLocation, LocationSessionStatus } from "../../types";

export type LocationStatusListener = (status: LocationSessionStatus) => void;
export type LocationListener = (location: DeviceLocation) => void;

export interface LocationDataSource {
  getStatus(): LocationSessionStatus;
  /** Rejects (usually with a LocationDataSourceError) when no updates can be delivered. */
  start(): Promise<void>;
  /** Also settles a pending `start()`. */
  stop(): Promise<void>;
  onStatusChanged(listener: LocationStatusListener): () => void;
  onLocationChanged(listener: LocationListener): () => void;
}
