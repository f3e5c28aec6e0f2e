export type {
  LocationDataSource,
  LocationListener,
  LocationStatusListener,
} from "./locationDataSource";
export {
  createLocationDisplay,
  type LocationDisplay,
  type LocationDisplaySnapshot,
} from "./locationDisplay";
export {
  createLocationSession,
  type AttachOptions,
  type LocationSession,
} from "./locationSession";
