export type StartError =
  | { type: "PermissionDenied"; message: string }
  | { type: "Unavailable"; message: string }
  | { type: "Timeout"; message: string }
  | { type: "Cancelled"; message: string }
  | { type: "Unknown"; message: string };

export type StartErrorType = StartError["type"];

/**
 * Thrown by location data sources when `start()` cannot deliver updates.
 */
export class LocationDataSourceError extends Error {
  readonly type: StartErrorType;

  constructor(type: StartErrorType, message: string) {
    super(message);
    this.name = "LocationDataSourceError";
    this.type = type;
  }
}
