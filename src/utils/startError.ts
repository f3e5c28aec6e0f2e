import { LocationDataSourceError, type StartError } from "../domain/errors";

const DEFAULT_START_ERROR_MESSAGE = "Failed to start location updates";

export function toStartError(error: unknown): StartError {
  if (error instanceof LocationDataSourceError) {
    return { type: error.type, message: error.message };
  }
  if (error instanceof Error) {
    return {
      type: "Unknown",
      message: error.message || DEFAULT_START_ERROR_MESSAGE,
    };
  }
  if (typeof error === "string" && error) {
    return { type: "Unknown", message: error };
  }
  return { type: "Unknown", message: DEFAULT_START_ERROR_MESSAGE };
}

export function formatStartError(error: StartError): string {
  switch (error.type) {
    case "PermissionDenied":
      return "Location permission denied";
    case "Unavailable":
      return "Location unavailable";
    case "Timeout":
      return "Location request timed out";
    case "Cancelled":
      return "Location start cancelled";
    case "Unknown":
      return "Couldn't start location";
    default:
      return "Couldn't start location";
  }
}
