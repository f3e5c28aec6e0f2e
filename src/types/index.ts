export const PermissionState = {
  Granted: "granted",
  Denied: "denied",
  PermanentlyDenied: "permanentlyDenied",
} as const;

export type PermissionState =
  (typeof PermissionState)[keyof typeof PermissionState];

// Raw values a platform may report; anything beyond the three
// PermissionState values collapses to "denied".
export type PlatformPermissionStatus =
  | PermissionState
  | "restricted"
  | "limited"
  | "provisional"
  | "unknown";

export const LifecycleState = {
  Resumed: "resumed",
  Inactive: "inactive",
  Paused: "paused",
  Detached: "detached",
  Hidden: "hidden",
} as const;

export type LifecycleState =
  (typeof LifecycleState)[keyof typeof LifecycleState];

export const LocationSessionStatus = {
  Stopped: "stopped",
  Starting: "starting",
  Started: "started",
  FailedToStart: "failedToStart",
} as const;

export type LocationSessionStatus =
  (typeof LocationSessionStatus)[keyof typeof LocationSessionStatus];

export const AutoPanMode = {
  Off: "off",
  Recenter: "recenter",
  Navigation: "navigation",
  CompassNavigation: "compassNavigation",
} as const;

export type AutoPanMode = (typeof AutoPanMode)[keyof typeof AutoPanMode];

export const ResumePolicy = {
  AfterSettingsTrip: "afterSettingsTrip",
  Always: "always",
} as const;

export type ResumePolicy = (typeof ResumePolicy)[keyof typeof ResumePolicy];

export interface Coordinates {
  lat: number;
  lon: number;
}

export interface DeviceLocation extends Coordinates {
  accuracy: number | null; // metres
  heading: number | null; // degrees clockwise from true north
  speed: number | null; // m/s
  timestamp: number; // epoch ms
}
