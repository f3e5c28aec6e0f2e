import { AutoPanMode, ResumePolicy } from "../types";

export const DEFAULT_RESUME_POLICY: ResumePolicy = ResumePolicy.AfterSettingsTrip;
export const DEFAULT_AUTO_PAN_MODE: AutoPanMode = AutoPanMode.Recenter;

// Browsers cannot open their site settings from script, so the
// "open settings" action points at instructions instead.
export const DEFAULT_SETTINGS_HELP_URL =
  "https://support.google.com/chrome/answer/142065";

// Continuous updates for a map: precise fixes, never older than 5 seconds.
export const WATCH_POSITION_OPTIONS: PositionOptions = {
  enableHighAccuracy: true,
  timeout: 15000,
  maximumAge: 5000,
};

// Only used to trigger the permission prompt; any cached fix will do.
export const PERMISSION_PROMPT_OPTIONS: PositionOptions = {
  enableHighAccuracy: false,
  timeout: 10000,
  maximumAge: 300000,
};

export const ROOT_DATASET_KEYS = {
  RESUME_POLICY: "resumePolicy",
  AUTO_PAN_MODE: "autoPanMode",
  SETTINGS_HELP_URL: "settingsHelpUrl",
} as const;
