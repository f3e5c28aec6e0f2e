/**
 * Location permission provider backed by the Permissions and Geolocation APIs.
 *
 * Browsers stop prompting once a site is blocked, so a blocked permission is
 * reported as permanently denied and the user has to change it in the site
 * settings.
 */

import type { PlatformPermissionStatus } from "../types";
import type { PermissionProvider } from "../domain/permissions";
import {
  DEFAULT_SETTINGS_HELP_URL,
  PERMISSION_PROMPT_OPTIONS,
} from "../utils/constants";

const PERMISSION_DENIED = 1; // GeolocationPositionError.PERMISSION_DENIED

type BrowserPermissionState = "granted" | "denied" | "prompt";

/** The parts of `Navigator` the provider reads. */
export interface LocationNavigator {
  geolocation?: Pick<Geolocation, "getCurrentPosition">;
  permissions?: {
    query(descriptor: {
      name: "geolocation";
    }): Promise<{ state: BrowserPermissionState }>;
  };
}

export interface BrowserPermissionProviderOptions {
  navigator?: LocationNavigator;
  /** Opens a settings screen; overrides the help page, e.g. inside a native shell. */
  openSettings?: () => boolean | Promise<boolean>;
  settingsHelpUrl?: string;
}

function toPlatformStatus(
  state: BrowserPermissionState,
): PlatformPermissionStatus {
  switch (state) {
    case "granted":
      return "granted";
    case "denied":
      return "permanentlyDenied";
    case "prompt":
      return "denied";
    default:
      return "unknown";
  }
}

function isPermissionDeniedError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === PERMISSION_DENIED
  );
}

export class BrowserPermissionProvider implements PermissionProvider {
  private readonly nav: LocationNavigator | undefined;
  private readonly openSettings?: () => boolean | Promise<boolean>;
  private readonly settingsHelpUrl: string;

  constructor(options: BrowserPermissionProviderOptions = {}) {
    this.nav =
      options.navigator ??
      (typeof navigator !== "undefined" ? navigator : undefined);
    this.openSettings = options.openSettings;
    this.settingsHelpUrl = options.settingsHelpUrl ?? DEFAULT_SETTINGS_HELP_URL;
  }

  async status(): Promise<PlatformPermissionStatus> {
    if (!this.nav?.geolocation) {
      return "restricted";
    }
    const state = await this.queryState();
    return state ? toPlatformStatus(state) : "unknown";
  }

  async request(): Promise<PlatformPermissionStatus> {
    const geolocation = this.nav?.geolocation;
    if (!geolocation) {
      return "restricted";
    }

    let deniedByPrompt = false;
    try {
      await new Promise<GeolocationPosition>((resolve, reject) => {
        geolocation.getCurrentPosition(
          resolve,
          reject,
          PERMISSION_PROMPT_OPTIONS,
        );
      });
    } catch (error) {
      deniedByPrompt = isPermissionDeniedError(error);
    }

    // Dismissing the prompt and blocking the site both fail with
    // PERMISSION_DENIED; only the Permissions API tells them apart.
    const state = await this.queryState();
    if (state) {
      return toPlatformStatus(state);
    }
    return deniedByPrompt ? "denied" : "granted";
  }

  async openSystemSettings(): Promise<boolean> {
    if (this.openSettings) {
      return this.openSettings();
    }
    if (typeof window === "undefined") {
      return false;
    }
    const opened = window.open(this.settingsHelpUrl, "_blank");
    if (!opened) {
      return false;
    }
    opened.opener = null;
    return true;
  }

  private async queryState(): Promise<BrowserPermissionState | null> {
    const permissions = this.nav?.permissions;
    if (!permissions) {
      return null;
    }
    try {
      const result = await permissions.query({ name: "geolocation" });
      return result.state;
    } catch (error) {
      // Permissions API present but geolocation not queryable (older Safari)
      console.warn("Geolocation permission query failed:", error);
      return null;
    }
  }
}
