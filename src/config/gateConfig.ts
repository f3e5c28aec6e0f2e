import { AutoPanMode, ResumePolicy } from "../types";
import {
  DEFAULT_AUTO_PAN_MODE,
  DEFAULT_RESUME_POLICY,
  DEFAULT_SETTINGS_HELP_URL,
  ROOT_DATASET_KEYS,
} from "../utils/constants";

export interface LocationGateConfig {
  /** When a resume re-checks a permission that is not granted. */
  resumePolicy: ResumePolicy;
  initialAutoPanMode: AutoPanMode;
  settingsHelpUrl: string;
}

export const defaultLocationGateConfig: LocationGateConfig = {
  resumePolicy: DEFAULT_RESUME_POLICY,
  initialAutoPanMode: DEFAULT_AUTO_PAN_MODE,
  settingsHelpUrl: DEFAULT_SETTINGS_HELP_URL,
};

const RESUME_POLICIES: readonly string[] = Object.values(ResumePolicy);
const AUTO_PAN_MODES: readonly string[] = Object.values(AutoPanMode);

function isResumePolicy(value: string): value is ResumePolicy {
  return RESUME_POLICIES.includes(value);
}

function isAutoPanMode(value: string): value is AutoPanMode {
  return AUTO_PAN_MODES.includes(value);
}

export function parseResumePolicy(
  value: string | undefined,
): ResumePolicy | null {
  const trimmed = value?.trim();
  return trimmed && isResumePolicy(trimmed) ? trimmed : null;
}

export function parseAutoPanMode(value: string | undefined): AutoPanMode | null {
  const trimmed = value?.trim();
  return trimmed && isAutoPanMode(trimmed) ? trimmed : null;
}

function parseHttpUrl(value: string | undefined): string | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;
  try {
    const url = new URL(trimmed);
    return url.protocol === "https:" || url.protocol === "http:"
      ? url.toString()
      : null;
  } catch {
    return null;
  }
}

/**
 * Builds the config from `data-*` attributes of the root element.
 * Invalid values are reported and replaced by the defaults.
 */
export function resolveLocationGateConfig(
  dataset: Partial<Record<string, string>>,
): LocationGateConfig {
  const rawPolicy = dataset[ROOT_DATASET_KEYS.RESUME_POLICY];
  const rawPanMode = dataset[ROOT_DATASET_KEYS.AUTO_PAN_MODE];
  const rawHelpUrl = dataset[ROOT_DATASET_KEYS.SETTINGS_HELP_URL];

  const resumePolicy = parseResumePolicy(rawPolicy);
  if (rawPolicy !== undefined && !resumePolicy) {
    console.warn("Ignoring invalid resume policy:", rawPolicy);
  }
  const initialAutoPanMode = parseAutoPanMode(rawPanMode);
  if (rawPanMode !== undefined && !initialAutoPanMode) {
    console.warn("Ignoring invalid auto-pan mode:", rawPanMode);
  }
  const settingsHelpUrl = parseHttpUrl(rawHelpUrl);
  if (rawHelpUrl !== undefined && !settingsHelpUrl) {
    console.warn("Ignoring invalid settings help URL:", rawHelpUrl);
  }

  return {
    resumePolicy: resumePolicy ?? defaultLocationGateConfig.resumePolicy,
    initialAutoPanMode:
      initialAutoPanMode ?? defaultLocationGateConfig.initialAutoPanMode,
    settingsHelpUrl: settingsHelpUrl ?? defaultLocationGateConfig.settingsHelpUrl,
  };
}
