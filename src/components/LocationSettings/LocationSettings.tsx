import type { ChangeEvent } from "react";
import { AutoPanMode, type LocationSessionStatus } from "../../types";
import { SessionStatusIndicator } from "../SessionStatusIndicator";

const AUTO_PAN_MODE_LABELS: Record<AutoPanMode, string> = {
  [AutoPanMode.Off]: "Off",
  [AutoPanMode.Recenter]: "Recenter",
  [AutoPanMode.Navigation]: "Navigation",
  [AutoPanMode.CompassNavigation]: "Compass navigation",
};

const AUTO_PAN_MODES = Object.values(AutoPanMode);

function isAutoPanMode(value: string): value is AutoPanMode {
  return AUTO_PAN_MODES.some((mode) => mode === value);
}

interface LocationSettingsProps {
  autoPanMode: AutoPanMode;
  sessionEnabled: boolean;
  status: LocationSessionStatus;
  disabled: boolean;
  onAutoPanModeChange: (mode: AutoPanMode) => void;
  onSessionEnabledChange: (enabled: boolean) => void;
}

export function LocationSettings({
  autoPanMode,
  sessionEnabled,
  status,
  disabled,
  onAutoPanModeChange,
  onSessionEnabledChange,
}: LocationSettingsProps) {
  const handleModeChange = (event: ChangeEvent<HTMLSelectElement>) => {
    const { value } = event.target;
    if (isAutoPanMode(value)) {
      onAutoPanModeChange(value);
    }
  };

  const handleSessionChange = (event: ChangeEvent<HTMLInputElement>) => {
    onSessionEnabledChange(event.target.checked);
  };

  return (
    <form
      className="location-settings"
      aria-label="Location settings"
      onSubmit={(event) => event.preventDefault()}
    >
      <label className="location-settings__row">
        <span>Show device location</span>
        <input
          type="checkbox"
          role="switch"
          checked={sessionEnabled}
          disabled={disabled}
          onChange={handleSessionChange}
        />
      </label>
      <label className="location-settings__row">
        <span>Auto-pan mode</span>
        <select
          value={autoPanMode}
          disabled={disabled}
          onChange={handleModeChange}
        >
          {AUTO_PAN_MODES.map((mode) => (
            <option key={mode} value={mode}>
              {AUTO_PAN_MODE_LABELS[mode]}
            </option>
          ))}
        </select>
      </label>
      <SessionStatusIndicator status={status} />
    </form>
  );
}
