import { Settings } from "lucide-react";
import { Button } from "../Button";

interface OpenSettingsPanelProps {
  isOpeningSettings: boolean;
  isRechecking: boolean;
  settingsOpenFailed: boolean;
  onOpenSettings: () => void;
  onCheckAgain: () => void;
}

export function OpenSettingsPanel({
  isOpeningSettings,
  isRechecking,
  settingsOpenFailed,
  onOpenSettings,
  onCheckAgain,
}: OpenSettingsPanelProps) {
  const isBusy = isOpeningSettings || isRechecking;

  return (
    <section className="permission-panel" aria-label="Location access">
      <Settings className="permission-panel__icon" aria-hidden="true" />
      <p className="permission-panel__text">
        App location permission is denied. Go to settings and enable location
        to use the app.
      </p>
      <Button
        variant="primary"
        onClick={onOpenSettings}
        disabled={isBusy}
        busy={isOpeningSettings}
      >
        {isOpeningSettings ? "Opening settings..." : "Open app settings"}
      </Button>
      {settingsOpenFailed && (
        <>
          <p className="permission-panel__hint" role="status">
            Settings could not be opened. Enable location for this app
            yourself, then check again.
          </p>
          <Button onClick={onCheckAgain} disabled={isBusy} busy={isRechecking}>
            Check again
          </Button>
        </>
      )}
    </section>
  );
}
