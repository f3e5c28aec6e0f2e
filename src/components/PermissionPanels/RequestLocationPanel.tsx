import { MapPin } from "lucide-react";
import { Button } from "../Button";

interface RequestLocationPanelProps {
  isRequesting: boolean;
  isBusy: boolean;
  onRequest: () => void;
}

export function RequestLocationPanel({
  isRequesting,
  isBusy,
  onRequest,
}: RequestLocationPanelProps) {
  return (
    <section className="permission-panel" aria-label="Location access">
      <MapPin className="permission-panel__icon" aria-hidden="true" />
      <p className="permission-panel__text">
        Allow location access to see where you are on the map.
      </p>
      <Button
        variant="primary"
        onClick={onRequest}
        disabled={isBusy}
        busy={isRequesting}
      >
        {isRequesting ? "Waiting for permission..." : "Enable location"}
      </Button>
    </section>
  );
}
