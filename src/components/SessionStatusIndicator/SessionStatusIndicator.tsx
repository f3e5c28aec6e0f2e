import { AlertCircle, Loader2, LocateFixed, LocateOff } from "lucide-react";
import { LocationSessionStatus } from "../../types";

interface SessionStatusIndicatorProps {
  status: LocationSessionStatus;
}

export function getSessionStatusLabel(status: LocationSessionStatus): string {
  switch (status) {
    case LocationSessionStatus.Started:
      return "Showing location";
    case LocationSessionStatus.Starting:
      return "Starting location...";
    case LocationSessionStatus.FailedToStart:
      return "Location unavailable";
    case LocationSessionStatus.Stopped:
      return "Location off";
    default:
      return "";
  }
}

function StatusIcon({ status }: SessionStatusIndicatorProps) {
  switch (status) {
    case LocationSessionStatus.Started:
      return <LocateFixed aria-hidden="true" />;
    case LocationSessionStatus.Starting:
      return <Loader2 className="spin" aria-hidden="true" />;
    case LocationSessionStatus.FailedToStart:
      return <AlertCircle aria-hidden="true" />;
    default:
      return <LocateOff aria-hidden="true" />;
  }
}

export function SessionStatusIndicator({ status }: SessionStatusIndicatorProps) {
  return (
    <span
      className={`session-status session-status--${status}`}
      role="status"
      aria-live="polite"
    >
      <StatusIcon status={status} />
      {getSessionStatusLabel(status)}
    </span>
  );
}
