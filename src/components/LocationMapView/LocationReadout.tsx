import type { LocationDisplaySnapshot } from "../../domain/location";

interface LocationReadoutProps {
  snapshot: LocationDisplaySnapshot;
}

function formatCoordinate(value: number, positive: string, negative: string) {
  return `${Math.abs(value).toFixed(5)}° ${value >= 0 ? positive : negative}`;
}

export function LocationReadout({ snapshot }: LocationReadoutProps) {
  const { location } = snapshot;

  if (!location) {
    return (
      <p className="location-readout location-readout--empty">
        {snapshot.hasDataSource ? "Waiting for location..." : "No location source"}
      </p>
    );
  }

  return (
    <dl className="location-readout">
      <dt>Latitude</dt>
      <dd>{formatCoordinate(location.lat, "N", "S")}</dd>
      <dt>Longitude</dt>
      <dd>{formatCoordinate(location.lon, "E", "W")}</dd>
      {location.accuracy !== null && (
        <>
          <dt>Accuracy</dt>
          <dd>±{Math.round(location.accuracy)} m</dd>
        </>
      )}
      {location.heading !== null && (
        <>
          <dt>Heading</dt>
          <dd>{Math.round(location.heading)}°</dd>
        </>
      )}
    </dl>
  );
}
