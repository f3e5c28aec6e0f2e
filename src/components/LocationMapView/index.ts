export { LocationMapView } from "./LocationMapView";
