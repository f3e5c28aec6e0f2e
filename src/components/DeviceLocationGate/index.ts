export { DeviceLocationGate } from "./DeviceLocationGate";
