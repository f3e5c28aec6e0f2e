export { LocationSettings } from "./LocationSettings";
