export { OpenSettingsPanel } from "./OpenSettingsPanel";
export { RequestLocationPanel } from "./RequestLocationPanel";
