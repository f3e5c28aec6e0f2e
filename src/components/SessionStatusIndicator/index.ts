export {
  SessionStatusIndicator,
  getSessionStatusLabel,
} from "./SessionStatusIndicator";
