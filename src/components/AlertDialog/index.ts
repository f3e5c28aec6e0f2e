export { AlertDialog } from "./AlertDialog";
