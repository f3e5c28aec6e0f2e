export type { LifecycleListener, LifecycleNotifier } from "./lifecycleNotifier";
