import type { LifecycleState } from "../../types";

export type LifecycleListener = (state: LifecycleState) => void;

export interface LifecycleNotifier {
  getState(): LifecycleState;
  /** Returns the function that removes the listener again. */
  subscribe(listener: LifecycleListener): () => void;
}
