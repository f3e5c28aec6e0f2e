import { LifecycleState } from "../types";
import type {
  LifecycleListener,
  LifecycleNotifier,
} from "../domain/lifecycle";

/**
 * Page lifecycle mapped onto foreground/background states:
 * focused and visible → resumed, visible without focus → inactive,
 * hidden → hidden, frozen or kept in the back/forward cache → paused,
 * unloaded → detached.
 */
export class BrowserLifecycleNotifier implements LifecycleNotifier {
  private readonly doc: Document | undefined;
  private state: LifecycleState;
  private listeners = new Set<LifecycleListener>();
  private started = false;

  constructor(doc?: Document) {
    this.doc = doc ?? (typeof document !== "undefined" ? document : undefined);
    this.state = this.readState();
  }

  getState(): LifecycleState {
    return this.state;
  }

  subscribe(listener: LifecycleListener): () => void {
    this.listeners.add(listener);
    this.start();
    return () => {
      this.listeners.delete(listener);
      if (this.listeners.size === 0) {
        this.stop();
      }
    };
  }

  private readState(): LifecycleState {
    const doc = this.doc;
    if (!doc) return LifecycleState.Resumed;
    if (doc.visibilityState === "hidden") return LifecycleState.Hidden;
    return doc.hasFocus() ? LifecycleState.Resumed : LifecycleState.Inactive;
  }

  private start() {
    if (this.started || !this.doc) return;
    this.started = true;
    this.state = this.readState();
    const win = this.doc.defaultView;
    this.doc.addEventListener("visibilitychange", this.handleVisibilityChange);
    this.doc.addEventListener("freeze", this.handleFreeze);
    this.doc.addEventListener("resume", this.handleResume);
    win?.addEventListener("focus", this.handleFocus);
    win?.addEventListener("blur", this.handleBlur);
    win?.addEventListener("pagehide", this.handlePageHide);
    win?.addEventListener("pageshow", this.handlePageShow);
  }

  private stop() {
    if (!this.started || !this.doc) return;
    this.started = false;
    const win = this.doc.defaultView;
    this.doc.removeEventListener(
      "visibilitychange",
      this.handleVisibilityChange,
    );
    this.doc.removeEventListener("freeze", this.handleFreeze);
    this.doc.removeEventListener("resume", this.handleResume);
    win?.removeEventListener("focus", this.handleFocus);
    win?.removeEventListener("blur", this.handleBlur);
    win?.removeEventListener("pagehide", this.handlePageHide);
    win?.removeEventListener("pageshow", this.handlePageShow);
  }

  private setState(state: LifecycleState) {
    if (this.state === state) return;
    this.state = state;
    this.listeners.forEach((listener) => listener(state));
  }

  private isVisible(): boolean {
    return this.doc?.visibilityState !== "hidden";
  }

  private handleVisibilityChange = () => {
    this.setState(this.readState());
  };

  private handleFocus = () => {
    if (this.isVisible()) this.setState(LifecycleState.Resumed);
  };

  private handleBlur = () => {
    if (this.isVisible()) this.setState(LifecycleState.Inactive);
  };

  private handleFreeze = () => {
    this.setState(LifecycleState.Paused);
  };

  // Fired when a frozen page is thawed; visibilitychange follows if it is shown.
  private handleResume = () => {
    this.setState(LifecycleState.Hidden);
  };

  private handlePageHide = (event: PageTransitionEvent) => {
    this.setState(event.persisted ? LifecycleState.Paused : LifecycleState.Detached);
  };

  private handlePageShow = () => {
    this.setState(this.readState());
  };
}

export const appLifecycle = new BrowserLifecycleNotifier();
