import { LocationSessionStatus, type AutoPanMode } from "../../types";
import { DEFAULT_AUTO_PAN_MODE } from "../../utils/constants";
import { toStartError } from "../../utils/startError";
import type { StartError } from "../errors";
import { err, ok, type Result } from "../result";
import type {
  LocationDataSource,
  LocationStatusListener,
} from "./locationDataSource";
import type { LocationDisplay } from "./locationDisplay";

export interface AttachOptions {
  autoPanMode?: AutoPanMode;
}

export interface LocationSession {
  /**
   * Binds `dataSource` to `display` and starts it. The session is ready once
   * the start attempt finishes, whether it succeeded or not.
   */
  attachAndStart(
    display: LocationDisplay,
    dataSource: LocationDataSource,
    options?: AttachOptions,
  ): Promise<Result<void, StartError>>;
  /** Idempotent; safe to call before, during or without a start. */
  stop(): Promise<void>;
  isReady(): boolean;
  getStatus(): LocationSessionStatus;
  onStatusChanged(listener: LocationStatusListener): () => void;
}

const START_CANCELLED: StartError = {
  type: "Cancelled",
  message: "Location session stopped before start completed",
};

interface Attachment {
  display: LocationDisplay;
  dataSource: LocationDataSource;
  unsubscribeStatus: () => void;
}

async function stopDataSource(dataSource: LocationDataSource): Promise<void> {
  try {
    await dataSource.stop();
  } catch (error) {
    console.warn("Failed to stop location data source:", error);
  }
}

export function createLocationSession(): LocationSession {
  let attachment: Attachment | null = null;
  // Bumped by every attach and stop; a start whose generation is stale
  // finished after the session moved on and must not touch its state.
  let generation = 0;
  let ready = false;
  let status: LocationSessionStatus = LocationSessionStatus.Stopped;
  const listeners = new Set<LocationStatusListener>();

  const setStatus = (next: LocationSessionStatus) => {
    if (status === next) return;
    status = next;
    listeners.forEach((listener) => listener(next));
  };

  const release = (): Attachment | null => {
    const previous = attachment;
    if (!previous) return null;
    previous.unsubscribeStatus();
    attachment = null;
    return previous;
  };

  return {
    async attachAndStart(display, dataSource, options = {}) {
      const attempt = ++generation;
      ready = false;

      const previous = release();
      if (previous && previous.dataSource !== dataSource) {
        previous.display.setDataSource(null);
        await stopDataSource(previous.dataSource);
        if (attempt !== generation) {
          return err(START_CANCELLED);
        }
      }

      display.setDataSource(dataSource);
      display.setAutoPanMode(options.autoPanMode ?? DEFAULT_AUTO_PAN_MODE);
      attachment = {
        display,
        dataSource,
        unsubscribeStatus: dataSource.onStatusChanged(setStatus),
      };
      setStatus(dataSource.getStatus());

      let result: Result<void, StartError>;
      try {
        await dataSource.start();
        result = ok(undefined);
      } catch (error) {
        console.warn("Location data source failed to start:", error);
        result = err(toStartError(error));
      }

      // Whoever invalidated this attempt already stopped the source it
      // detached; the source may now belong to a newer attachment.
      if (attempt !== generation) {
        return err(START_CANCELLED);
      }

      ready = true;
      return result;
    },

    async stop() {
      generation++;
      ready = false;
      const previous = release();
      if (!previous) return;
      previous.display.setDataSource(null);
      setStatus(LocationSessionStatus.Stopped);
      await stopDataSource(previous.dataSource);
    },

    isReady() {
      return ready;
    },

    getStatus() {
      return status;
    },

    onStatusChanged(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
