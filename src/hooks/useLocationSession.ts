import { useCallback } from "react";
import { useMachine } from "@xstate/react";
import { assign, fromCallback, setup, type EventObject } from "xstate";
import { LocationSessionStatus, type AutoPanMode } from "../types";
import type { StartError } from "../domain/errors";
import {
  createLocationSession,
  type LocationDataSource,
  type LocationDisplay,
} from "../domain/location";

export type LocationSessionEvent =
  | { type: "STATUS_CHANGED"; status: LocationSessionStatus }
  | { type: "START_FINISHED"; error: StartError | null }
  | { type: "SESSION_TOGGLED"; enabled: boolean }
  | { type: "SET_AUTO_PAN_MODE"; mode: AutoPanMode }
  | { type: "START_ERROR_DISMISSED" };

export interface LocationSessionInput {
  display: LocationDisplay;
  dataSource: LocationDataSource;
  autoPanMode: AutoPanMode;
}

interface LocationSessionContext {
  display: LocationDisplay;
  dataSource: LocationDataSource;
  autoPanMode: AutoPanMode;
  status: LocationSessionStatus;
  /** The start attempt finished (or the user switched the session off). */
  ready: boolean;
  /** Failure of the latest start, shown once until dismissed. */
  startError: StartError | null;
}

const locationSessionActor = fromCallback<
  EventObject,
  LocationSessionInput
>(({ sendBack, input }) => {
  const session = createLocationSession();
  let disposed = false;

  const unsubscribe = session.onStatusChanged((status) => {
    if (!disposed) {
      sendBack({ type: "STATUS_CHANGED", status });
    }
  });

  void session
    .attachAndStart(input.display, input.dataSource, {
      autoPanMode: input.autoPanMode,
    })
    .then((result) => {
      if (disposed) return;
      sendBack({
        type: "START_FINISHED",
        error: result.ok ? null : result.error,
      });
    });

  return () => {
    disposed = true;
    unsubscribe();
    void session.stop();
  };
});

export const locationSessionMachine = setup({
  types: {
    context: {} as LocationSessionContext,
    events: {} as LocationSessionEvent,
    input: {} as LocationSessionInput,
  },
  actors: {
    locationSession: locationSessionActor,
  },
}).createMachine({
  id: "locationSession",
  context: ({ input }) => ({
    display: input.display,
    dataSource: input.dataSource,
    autoPanMode: input.autoPanMode,
    status: input.dataSource.getStatus(),
    ready: false,
    startError: null,
  }),
  on: {
    SET_AUTO_PAN_MODE: {
      actions: [
        assign({ autoPanMode: ({ event }) => event.mode }),
        ({ context, event }) => {
          context.display.setAutoPanMode(event.mode);
        },
      ],
    },
    START_ERROR_DISMISSED: {
      actions: assign({ startError: null }),
    },
  },
  initial: "running",
  states: {
    running: {
      entry: assign({ ready: false, startError: null }),
      invoke: {
        id: "locationSession",
        src: "locationSession",
        input: ({ context }) => ({
          display: context.display,
          dataSource: context.dataSource,
          autoPanMode: context.autoPanMode,
        }),
      },
      on: {
        STATUS_CHANGED: {
          actions: assign({ status: ({ event }) => event.status }),
        },
        START_FINISHED: {
          actions: assign(({ event }) => ({
            ready: true,
            startError: event.error,
          })),
        },
        SESSION_TOGGLED: {
          guard: ({ event }) => !event.enabled,
          target: "stopped",
        },
      },
    },
    stopped: {
      entry: assign({
        ready: true,
        status: LocationSessionStatus.Stopped,
      }),
      on: {
        SESSION_TOGGLED: {
          guard: ({ event }) => event.enabled,
          target: "running",
        },
      },
    },
  },
});

export interface UseLocationSessionReturn {
  status: LocationSessionStatus;
  isReady: boolean;
  isRunning: boolean;
  startError: StartError | null;
  autoPanMode: AutoPanMode;
  setAutoPanMode: (mode: AutoPanMode) => void;
  setSessionEnabled: (enabled: boolean) => void;
  dismissStartError: () => void;
}

/**
 * Runs a location session for the lifetime of the calling component.
 * `display` and `dataSource` are read once, on mount.
 */
export function useLocationSession(
  input: LocationSessionInput,
): UseLocationSessionReturn {
  const [state, send] = useMachine(locationSessionMachine, { input });

  const setAutoPanMode = useCallback(
    (mode: AutoPanMode) => {
      send({ type: "SET_AUTO_PAN_MODE", mode });
    },
    [send],
  );

  const setSessionEnabled = useCallback(
    (enabled: boolean) => {
      send({ type: "SESSION_TOGGLED", enabled });
    },
    [send],
  );

  const dismissStartError = useCallback(() => {
    send({ type: "START_ERROR_DISMISSED" });
  }, [send]);

  return {
    status: state.context.status,
    isReady: state.context.ready,
    isRunning: state.matches("running"),
    startError: state.context.startError,
    autoPanMode: state.context.autoPanMode,
    setAutoPanMode,
    setSessionEnabled,
    dismissStartError,
  };
}
