import { assign, fromCallback, fromPromise, setup, type EventObject } from "xstate";
import {
  LifecycleState,
  PermissionState,
  ResumePolicy,
} from "../../types";
import type { LifecycleNotifier } from "../lifecycle";
import {
  normalizePermissionStatus,
  type PermissionProvider,
} from "./permissionProvider";

export interface PermissionMachineInput {
  permissions: PermissionProvider;
  lifecycle: LifecycleNotifier;
  resumePolicy: ResumePolicy;
}

export interface PermissionMachineContext {
  permissions: PermissionProvider;
  lifecycle: LifecycleNotifier;
  resumePolicy: ResumePolicy;
  permission: PermissionState;
  lifecycleState: LifecycleState;
  /** Set when the user was sent to settings; cleared by the next resume. */
  settingsOpened: boolean;
  settingsOpenFailed: boolean;
  /** The app came back to the foreground before the settings call settled. */
  resumedWhileOpeningSettings: boolean;
}

export type PermissionMachineEvent =
  | { type: "LIFECYCLE_CHANGED"; state: LifecycleState }
  | { type: "QUERY_PERMISSION" }
  | { type: "REQUEST_PERMISSION" }
  | { type: "OPEN_SETTINGS" };

export function shouldRequeryOnResume(
  context: Pick<
    PermissionMachineContext,
    "permission" | "resumePolicy" | "settingsOpened"
  >,
  state: LifecycleState,
): boolean {
  if (state !== LifecycleState.Resumed) return false;
  if (context.permission === PermissionState.Granted) return false;
  switch (context.resumePolicy) {
    case ResumePolicy.Always:
      return true;
    case ResumePolicy.AfterSettingsTrip:
      return context.settingsOpened;
    default:
      return false;
  }
}

const queryPermissionActor = fromPromise<
  PermissionState,
  { permissions: PermissionProvider }
>(async ({ input }) =>
  normalizePermissionStatus(await input.permissions.status()),
);

const requestPermissionActor = fromPromise<
  PermissionState,
  { permissions: PermissionProvider }
>(async ({ input }) =>
  normalizePermissionStatus(await input.permissions.request()),
);

const openSettingsActor = fromPromise<
  boolean,
  { permissions: PermissionProvider }
>(({ input }) => input.permissions.openSystemSettings());

const lifecycleListenerActor = fromCallback<
  EventObject,
  { lifecycle: LifecycleNotifier }
>(({ sendBack, input }) =>
  input.lifecycle.subscribe((state) => {
    sendBack({ type: "LIFECYCLE_CHANGED", state });
  }),
);

export const permissionMachine = setup({
  types: {
    context: {} as PermissionMachineContext,
    events: {} as PermissionMachineEvent,
    input: {} as PermissionMachineInput,
  },
  actors: {
    queryPermission: queryPermissionActor,
    requestPermission: requestPermissionActor,
    openSettings: openSettingsActor,
    lifecycleListener: lifecycleListenerActor,
  },
  guards: {
    shouldRequery: ({ context, event }) =>
      event.type === "LIFECYCLE_CHANGED" &&
      shouldRequeryOnResume(context, event.state),
    canRequest: ({ context }) => context.permission === PermissionState.Denied,
    canOpenSettings: ({ context }) =>
      context.permission === PermissionState.PermanentlyDenied,
  },
  actions: {
    recordLifecycle: assign(
      (args: {
        context: PermissionMachineContext;
        event: PermissionMachineEvent;
      }) => {
        const { context, event } = args;
        if (event.type !== "LIFECYCLE_CHANGED") {
          return {};
        }
        return {
          lifecycleState: event.state,
          settingsOpened:
            event.state === LifecycleState.Resumed
              ? false
              : context.settingsOpened,
        };
      },
    ),
    noteResumeWhileOpeningSettings: assign(
      (args: {
        context: PermissionMachineContext;
        event: PermissionMachineEvent;
      }) => {
        const { context, event } = args;
        if (event.type !== "LIFECYCLE_CHANGED") {
          return {};
        }
        return {
          resumedWhileOpeningSettings:
            context.resumedWhileOpeningSettings ||
            (event.state === LifecycleState.Resumed &&
              context.lifecycleState !== LifecycleState.Resumed),
        };
      },
    ),
  },
}).createMachine({
  id: "locationPermission",
  context: ({ input }) => ({
    permissions: input.permissions,
    lifecycle: input.lifecycle,
    resumePolicy: input.resumePolicy,
    permission: PermissionState.Denied,
    lifecycleState: input.lifecycle.getState(),
    settingsOpened: false,
    settingsOpenFailed: false,
    resumedWhileOpeningSettings: false,
  }),
  invoke: {
    id: "lifecycleListener",
    src: "lifecycleListener",
    input: ({ context }) => ({ lifecycle: context.lifecycle }),
  },
  on: {
    LIFECYCLE_CHANGED: {
      actions: "recordLifecycle",
    },
  },
  initial: "initializing",
  states: {
    initializing: {
      invoke: {
        src: "queryPermission",
        input: ({ context }) => ({ permissions: context.permissions }),
        onDone: {
          target: "idle",
          actions: assign({ permission: ({ event }) => event.output }),
        },
        onError: {
          target: "idle",
          actions: ({ event }) => {
            console.warn("Location permission check failed:", event.error);
          },
        },
      },
    },
    idle: {
      on: {
        LIFECYCLE_CHANGED: {
          guard: "shouldRequery",
          target: "querying",
          actions: "recordLifecycle",
        },
        QUERY_PERMISSION: {
          target: "querying",
        },
        REQUEST_PERMISSION: {
          guard: "canRequest",
          target: "requesting",
        },
        OPEN_SETTINGS: {
          guard: "canOpenSettings",
          target: "openingSettings",
        },
      },
    },
    querying: {
      invoke: {
        src: "queryPermission",
        input: ({ context }) => ({ permissions: context.permissions }),
        onDone: {
          target: "idle",
          actions: assign({ permission: ({ event }) => event.output }),
        },
        onError: {
          target: "idle",
          actions: ({ event }) => {
            console.warn("Location permission check failed:", event.error);
          },
        },
      },
    },
    requesting: {
      invoke: {
        src: "requestPermission",
        input: ({ context }) => ({ permissions: context.permissions }),
        onDone: {
          target: "idle",
          actions: assign({ permission: ({ event }) => event.output }),
        },
        onError: {
          target: "idle",
          actions: ({ event }) => {
            console.warn("Location permission request failed:", event.error);
          },
        },
      },
    },
    openingSettings: {
      entry: assign({
        settingsOpenFailed: false,
        resumedWhileOpeningSettings: false,
      }),
      on: {
        LIFECYCLE_CHANGED: {
          actions: ["noteResumeWhileOpeningSettings", "recordLifecycle"],
        },
      },
      invoke: {
        src: "openSettings",
        input: ({ context }) => ({ permissions: context.permissions }),
        onDone: [
          {
            // The resume already happened; run the check it would have run.
            guard: ({ context, event }) =>
              context.resumedWhileOpeningSettings &&
              (event.output || context.resumePolicy === ResumePolicy.Always),
            target: "querying",
            actions: assign(({ event }) => ({
              settingsOpened: false,
              settingsOpenFailed: !event.output,
              resumedWhileOpeningSettings: false,
            })),
          },
          {
            target: "idle",
            actions: assign(({ event }) => ({
              settingsOpened: event.output,
              settingsOpenFailed: !event.output,
            })),
          },
        ],
        onError: {
          target: "idle",
          actions: [
            assign({ settingsOpened: false, settingsOpenFailed: true }),
            ({ event }) => {
              console.warn("Opening settings failed:", event.error);
            },
          ],
        },
      },
    },
  },
});
