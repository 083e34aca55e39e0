import { setup, assign, createActor, type SnapshotFrom } from "xstate";
import type { AbortReason, EngineState, RunError } from "./types.js";

type MachineContext = {
  completedIterations: number;
  abortReason: AbortReason | null;
  abortError: RunError | null;
};

export type EngineEvents =
  | { type: "START" }
  | { type: "ITERATION_DONE" }
  | { type: "FINISH" }
  | { type: "ABORT"; reason: AbortReason; error?: RunError };

export const engineMachine = setup({
  types: {
    context: {} as MachineContext,
    events: {} as EngineEvents,
  },
  actions: {
    countIteration: assign({
      completedIterations: ({ context }) => context.completedIterations + 1,
    }),
    recordAbort: assign({
      abortReason: (_, params: { reason: AbortReason; error?: RunError }) => params.reason,
      abortError: (_, params: { reason: AbortReason; error?: RunError }) => params.error ?? null,
    }),
  },
}).createMachine({
  id: "readEngine",
  initial: "Idle",
  context: {
    completedIterations: 0,
    abortReason: null,
    abortError: null,
  },
  states: {
    Idle: {
      on: {
        START: { target: "Running" },
        ABORT: {
          target: "Aborted",
          actions: [
            {
              type: "recordAbort",
              params: ({ event }) => ({ reason: event.reason, error: event.error }),
            },
          ],
        },
      },
    },
    Running: {
      on: {
        ITERATION_DONE: { actions: ["countIteration"] },
        FINISH: { target: "Completed" },
        ABORT: {
          target: "Aborted",
          actions: [
            {
              type: "recordAbort",
              params: ({ event }) => ({ reason: event.reason, error: event.error }),
            },
          ],
        },
      },
    },
    Completed: {
      type: "final",
    },
    Aborted: {
      type: "final",
    },
  },
});

export type EngineSnapshot = SnapshotFrom<typeof engineMachine>;

export function createEngineActor() {
  const actor = createActor(engineMachine);
  actor.start();
  return actor;
}

export function snapshotState(snapshot: EngineSnapshot): EngineState {
  return snapshot.value;
}

const VALID_EVENTS: Record<EngineState, EngineEvents["type"][]> = {
  Idle: ["START", "ABORT"],
  Running: ["ITERATION_DONE", "FINISH", "ABORT"],
  Completed: [],
  Aborted: [],
};

export function canTransition(state: EngineState, eventType: EngineEvents["type"]): boolean {
  return VALID_EVENTS[state].includes(eventType);
}
