/**
 * Run State Machine
 *
 * INIT → LOGGING_IN → NAVIGATING → FETCHING_CURRENT → [FETCHING_PRIOR]
 *      → CLOSING → DONE
 * ABORTED can be entered from any state that is not terminal.
 */
import { RunState } from "../shared/types/run.types";
import { logger } from "../monitoring/logger";

const TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  INIT: ["LOGGING_IN", "ABORTED"],
  LOGGING_IN: ["NAVIGATING", "ABORTED"],
  NAVIGATING: ["FETCHING_CURRENT", "ABORTED"],
  FETCHING_CURRENT: ["FETCHING_PRIOR", "CLOSING", "ABORTED"],
  FETCHING_PRIOR: ["CLOSING", "ABORTED"],
  CLOSING: ["DONE", "ABORTED"],
  DONE: [],
  ABORTED: [],
};

export class IllegalTransitionError extends Error {
  constructor(from: RunState, to: RunState) {
    super(`Illegal run state transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export function canTransition(from: RunState, to: RunState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class RunStateMachine {
  private current: RunState = "INIT";
  private readonly entered: RunState[] = ["INIT"];

  get state(): RunState {
    return this.current;
  }

  /** Every state entered so far, INIT first */
  get history(): RunState[] {
    return [...this.entered];
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  /** @throws IllegalTransitionError */
  transition(next: RunState): void {
    if (!canTransition(this.current, next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    logger.debug({ from: this.current, to: next }, "Run state changed");
    this.current = next;
    this.entered.push(next);
  }
}
