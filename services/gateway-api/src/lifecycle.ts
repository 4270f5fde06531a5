/**
 * Per-request lifecycle.
 *
 * Received → Validating → AwaitingCredential → Invoking → Completed
 * Any non-terminal state may move to Failed. Transitions only go forward
 * and terminal states accept none.
 */

import type { Logger } from "@speech-gateway/logging";
import { ErrorCodes, InternalError } from "@speech-gateway/shared-types";

export type RequestState =
  | "received"
  | "validating"
  | "awaiting_credential"
  | "invoking"
  | "completed"
  | "failed";

const ORDER: Readonly<Record<RequestState, number>> = {
  received: 0,
  validating: 1,
  awaiting_credential: 2,
  invoking: 3,
  completed: 4,
  failed: 4,
};

const NEXT: Readonly<Record<RequestState, RequestState | undefined>> = {
  received: "validating",
  validating: "awaiting_credential",
  awaiting_credential: "invoking",
  invoking: "completed",
  completed: undefined,
  failed: undefined,
};

export function isTerminal(state: RequestState): boolean {
  return state === "completed" || state === "failed";
}

export class RequestLifecycle {
  private current: RequestState = "received";
  private readonly startedAt: number;
  private readonly log: Logger;
  private readonly history: RequestState[] = ["received"];

  constructor(logger: Logger, now: number = Date.now()) {
    this.log = logger;
    this.startedAt = now;
  }

  get state(): RequestState {
    return this.current;
  }

  /** States visited so far, in order. */
  get visited(): readonly RequestState[] {
    return this.history;
  }

  get elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  /** Advance to `next`. Throws InternalError on an illegal transition. */
  transition(next: RequestState): void {
    const from = this.current;
    const legal = next === "failed" ? !isTerminal(from) : NEXT[from] === next;

    if (!legal || ORDER[next] < ORDER[from]) {
      throw new InternalError(ErrorCodes.INTERNAL_ERROR, "An unexpected error occurred.", {
        detail: `Illegal request state transition ${from} -> ${next}`,
      });
    }

    this.current = next;
    this.history.push(next);
    this.log.debug("Request state", { from, to: next, elapsedMs: this.elapsedMs });
  }
}
