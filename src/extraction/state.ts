/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * state.ts: Extraction state machine.
 */
import type { ExtractionState, ExtractionTransition } from "../types/index.js";
import { LOG, formatError } from "../utils/index.js";

/* Every extraction walks Pending → SessionAcquired → StreamLocated → Downloaded → Transcoded → Completed. A locate attempt that will be retried goes back from
 * SessionAcquired to Pending. A located stream that has to be located again, because it expired or the media host refused it, goes back from StreamLocated to
 * Pending. Failed is reachable from every state except the two terminal ones. Anything else is a bug in the coordinator and throws.
 */

export const TRANSITIONS: Readonly<Record<ExtractionState, readonly ExtractionState[]>> = {

  Completed: [],
  Downloaded: [ "Transcoded", "Failed" ],
  Failed: [],
  Pending: [ "SessionAcquired", "Failed" ],
  SessionAcquired: [ "StreamLocated", "Pending", "Failed" ],
  StreamLocated: [ "Downloaded", "Pending", "Failed" ],
  Transcoded: [ "Completed", "Failed" ]
};

export type TransitionListener = (transition: ExtractionTransition) => void;

export class ExtractionStateMachine {

  readonly history: ExtractionTransition[];
  private readonly extractionId: string;
  private readonly listener?: TransitionListener;
  private readonly now: () => number;
  private current: ExtractionState;

  constructor(extractionId: string, listener?: TransitionListener, now: () => number = Date.now) {

    this.current = "Pending";
    this.extractionId = extractionId;
    this.history = [];
    this.listener = listener;
    this.now = now;
  }

  get state(): ExtractionState {

    return this.current;
  }

  isTerminal(): boolean {

    return TRANSITIONS[this.current].length === 0;
  }

  /**
   * Moves to a new state.
   * @param next - The target state.
   * @param reason - Failure kind, for transitions into Failed.
   * @throws Error when the transition is not allowed.
   */
  to(next: ExtractionState, reason?: string): void {

    if(!TRANSITIONS[this.current].includes(next)) {

      throw new Error([ "Invalid extraction state transition from ", this.current, " to ", next, "." ].join(""));
    }

    const transition: ExtractionTransition = { at: this.now(), extractionId: this.extractionId, from: this.current, to: next };

    if(reason !== undefined) {

      transition.reason = reason;
    }

    this.current = next;
    this.history.push(transition);

    LOG.debug("extraction:coordinator", "%s → %s%s.", transition.from, next, reason ? [ " (", reason, ")" ].join("") : "");

    if(!this.listener) {

      return;
    }

    try {

      this.listener(transition);
    } catch(error) {

      LOG.warn("Extraction transition listener failed: %s.", formatError(error));
    }
  }

  /**
   * Records a failure, unless the extraction already reached a terminal state.
   * @param reason - The failure kind.
   */
  fail(reason: string): void {

    if(!this.isTerminal()) {

      this.to("Failed", reason);
    }
  }
}
