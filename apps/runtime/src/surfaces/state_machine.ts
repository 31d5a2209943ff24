/**
 * Surface lifecycle state machine.
 *
 * Governs every valid transition of a single surface instance and rejects
 * invalid ones with a descriptive error. The machine is pure: the
 * supervisor performs the side effects.
 *
 * A crashed instance stays `terminated` (a tombstone) until its replacement
 * reaches `ready`, then it is `retire`d. Replacements are new instances with
 * their own SurfaceId and their own machine.
 */

// ---------------------------------------------------------------------------
// States and events
// ---------------------------------------------------------------------------

export type SurfaceState =
  | "requested"
  | "starting"
  | "ready"
  | "terminated"
  | "closing"
  | "closed";

export type SurfaceEvent =
  | "launch"
  | "handshake_ok"
  | "launch_failed"
  | "give_up"
  | "crash"
  | "retire"
  | "close_request"
  | "close_complete";

/** Diagnostic record of a single state transition. */
export interface SurfaceTransitionRecord {
  from: SurfaceState;
  to: SurfaceState;
  event: SurfaceEvent;
  timestamp: number;
}

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class InvalidSurfaceTransitionError extends Error {
  constructor(
    public readonly surfaceId: string,
    public readonly currentState: SurfaceState,
    public readonly event: SurfaceEvent,
  ) {
    super(
      `Invalid surface transition: cannot apply event "${event}" in state "${currentState}" (surfaceId=${surfaceId})`,
    );
    this.name = "InvalidSurfaceTransitionError";
  }
}

// ---------------------------------------------------------------------------
// Transition table
// ---------------------------------------------------------------------------

type TransitionTable = Readonly<
  Record<SurfaceState, Partial<Record<SurfaceEvent, SurfaceState>>>
>;

const TRANSITIONS: TransitionTable = {
  requested: {
    launch: "starting",
    give_up: "closed",
    close_request: "closing",
  },
  starting: {
    handshake_ok: "ready",
    launch_failed: "requested",
    give_up: "closed",
    close_request: "closing",
  },
  ready: {
    crash: "terminated",
    close_request: "closing",
  },
  terminated: {
    retire: "closed",
    give_up: "closed",
  },
  closing: {
    close_complete: "closed",
  },
  closed: {},
};

/** States in which an instance counts towards its role's live set. */
export const LIVE_STATES: ReadonlySet<SurfaceState> = new Set([
  "requested",
  "starting",
  "ready",
]);

const MAX_HISTORY = 10;

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

export class SurfaceStateMachine {
  private _state: SurfaceState = "requested";
  private readonly _history: SurfaceTransitionRecord[] = [];

  constructor(public readonly surfaceId: string) {}

  get state(): SurfaceState {
    return this._state;
  }

  /** Rolling history of the last transitions (max 10). */
  get history(): readonly SurfaceTransitionRecord[] {
    return this._history;
  }

  get isLive(): boolean {
    return LIVE_STATES.has(this._state);
  }

  can(event: SurfaceEvent): boolean {
    return TRANSITIONS[this._state][event] !== undefined;
  }

  /**
   * Apply `event`.
   *
   * @returns The new state.
   * @throws {InvalidSurfaceTransitionError} if the transition is not allowed.
   */
  apply(event: SurfaceEvent): SurfaceState {
    const next = TRANSITIONS[this._state][event];
    if (next === undefined) {
      throw new InvalidSurfaceTransitionError(this.surfaceId, this._state, event);
    }

    this._history.push({ from: this._state, to: next, event, timestamp: Date.now() });
    if (this._history.length > MAX_HISTORY) {
      this._history.shift();
    }

    this._state = next;
    return next;
  }
}

/** Pure transition function; `undefined` when the event is not allowed. */
export function nextSurfaceState(
  current: SurfaceState,
  event: SurfaceEvent,
): SurfaceState | undefined {
  return TRANSITIONS[current][event];
}
