import { AlreadyRunningError, SessionEndedError } from '../types/error.js';
import { isTerminalPhase, type SessionPhase, type SessionState } from '../types/session.js';

export type PhaseListener = (phase: SessionPhase) => void;

/**
 * Control surface shared by the caller and the execution loop. Every
 * operation runs to completion before another can observe the state, so a
 * read-modify-write of the phase never interleaves with another transition.
 */
export type SessionController = {
  readonly phase: () => SessionPhase;
  readonly turnCount: () => number;
  readonly stopRequested: () => boolean;
  readonly snapshot: () => SessionState;
  /** Requests cancellation and forces `STOPPED`. Idempotent. */
  readonly stop: () => void;
  /** Requests a pause; applied by the loop at its next check point. */
  readonly pause: () => void;
  /** `PAUSED` → `RUNNING`; otherwise a no-op. */
  readonly resume: () => void;
  /** Aborted once cancellation is requested. */
  readonly signal: AbortSignal;
  readonly onPhaseChange: (listener: PhaseListener) => () => void;
};

/** Operations reserved for the execution loop. */
export type SessionStateHandle = {
  readonly controller: SessionController;
  /** Enters `RUNNING`, or fails if a lifecycle is already active. */
  readonly begin: () => void;
  /** Counts one submission attempt and returns the new count. */
  readonly recordTurn: () => number;
  /** Unrecoverable failure: `ERRORED` plus cancellation. */
  readonly fail: () => void;
  /** Normal end of the loop: `STOPPED`, unless already `ERRORED`. */
  readonly finish: () => void;
};

export function createSessionState(): SessionStateHandle {
  let state: SessionState = { phase: 'INITIALIZED', stopRequested: false, turnCount: 0 };
  let started = false;
  const abortController = new AbortController();
  const listeners = new Set<PhaseListener>();

  const transition = (phase: SessionPhase): void => {
    if (state.phase === phase) {
      return;
    }
    state = { ...state, phase };
    for (const listener of listeners) {
      listener(phase);
    }
  };

  const requestStop = (): void => {
    if (state.stopRequested) {
      return;
    }
    state = { ...state, stopRequested: true };
    abortController.abort();
  };

  const controller: SessionController = {
    phase: () => state.phase,
    turnCount: () => state.turnCount,
    stopRequested: () => state.stopRequested,
    snapshot: () => state,

    stop: () => {
      requestStop();
      if (state.phase !== 'ERRORED') {
        transition('STOPPED');
      }
    },

    pause: () => {
      if (!isTerminalPhase(state.phase)) {
        transition('PAUSED');
      }
    },

    resume: () => {
      if (state.phase === 'PAUSED') {
        transition('RUNNING');
      }
    },

    signal: abortController.signal,

    onPhaseChange: (listener: PhaseListener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };

  return {
    controller,

    begin: () => {
      if (isTerminalPhase(state.phase)) {
        throw new SessionEndedError(state.phase);
      }
      if (started) {
        throw new AlreadyRunningError();
      }
      started = true;
      // A pause requested before start stays in effect; a resumed one is already RUNNING.
      if (state.phase === 'INITIALIZED') {
        transition('RUNNING');
      }
    },

    recordTurn: () => {
      state = { ...state, turnCount: state.turnCount + 1 };
      return state.turnCount;
    },

    fail: () => {
      requestStop();
      if (state.phase !== 'STOPPED') {
        transition('ERRORED');
      }
    },

    finish: () => {
      if (!isTerminalPhase(state.phase)) {
        transition('STOPPED');
      }
    },
  };
}
