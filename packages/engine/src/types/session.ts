export type SessionPhase = 'INITIALIZED' | 'RUNNING' | 'PAUSED' | 'STOPPED' | 'ERRORED';

export type SessionState = {
  readonly phase: SessionPhase;
  readonly stopRequested: boolean;
  readonly turnCount: number;
};

export function isTerminalPhase(phase: SessionPhase): boolean {
  return phase === 'STOPPED' || phase === 'ERRORED';
}
