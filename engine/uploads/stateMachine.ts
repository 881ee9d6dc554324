export type UploadTaskState =
  | 'queued'
  | 'invalid'
  | 'transforming'
  | 'uploading'
  | 'awaiting_scan'
  | 'finalized'
  | 'failed'
  | 'cancelled';

export const terminalStates: ReadonlySet<UploadTaskState> = new Set<UploadTaskState>([
  'invalid',
  'finalized',
  'failed',
  'cancelled',
]);

const allowedTransitions: Record<UploadTaskState, ReadonlyArray<UploadTaskState>> = {
  queued: ['invalid', 'transforming', 'uploading', 'cancelled'],
  transforming: ['uploading', 'failed', 'cancelled'],
  uploading: ['awaiting_scan', 'finalized', 'failed', 'cancelled'],
  awaiting_scan: ['finalized', 'failed', 'cancelled'],
  invalid: [],
  finalized: [],
  failed: [],
  cancelled: [],
};

export class UploadTaskStateMachine {
  canTransition(from: UploadTaskState, to: UploadTaskState): boolean {
    return allowedTransitions[from]?.includes(to) ?? false;
  }

  assertTransition(from: UploadTaskState, to: UploadTaskState): void {
    if (terminalStates.has(from)) {
      throw new Error(`Cannot transition terminal upload state ${from}`);
    }
    if (!this.canTransition(from, to)) {
      throw new Error(`Invalid upload state transition: ${from} -> ${to}`);
    }
  }

  isTerminal(state: UploadTaskState): boolean {
    return terminalStates.has(state);
  }
}

export const uploadTaskStateMachine = new UploadTaskStateMachine();
