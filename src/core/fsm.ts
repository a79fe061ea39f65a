export enum ProcessingState {
  IDLE = 'IDLE',
  PROCESSING = 'PROCESSING'
}

export class FSM {
  state: ProcessingState = ProcessingState.IDLE;

  /** Check-and-set in one synchronous step; false when a turn is already in flight. */
  tryBegin(): boolean {
    if (this.state !== ProcessingState.IDLE) return false;
    this.state = ProcessingState.PROCESSING;
    return true;
  }

  finish() {
    this.state = ProcessingState.IDLE;
  }
}
