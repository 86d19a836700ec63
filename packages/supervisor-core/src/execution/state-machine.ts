import {
  StateTransitionError,
  TERMINAL_PHASES,
  type RuntimePhase,
} from '@switchboard/supervisor-contracts';

export type PhaseTransition = {
  from: RuntimePhase;
  to: RuntimePhase;
  timestamp: string;
  reason?: string;
};

const ALLOWED_TRANSITIONS: Record<RuntimePhase, RuntimePhase[]> = {
  awaiting_decision: ['dispatched', 'completed', 'failed', 'cancelled'],
  dispatched: ['aggregating', 'failed', 'cancelled'],
  aggregating: ['awaiting_decision', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export class RuntimeStateMachine {
  private current: RuntimePhase = 'awaiting_decision';
  private transitions: PhaseTransition[] = [];

  getCurrent(): RuntimePhase {
    return this.current;
  }

  getTransitions(): PhaseTransition[] {
    return [...this.transitions];
  }

  isTerminal(): boolean {
    return TERMINAL_PHASES.includes(this.current);
  }

  transition(to: RuntimePhase, reason?: string): PhaseTransition {
    const allowed = ALLOWED_TRANSITIONS[this.current];
    if (!allowed.includes(to)) {
      throw new StateTransitionError(this.current, to);
    }

    const transition: PhaseTransition = {
      from: this.current,
      to,
      timestamp: new Date().toISOString(),
      reason,
    };
    this.transitions.push(transition);
    this.current = to;
    return transition;
  }
}
