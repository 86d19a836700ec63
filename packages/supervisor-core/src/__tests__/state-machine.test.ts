import { describe, it, expect, beforeEach } from 'vitest';
import { StateTransitionError } from '@switchboard/supervisor-contracts';
import { RuntimeStateMachine } from '../execution/state-machine.js';

describe('RuntimeStateMachine', () => {
  let machine: RuntimeStateMachine;

  beforeEach(() => {
    machine = new RuntimeStateMachine();
  });

  it('should start awaiting a supervisor decision', () => {
    expect(machine.getCurrent()).toBe('awaiting_decision');
    expect(machine.isTerminal()).toBe(false);
  });

  it('should follow a full handoff cycle', () => {
    machine.transition('dispatched', 'handoff to math_expert');
    machine.transition('aggregating');
    machine.transition('awaiting_decision');
    machine.transition('completed');

    expect(machine.isTerminal()).toBe(true);
    expect(machine.getTransitions().map((t) => `${t.from}->${t.to}`)).toEqual([
      'awaiting_decision->dispatched',
      'dispatched->aggregating',
      'aggregating->awaiting_decision',
      'awaiting_decision->completed',
    ]);
    expect(machine.getTransitions()[0]?.reason).toBe('handoff to math_expert');
  });

  it('should reject skipping aggregation', () => {
    machine.transition('dispatched');

    expect(() => machine.transition('awaiting_decision')).toThrow(StateTransitionError);
    expect(() => machine.transition('completed')).toThrow('Invalid state transition: dispatched -> completed');
  });

  it('should allow failure and cancellation from any non-terminal phase', () => {
    machine.transition('dispatched');
    machine.transition('cancelled');

    expect(machine.isTerminal()).toBe(true);
  });

  it('should not leave a terminal phase', () => {
    machine.transition('failed');

    expect(() => machine.transition('awaiting_decision')).toThrow(StateTransitionError);
    expect(() => machine.transition('cancelled')).toThrow(StateTransitionError);
  });
});
