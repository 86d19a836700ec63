import { describe, it, expect, expectTypeOf, vi } from 'vitest';
import type { SupervisorEvent, SupervisorEventOf } from '@switchboard/supervisor-contracts';
import { createEvent, createObserverBus } from '../events/observer-bus.js';
import { makeMockLogger } from '../testing.js';

const phaseEvent = () => createEvent('phase', 'run-1', { from: 'awaiting_decision', to: 'dispatched' });
const stepEvent = () => createEvent('step:start', 'run-1', { agent: 'supervisor', role: 'supervisor', stepCount: 0 });

describe('createObserverBus', () => {
  it('should deliver events to initial and added observers', () => {
    const initial = vi.fn();
    const added = vi.fn();
    const bus = createObserverBus(makeMockLogger(), [initial]);
    bus.on(added);

    bus.emit(phaseEvent());

    expect(initial).toHaveBeenCalledTimes(1);
    expect(added).toHaveBeenCalledTimes(1);
  });

  it('should filter by type', () => {
    const seen: SupervisorEvent[] = [];
    const bus = createObserverBus(makeMockLogger());
    bus.onType('step:start', (event) => seen.push(event));

    bus.emit(phaseEvent());
    bus.emit(stepEvent());

    expect(seen.map((event) => event.type)).toEqual(['step:start']);
  });

  it('should unsubscribe', () => {
    const observer = vi.fn();
    const bus = createObserverBus(makeMockLogger());
    const unsubscribe = bus.on(observer);
    unsubscribe();

    bus.emit(phaseEvent());

    expect(observer).not.toHaveBeenCalled();
  });

  it('should isolate a throwing observer', () => {
    const logger = makeMockLogger();
    const after = vi.fn();
    const bus = createObserverBus(logger, [
      () => {
        throw new Error('observer broke');
      },
      after,
    ]);

    expect(() => bus.emit(phaseEvent())).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('Observer failed', { event: 'phase', error: 'observer broke' });
  });

  it('should stamp events with run id and timestamp', () => {
    const event = phaseEvent();

    expectTypeOf(event).toEqualTypeOf<SupervisorEventOf<'phase'>>();
    expect(event.type).toBe('phase');
    expect(event.data).toEqual({ from: 'awaiting_decision', to: 'dispatched' });

    expect(event.runId).toBe('run-1');
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
  });
});
