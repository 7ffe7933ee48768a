/**
 * Flow State Bus Tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FlowStateBus } from '../impl/flow-state-bus';
import { EventDispatcher, type DispatchedEvent } from '../impl/event-dispatcher';
import type { FlowOutcome, ProcessInstance } from '../types/process';
import { silentLogger } from '../utils/logger';

const onboarding: ProcessInstance = { id: 'p-1', action: 'ONBOARDING', metadata: {} };

describe('FlowStateBus', () => {
  let bus: FlowStateBus;
  let received: FlowOutcome[];

  beforeEach(() => {
    bus = new FlowStateBus({ logger: silentLogger });
    received = [];
  });

  it('delivers presentFlow to the listener', () => {
    bus.setListener(outcome => received.push(outcome));

    expect(bus.presentFlow(onboarding)).toBe(true);
    expect(received).toEqual([{ kind: 'presentFlow', instance: onboarding }]);
  });

  it('drops outcomes published without a listener', () => {
    expect(bus.hasListener).toBe(false);
    expect(bus.endSession()).toBe(false);

    bus.setListener(outcome => received.push(outcome));
    expect(received).toEqual([]);
  });

  it('delivers only to the most recent listener', () => {
    const first: FlowOutcome[] = [];
    bus.setListener(outcome => first.push(outcome));
    bus.setListener(outcome => received.push(outcome));

    bus.endSession();

    expect(first).toEqual([]);
    expect(received).toEqual([{ kind: 'sessionEnded' }]);
  });

  it('detach of a superseded listener leaves the current one in place', () => {
    const detachOld = bus.setListener(() => undefined);
    bus.setListener(outcome => received.push(outcome));

    detachOld();
    bus.endSession();

    expect(bus.hasListener).toBe(true);
    expect(received).toEqual([{ kind: 'sessionEnded' }]);
  });

  it('detach of the current listener clears the slot', () => {
    const detach = bus.setListener(outcome => received.push(outcome));

    detach();

    expect(bus.hasListener).toBe(false);
    expect(bus.presentFlow(onboarding)).toBe(false);
  });

  it('clearListener empties the slot', () => {
    bus.setListener(outcome => received.push(outcome));
    bus.clearListener();

    expect(bus.endSession()).toBe(false);
    expect(received).toEqual([]);
  });

  it('delivers sessionEnded while a flow is being presented', () => {
    // Host tears down the presented flow on sessionEnded.
    let presented: ProcessInstance | undefined;
    bus.setListener(outcome => {
      received.push(outcome);
      presented = outcome.kind === 'presentFlow' ? outcome.instance : undefined;
    });

    bus.presentFlow(onboarding);
    expect(presented).toBe(onboarding);

    bus.endSession();
    expect(presented).toBeUndefined();
    expect(received.map(o => o.kind)).toEqual(['presentFlow', 'sessionEnded']);
  });

  it('passes listener errors to onError', () => {
    const onError = vi.fn();
    const guarded = new FlowStateBus({ onError, logger: silentLogger });
    const failure = new Error('navigation stack gone');
    guarded.setListener(() => { throw failure; });

    expect(guarded.endSession()).toBe(true);
    expect(onError).toHaveBeenCalledWith(failure, { kind: 'sessionEnded' });
  });

  it('logs listener errors when no onError is set', () => {
    const error = vi.fn();
    const logged = new FlowStateBus({ logger: { ...silentLogger, error } });
    logged.setListener(() => { throw new Error('bad listener'); });

    expect(() => logged.presentFlow(onboarding)).not.toThrow();
    expect(error).toHaveBeenCalledWith('Listener threw while handling presentFlow', { error: 'bad listener' });
  });

  it('logs an onError hook that throws instead of rethrowing', () => {
    const error = vi.fn();
    const rethrowing = new FlowStateBus({
      logger: { ...silentLogger, error },
      onError: err => {
        throw err;
      },
    });
    rethrowing.setListener(() => { throw new Error('nav crashed'); });

    expect(rethrowing.presentFlow(onboarding)).toBe(true);
    expect(error).toHaveBeenCalledWith('onError threw while handling presentFlow', { error: 'nav crashed' });
  });

  it('mirrors outcomes as events', () => {
    const dispatcher = new EventDispatcher({ mode: 'sync' });
    const events: DispatchedEvent[] = [];
    dispatcher.on('*', e => events.push(e));
    const mirrored = new FlowStateBus({ events: dispatcher, logger: silentLogger });

    mirrored.presentFlow(onboarding);
    mirrored.setListener(() => undefined);
    mirrored.endSession();

    expect(events.map(e => [e.type, e.delivered])).toEqual([
      ['flow.presented', false],
      ['session.ended', true],
    ]);
    expect(events[0]?.action).toBe('ONBOARDING');
  });
});
