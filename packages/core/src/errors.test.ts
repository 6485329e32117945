import { describe, expect, it } from 'vitest';

import {
  EngineError,
  StateHookFaultError,
  SubscriberFaultError,
  SubsystemFaultError,
  describeError,
} from './errors.js';

describe('fault errors', () => {
  it('carry the subscriber and event type with the original cause', () => {
    const cause = new Error('inventory full');
    const fault = new SubscriberFaultError('UI', 'ItemAcquired', cause);

    expect(fault).toBeInstanceOf(EngineError);
    expect(fault.name).toBe('SubscriberFaultError');
    expect(fault.message).toBe('Subscriber "UI" failed handling "ItemAcquired": inventory full');
    expect(fault.cause).toBe(cause);
  });

  it('name the state and hook that failed', () => {
    const fault = new StateHookFaultError('Dialogue', 'exit', 'script missing');

    expect(fault.message).toBe('State "Dialogue" failed in exit(): script missing');
    expect(fault.stateName).toBe('Dialogue');
    expect(fault.hook).toBe('exit');
  });

  it('name the subsystem and phase that failed', () => {
    const fault = new SubsystemFaultError('Saves', 'reset', new Error('slot locked'));

    expect(fault.message).toBe('Subsystem "Saves" failed in reset(): slot locked');
    expect(fault.subsystemName).toBe('Saves');
    expect(fault.phase).toBe('reset');
  });
});

describe('describeError', () => {
  it('renders any thrown value', () => {
    expect(describeError(new TypeError('bad payload'))).toBe('bad payload');
    expect(describeError('plain')).toBe('plain');
    expect(describeError({ code: 7 })).toBe('{"code":7}');
    expect(describeError(undefined)).toBe('undefined');
  });
});
