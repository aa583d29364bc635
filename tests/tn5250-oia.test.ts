import { beforeEach, describe, expect, it, vi } from 'vitest';
import { InputInhibited, OIAChange } from '../src/common/enums';
import { TN5250OIA } from '../src/tn5250-oia';
import { silentLogger } from './helpers';

describe('TN5250OIA', () => {
  let oia: TN5250OIA;

  beforeEach(() => {
    oia = new TN5250OIA(silentLogger());
  });

  it('notifies once per actual keyboard lock change', () => {
    const listener = vi.fn();
    oia.addOIAListener(listener);

    oia.setKeyboardLocked(true);
    oia.setKeyboardLocked(true);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(oia, OIAChange.KEYBOARD_LOCKED);
    expect(oia.isKeyBoardLocked()).toBe(true);
  });

  it('calls listeners in registration order', () => {
    const calls: string[] = [];

    oia.addOIAListener(() => calls.push('first'));
    oia.addOIAListener(() => calls.push('second'));

    oia.setInsertMode(true);

    expect(calls).toEqual(['first', 'second']);
  });

  it('stops notifying a removed listener', () => {
    const listener = vi.fn();

    oia.addOIAListener(listener);
    oia.removeOIAListener(listener);
    oia.setMessageLightOn();

    expect(listener).not.toHaveBeenCalled();
    expect(oia.isMessageWait()).toBe(true);
  });

  it('records input inhibition with its code and message', () => {
    const listener = vi.fn();
    oia.addOIAListener(listener);

    oia.setInputInhibited(InputInhibited.PROG_CHECK, 42, 'Field data error 0042');
    oia.setInputInhibited(InputInhibited.PROG_CHECK, 42, 'Field data error 0042');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(oia.getInputInhibited()).toBe(InputInhibited.PROG_CHECK);
    expect(oia.getInhibitedText()).toBe('Field data error 0042');
    expect(oia.getProgCheckCode()).toBe(42);
    expect(oia.isInputError()).toBe(true);
  });

  it('notifies when only the check code changes', () => {
    const listener = vi.fn();

    oia.setInputInhibited(InputInhibited.COMM_CHECK, 1);
    oia.addOIAListener(listener);
    oia.setInputInhibited(InputInhibited.COMM_CHECK, 2);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(oia.getCommCheckCode()).toBe(2);
  });

  it('clears input errors but not a system wait', () => {
    oia.setInputInhibited(InputInhibited.MACHINE_CHECK, 7);

    expect(oia.clearInputError()).toBe(true);
    expect(oia.getInputInhibited()).toBe(InputInhibited.NOT_INHIBITED);

    oia.setInputInhibited(InputInhibited.SYSTEM_WAIT);

    expect(oia.clearInputError()).toBe(false);
    expect(oia.getInputInhibited()).toBe(InputInhibited.SYSTEM_WAIT);
  });

  it('always signals the bell and clear screen', () => {
    const listener = vi.fn();
    oia.addOIAListener(listener);

    oia.setAudibleBell();
    oia.setAudibleBell();
    oia.clearScreen();

    expect(listener).toHaveBeenCalledTimes(3);
    expect(oia.getLastChange()).toBe(OIAChange.CLEAR_SCREEN);
  });

  it('keeps the owner without notifying', () => {
    const listener = vi.fn();
    oia.addOIAListener(listener);

    oia.setOwner(3);

    expect(oia.getOwner()).toBe(3);
    expect(listener).not.toHaveBeenCalled();
  });
});
