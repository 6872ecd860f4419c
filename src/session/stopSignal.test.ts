import { describe, expect, it } from 'vitest';
import { STOP_TOKEN, isStopSignal } from './stopSignal';

describe('isStopSignal', () => {
  it('matches the token anywhere by default', () => {
    expect(isStopSignal('All done <FINISH_SIGNAL>')).toBe(true);
    expect(isStopSignal('I will send <FINISH_SIGNAL> once I have bought.\nBuying now.')).toBe(true);
    expect(isStopSignal('Nothing to stop here')).toBe(false);
  });

  it('only accepts the token at the end of the last line in trailing mode', () => {
    expect(isStopSignal(`Done for today. ${STOP_TOKEN}\n\n`, STOP_TOKEN, 'trailing')).toBe(true);
    expect(isStopSignal(`I will send ${STOP_TOKEN} once I have bought.\nBuying now.`, STOP_TOKEN, 'trailing')).toBe(false);
    expect(isStopSignal('', STOP_TOKEN, 'trailing')).toBe(false);
  });

  it('never matches an empty token', () => {
    expect(isStopSignal('anything', '')).toBe(false);
  });
});
