/**
 * @fileoverview Unit tests for the cancellable sleep
 */

import { sleep } from '../../../src';

describe('sleep', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should resolve after the requested delay', async () => {
    let done = false;
    const pending = sleep(100).then(() => {
      done = true;
    });

    jest.advanceTimersByTime(99);
    await Promise.resolve();
    expect(done).toBe(false);

    jest.advanceTimersByTime(1);
    await pending;
    expect(done).toBe(true);
  });

  it('should reject with the abort reason and clear its timer', async () => {
    const controller = new AbortController();
    const pending = sleep(1_000, controller.signal);

    controller.abort('shutdown');

    await expect(pending).rejects.toBe('shutdown');
    expect(jest.getTimerCount()).toBe(0);
  });

  it('should reject at once when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort('too late');

    await expect(sleep(1_000, controller.signal)).rejects.toBe('too late');
    expect(jest.getTimerCount()).toBe(0);
  });
});
