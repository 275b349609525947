import { isTimeoutReason, linkAbort } from './abort';

describe('linkAbort', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts when the parent aborts, with the parent reason', () => {
    const parent = new AbortController();
    const linked = linkAbort(parent.signal);

    parent.abort('stop');

    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toBe('stop');
    linked.dispose();
  });

  it('starts aborted when the parent already is', () => {
    const parent = new AbortController();
    parent.abort('early');
    expect(linkAbort(parent.signal).signal.reason).toBe('early');
  });

  it('aborts with a timeout reason after the timeout elapses', () => {
    vi.useFakeTimers();
    const linked = linkAbort(undefined, 100);

    vi.advanceTimersByTime(99);
    expect(linked.signal.aborted).toBe(false);
    vi.advanceTimersByTime(1);
    expect(linked.signal.aborted).toBe(true);
    expect(isTimeoutReason(linked.signal.reason)).toBe(true);
  });

  it('stops following the parent and the timer once disposed', () => {
    vi.useFakeTimers();
    const parent = new AbortController();
    const linked = linkAbort(parent.signal, 100);

    linked.dispose();
    parent.abort();
    vi.advanceTimersByTime(200);

    expect(linked.signal.aborted).toBe(false);
  });
});
