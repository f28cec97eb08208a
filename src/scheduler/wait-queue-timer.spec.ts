import { WaitQueueTimer } from './wait-queue-timer';

describe('WaitQueueTimer', () => {
  let timer: WaitQueueTimer;
  const start = new Date('2026-01-01T00:00:00.000Z');
  const at = (ms: number) => new Date(start.getTime() + ms);

  beforeEach(() => {
    jest.useFakeTimers({ now: start });
    timer = new WaitQueueTimer();
  });

  afterEach(() => {
    timer.clear();
    jest.useRealTimers();
  });

  it('should fire callbacks in trigger-time order', () => {
    const fired: string[] = [];
    timer.scheduleAt(at(3000), () => fired.push('c'));
    timer.scheduleAt(at(1000), () => fired.push('a'));
    timer.scheduleAt(at(2000), () => fired.push('b'));

    jest.advanceTimersByTime(1000);
    expect(fired).toEqual(['a']);

    jest.advanceTimersByTime(2000);
    expect(fired).toEqual(['a', 'b', 'c']);
    expect(timer.size).toBe(0);
  });

  it('should fire callbacks due at the same instant in insertion order', () => {
    const fired: string[] = [];
    timer.scheduleAt(at(1000), () => fired.push('first'));
    timer.scheduleAt(at(1000), () => fired.push('second'));

    jest.advanceTimersByTime(1000);

    expect(fired).toEqual(['first', 'second']);
  });

  it('should not fire a cancelled callback', () => {
    const callback = jest.fn();
    const handle = timer.scheduleAt(at(1000), callback);

    expect(timer.cancel(handle)).toBe(true);
    expect(timer.cancel(handle)).toBe(false);

    jest.advanceTimersByTime(5000);
    expect(callback).not.toHaveBeenCalled();
  });

  it('should keep one armed timeout for the head of the queue', () => {
    timer.scheduleAt(at(5000), jest.fn());
    timer.scheduleAt(at(1000), jest.fn());
    timer.scheduleAt(at(9000), jest.fn());

    expect(jest.getTimerCount()).toBe(1);
  });

  it('should handle delays beyond the setTimeout limit', () => {
    const callback = jest.fn();
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;
    timer.scheduleAt(at(thirtyDays), callback);

    jest.advanceTimersByTime(2 ** 31 - 1);
    expect(callback).not.toHaveBeenCalled();

    jest.advanceTimersByTime(thirtyDays - (2 ** 31 - 1));
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should keep firing after a callback throws', () => {
    const after = jest.fn();
    timer.scheduleAt(at(1000), () => {
      throw new Error('boom');
    });
    timer.scheduleAt(at(1000), after);

    jest.advanceTimersByTime(1000);

    expect(after).toHaveBeenCalledTimes(1);
  });

  it('should drop everything on clear', () => {
    const callback = jest.fn();
    timer.scheduleAt(at(1000), callback);

    timer.clear();
    jest.advanceTimersByTime(1000);

    expect(callback).not.toHaveBeenCalled();
    expect(jest.getTimerCount()).toBe(0);
  });
});
