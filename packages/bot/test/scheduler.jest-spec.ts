/// <reference types="jest" />
import { ClockService } from '../src/modules/scheduler/clock.service';
import { SchedulerService, SchedulingError } from '../src/modules/scheduler/scheduler.service';
import { SerialQueue } from '../src/modules/scheduler/serial-queue';

describe('SchedulerService', () => {
  let scheduler: SchedulerService;

  beforeEach(() => {
    jest.useFakeTimers({ now: 0 });
    scheduler = new SchedulerService(new ClockService({ timeScale: 1 }));
  });

  afterEach(() => {
    scheduler.cancelAll();
    jest.useRealTimers();
  });

  it('runs a callback once its delay has elapsed', () => {
    const fired: string[] = [];
    const handle = scheduler.after(1_000, () => fired.push('close'), 'close 1-1');
    expect(handle).toEqual({ id: 1, label: 'close 1-1', dueAt: 1_000 });
    jest.advanceTimersByTime(999);
    expect(fired).toEqual([]);
    jest.advanceTimersByTime(1);
    expect(fired).toEqual(['close']);
    expect(scheduler.pending).toBe(0);
  });

  it('cancels a pending callback', () => {
    const fired: string[] = [];
    const handle = scheduler.after(1_000, () => fired.push('close'));
    expect(scheduler.cancel(handle)).toBe(true);
    expect(scheduler.cancel(handle)).toBe(false);
    expect(scheduler.cancel(undefined)).toBe(false);
    jest.advanceTimersByTime(5_000);
    expect(fired).toEqual([]);
  });

  it('keeps independent timers independent', () => {
    const fired: string[] = [];
    const close = scheduler.after(120_000, () => fired.push('close'));
    scheduler.after(180_000, () => fired.push('open'));
    scheduler.cancel(close);
    jest.advanceTimersByTime(180_000);
    expect(fired).toEqual(['open']);
  });

  it('contains a throwing callback', () => {
    const logged = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const errLogged = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const fired: string[] = [];
    scheduler.after(10, () => {
      throw new Error('grading exploded');
    });
    scheduler.after(20, () => fired.push('next'));
    expect(() => jest.advanceTimersByTime(20)).not.toThrow();
    expect(fired).toEqual(['next']);
    logged.mockRestore();
    errLogged.mockRestore();
  });

  it('refuses negative delays', () => {
    expect(() => scheduler.after(-1, () => undefined, 'bad')).toThrow(SchedulingError);
  });

  it('scales delays by TIME_SCALE', () => {
    const fast = new SchedulerService(new ClockService({ timeScale: 0.5 }));
    const fired: string[] = [];
    fast.after(1_000, () => fired.push('fast'));
    jest.advanceTimersByTime(500);
    expect(fired).toEqual(['fast']);
  });
});

describe('SerialQueue', () => {
  it('runs tasks one after another in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const slow = queue.run(async () => {
      events.push('slow:start');
      await new Promise((resolve) => setImmediate(resolve));
      events.push('slow:end');
      return 1;
    });
    const fast = queue.run(() => {
      events.push('fast');
      return 2;
    });
    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('keeps going after a failed task', async () => {
    const queue = new SerialQueue();
    const failed = queue.run(() => {
      throw new Error('boom');
    });
    await expect(failed).rejects.toThrow('boom');
    expect(await queue.run(() => 'after')).toBe('after');
  });

  it('drains tasks queued while draining', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    void queue.run(async () => {
      events.push('first');
      void queue.run(() => {
        events.push('second');
      });
    });
    await queue.drain();
    expect(events).toEqual(['first', 'second']);
    expect(queue.pending).toBe(0);
  });
});
