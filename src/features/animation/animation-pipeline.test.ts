import { describe, expect, it, vi } from 'vitest';
import { AnimationPipeline, immediateDriver } from './animation-pipeline';
import type { AnimationDriver, AnimationTask } from './animation-pipeline';
import { TicketCounter } from './ticket-counter';

interface PendingAnimation {
  duration: number;
  finish: () => void;
}

function createManualDriver() {
  const pending: PendingAnimation[] = [];
  const driver: AnimationDriver = {
    animate(duration, _timing, body) {
      body();
      return new Promise((resolve) => {
        pending.push({ duration, finish: resolve });
      });
    },
  };
  return { driver, pending };
}

function task(name: string, duration: number, log: string[], extra: Partial<AnimationTask> = {}): AnimationTask {
  return { name, duration, run: () => log.push(name), ...extra };
}

describe('AnimationPipeline', () => {
  it('runs leading zero-duration tasks before submit returns', () => {
    const { driver } = createManualDriver();
    const pipeline = new AnimationPipeline(driver, { disableAnimation: false });
    const log: string[] = [];

    pipeline.submit([task('a', 0, log), task('b', 0, log), task('c', 0.25, log), task('d', 0, log)]);

    expect(log).toEqual(['a', 'b', 'c']);
    expect(pipeline.isRunning).toBe(true);
    expect(pipeline.pendingCount).toBe(1);
  });

  it('waits for each timed task before starting the next', async () => {
    const { driver, pending } = createManualDriver();
    const pipeline = new AnimationPipeline(driver, { disableAnimation: false });
    const log: string[] = [];

    pipeline.submit([task('a', 0.25, log), task('b', 0.5, log)]);
    expect(log).toEqual(['a']);
    expect(pending.map((p) => p.duration)).toEqual([0.25]);

    pending[0].finish();
    await vi.waitFor(() => expect(log).toEqual(['a', 'b']));
    expect(pending[1].duration).toBe(0.5);

    pending[1].finish();
    await pipeline.whenIdle();
    expect(pipeline.isRunning).toBe(false);
  });

  it('queues tasks submitted while busy behind the running ones', async () => {
    const { driver, pending } = createManualDriver();
    const pipeline = new AnimationPipeline(driver, { disableAnimation: false });
    const log: string[] = [];

    pipeline.submit(task('first', 0.25, log));
    pipeline.submit(task('second', 0, log));
    expect(log).toEqual(['first']);

    pending[0].finish();
    await pipeline.whenIdle();
    expect(log).toEqual(['first', 'second']);
  });

  it('runs tasks submitted next right after the task that submitted them', async () => {
    const { driver, pending } = createManualDriver();
    const pipeline = new AnimationPipeline(driver, { disableAnimation: false });
    const log: string[] = [];

    pipeline.submit(task('busy', 0.25, log));
    pipeline.submit(task('build', 0, log, { run: () => {
      log.push('build');
      pipeline.submitNext([task('built.a', 0, log), task('built.b', 0.25, log)]);
    } }));
    pipeline.submit(task('later', 0, log));

    pending[0].finish();
    await vi.waitFor(() => expect(pending).toHaveLength(2));
    expect(log).toEqual(['busy', 'build', 'built.a', 'built.b']);

    pending[1].finish();
    await pipeline.whenIdle();
    expect(log).toEqual(['busy', 'build', 'built.a', 'built.b', 'later']);
  });

  it('collapses every duration when animation is disabled', () => {
    const animate = vi.fn<AnimationDriver['animate']>();
    const pipeline = new AnimationPipeline({ animate }, { disableAnimation: true });
    const log: string[] = [];

    pipeline.submit([task('a', 0.25, log), task('b', 0.5, log)]);

    expect(log).toEqual(['a', 'b']);
    expect(animate).not.toHaveBeenCalled();
    expect(pipeline.isRunning).toBe(false);
  });

  it('skips cancelled tasks and reports them', async () => {
    const skipped: string[] = [];
    const pipeline = new AnimationPipeline(immediateDriver, {
      disableAnimation: false,
      onTaskSkipped: (t) => skipped.push(t.name),
    });
    const tickets = new TicketCounter();
    const log: string[] = [];

    const stale = tickets.next();
    const isStale = () => !tickets.isCurrent(stale);
    pipeline.submit([
      task('old-1', 0, log, { isCancelled: isStale }),
      { name: 'bump', duration: 0, run: () => tickets.next() },
      task('old-2', 0.25, log, { isCancelled: isStale }),
    ]);
    await pipeline.whenIdle();

    expect(log).toEqual(['old-1']);
    expect(skipped).toEqual(['old-2']);
  });

  it('keeps going after a task throws', async () => {
    const pipeline = new AnimationPipeline(immediateDriver, { disableAnimation: false });
    const log: string[] = [];

    pipeline.submit([
      {
        name: 'boom',
        duration: 0,
        run: () => {
          throw new Error('boom');
        },
      },
      task('after', 0.1, log),
    ]);
    await pipeline.whenIdle();

    expect(log).toEqual(['after']);
  });
});

describe('TicketCounter', () => {
  it('only treats the latest ticket as current', () => {
    const tickets = new TicketCounter();
    const first = tickets.next();
    const second = tickets.next();

    expect(first).toBe(1);
    expect(second).toBe(2);
    expect(tickets.isCurrent(first)).toBe(false);
    expect(tickets.isCurrent(second)).toBe(true);
    expect(tickets.latest).toBe(2);
  });
});
