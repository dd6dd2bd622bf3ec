/**
 * Animation Pipeline
 *
 * Runs animation tasks strictly one after another. Zero-duration tasks run
 * synchronously as soon as they reach the front of the queue, so a batch
 * submitted to an idle pipeline applies its leading state changes before
 * `submit` returns. Timed tasks are handed to an {@link AnimationDriver}, which
 * owns the clock.
 */
import { createLogger } from '@/lib/logger';
import { config } from '@/lib/config';
import type { TimingName } from '@/features/transitions/types';

const log = createLogger('AnimationPipeline');

export interface AnimationTask {
  name: string;
  /** Seconds */
  duration: number;
  timing?: TimingName;
  run: () => void;
  /** Checked right before the task starts; a cancelled task is skipped */
  isCancelled?: () => boolean;
}

export interface AnimationDriver {
  /** Applies `body` as an animation lasting `duration` seconds and resolves when it ends */
  animate(duration: number, timing: TimingName, body: () => void): Promise<void>;
}

/** Applies every change at once */
export const immediateDriver: AnimationDriver = {
  animate(_duration, _timing, body) {
    body();
    return Promise.resolve();
  },
};

/** Applies the change, then waits out the duration on a timer */
export function createTimerDriver(): AnimationDriver {
  return {
    animate(duration, _timing, body) {
      body();
      return new Promise((resolve) => {
        setTimeout(resolve, duration * 1000);
      });
    },
  };
}

export interface AnimationPipelineOptions {
  /** Collapse every task to zero duration. Defaults to the configuration. */
  disableAnimation?: boolean;
  onTaskSkipped?: (task: AnimationTask) => void;
}

export class AnimationPipeline {
  private queue: AnimationTask[] = [];
  private running = false;
  private idleResolvers: Array<() => void> = [];
  private readonly disableAnimation: boolean;
  private readonly onTaskSkipped?: (task: AnimationTask) => void;

  constructor(
    private readonly driver: AnimationDriver = createTimerDriver(),
    options: AnimationPipelineOptions = {}
  ) {
    this.disableAnimation = options.disableAnimation ?? config.animation.disabled;
    this.onTaskSkipped = options.onTaskSkipped;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  submit(tasks: AnimationTask | readonly AnimationTask[]): void {
    const batch = Array.isArray(tasks) ? tasks : [tasks];
    this.queue.push(...batch);
    if (!this.running) {
      this.runNext();
    }
  }

  /**
   * Queues `tasks` ahead of everything already waiting. Called from a running
   * task, they run right after it.
   */
  submitNext(tasks: AnimationTask | readonly AnimationTask[]): void {
    const batch = Array.isArray(tasks) ? tasks : [tasks];
    this.queue.unshift(...batch);
    if (!this.running) {
      this.runNext();
    }
  }

  submitZeroDuration(name: string, run: () => void): void {
    this.submit({ name, duration: 0, run });
  }

  /** Resolves once the queue is empty and no task is running */
  whenIdle(): Promise<void> {
    if (!this.running && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleResolvers.push(resolve);
    });
  }

  private runNext(): void {
    this.running = true;

    for (;;) {
      const task = this.queue.shift();
      if (!task) {
        this.running = false;
        const resolvers = this.idleResolvers;
        this.idleResolvers = [];
        resolvers.forEach((resolve) => resolve());
        return;
      }

      if (task.isCancelled?.()) {
        log.debug(`Skipping cancelled task ${task.name}`);
        this.onTaskSkipped?.(task);
        continue;
      }

      const duration = this.disableAnimation ? 0 : Math.max(0, task.duration);
      if (duration === 0) {
        this.runTaskBody(task);
        continue;
      }

      void this.driver
        .animate(duration, task.timing ?? 'linear', () => this.runTaskBody(task))
        .catch((error: unknown) => {
          log.error(`Animation for task ${task.name} failed`, error);
        })
        .then(() => this.runNext());
      return;
    }
  }

  private runTaskBody(task: AnimationTask): void {
    try {
      task.run();
    } catch (error) {
      log.error(`Task ${task.name} threw`, error);
    }
  }
}
