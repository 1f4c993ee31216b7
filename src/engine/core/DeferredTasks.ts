interface ScheduledTask {
  id: number;
  label: string;
  dueAt: number;
  run: () => void;
}

/** NaN and infinities count as no time at all. */
export function nonNegative(seconds: number): number {
  return Number.isFinite(seconds) ? Math.max(0, seconds) : 0;
}

export interface DeferredTaskHandle {
  readonly id: number;
  readonly label: string;
  cancel(): void;
}

/**
 * One-shot callbacks on the battle's own clock. Time only moves when the
 * session ticks, so a task never runs in the middle of a command.
 */
export class DeferredTasks {
  private now = 0;
  private nextId = 1;
  private tasks: ScheduledTask[] = [];

  get time(): number {
    return this.now;
  }

  get pendingCount(): number {
    return this.tasks.length;
  }

  schedule(delaySeconds: number, label: string, run: () => void): DeferredTaskHandle {
    const task: ScheduledTask = {
      id: this.nextId++,
      label,
      dueAt: this.now + nonNegative(delaySeconds),
      run,
    };
    this.tasks.push(task);
    return {
      id: task.id,
      label,
      cancel: () => this.cancel(task.id),
    };
  }

  cancel(id: number): boolean {
    const before = this.tasks.length;
    this.tasks = this.tasks.filter((t) => t.id !== id);
    return this.tasks.length !== before;
  }

  cancelByLabel(label: string): number {
    const before = this.tasks.length;
    this.tasks = this.tasks.filter((t) => t.label !== label);
    return before - this.tasks.length;
  }

  cancelAll(): void {
    this.tasks = [];
  }

  isScheduled(label: string): boolean {
    return this.tasks.some((t) => t.label === label);
  }

  /**
   * Move the clock forward and run every task that has come due, earliest
   * first. Tasks scheduled by a running task run in the same call if they are
   * already due. Returns the number of tasks run.
   */
  advance(deltaSeconds: number): number {
    this.now += nonNegative(deltaSeconds);
    let ran = 0;

    for (;;) {
      const due = this.tasks
        .filter((t) => t.dueAt <= this.now)
        .sort((a, b) => a.dueAt - b.dueAt || a.id - b.id)[0];
      if (!due) break;

      this.tasks = this.tasks.filter((t) => t.id !== due.id);
      due.run();
      ran++;
    }

    return ran;
  }

  reset(): void {
    this.tasks = [];
    this.now = 0;
  }
}
