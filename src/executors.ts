export type Job = () => void;

export interface TaskExecutor {
  execute(job: Job): void;
}

/**
 * Runs every job in its own event-loop turn, after the caller has finished
 * launching the whole group.
 */
export class ImmediateExecutor implements TaskExecutor {
  public execute(job: Job): void {
    setImmediate(job);
  }
}

export const DEFAULT_EXECUTOR: TaskExecutor = new ImmediateExecutor();
