import { serializeError, type RuntimeLogger } from '../utils/runtimeLogger.js';

/** A long-running task; it should return once `signal` is aborted. */
export type ScheduledTask = (signal: AbortSignal) => Promise<void>;

type TaskSchedulerOptions = {
  logger?: Pick<RuntimeLogger, 'info' | 'error'>;
};

export type TaskStatusSnapshot = {
  name: string;
  state: 'pending' | 'running' | 'finished' | 'failed';
  error: string | null;
};

export type TaskScheduler = {
  add: (name: string, task: ScheduledTask) => void;
  run: () => Promise<void>;
  stop: () => void;
  isStopped: () => boolean;
  getStatus: () => TaskStatusSnapshot[];
};

export function createTaskScheduler(options: TaskSchedulerOptions = {}): TaskScheduler {
  const logger = options.logger;
  const tasks = new Map<string, { task: ScheduledTask; status: TaskStatusSnapshot }>();
  const controller = new AbortController();
  let started = false;

  const runTask = async (name: string, task: ScheduledTask, status: TaskStatusSnapshot) => {
    status.state = 'running';
    logger?.info('task started', { task: name });
    try {
      await task(controller.signal);
      status.state = 'finished';
      logger?.info('task finished', { task: name });
    } catch (err) {
      status.state = 'failed';
      status.error = err instanceof Error ? err.message : String(err);
      logger?.error('task failed', { task: name, error: serializeError(err) });
      throw err;
    }
  };

  const add = (name: string, task: ScheduledTask) => {
    if (started) {
      throw new Error(`Cannot add task "${name}" after the scheduler started`);
    }
    tasks.set(name, { task, status: { name, state: 'pending', error: null } });
  };

  // Rejects with the first task failure; the other tasks keep running until stop().
  const run = async () => {
    if (started) {
      throw new Error('Task scheduler is already running');
    }
    started = true;
    await Promise.all(
      Array.from(tasks.entries()).map(([name, entry]) => runTask(name, entry.task, entry.status)),
    );
  };

  const stop = () => {
    controller.abort();
  };

  return {
    add,
    run,
    stop,
    isStopped: () => controller.signal.aborted,
    getStatus: () => Array.from(tasks.values()).map((entry) => ({ ...entry.status })),
  };
}
