/**
 * In-process task queue
 *
 * At-least-once is not a goal here: tasks live in memory and are lost on
 * restart; the periodic sweeps re-discover whatever was left PENDING.
 * Identical queued tasks collapse into one. A task that fails is logged
 * and dropped; it never stops the queue.
 */

import type { Logger, TaskPayloads, TaskQueue, TaskType } from "../types.ts";

// ============================================================================
// Types
// ============================================================================

export type TaskHandlers = {
  [K in TaskType]: (payload: TaskPayloads[K]) => Promise<void>;
};

export type InProcessTaskQueue = TaskQueue & {
  /** Attach handlers; queued tasks start running */
  bind: (handlers: TaskHandlers) => void;
  /** Resolves once nothing is queued or running */
  drain: () => Promise<void>;
  /** Queued tasks not yet started */
  size: () => number;
};

export type InProcessTaskQueueConfig = {
  concurrency: number;
  softTimeLimitMs: Record<TaskType, number>;
  logger?: Logger;
};

type PendingTask = {
  key: string;
  type: TaskType;
  run: (handlers: TaskHandlers) => Promise<void>;
};

const SOFT_LIMIT = Symbol("soft-limit");

// ============================================================================
// Factory
// ============================================================================

export const createInProcessTaskQueue = (config: InProcessTaskQueueConfig): InProcessTaskQueue => {
  const logger = config.logger ?? console;
  const pending: PendingTask[] = [];
  const queuedKeys = new Set<string>();
  const idleWaiters: Array<() => void> = [];
  let handlers: TaskHandlers | null = null;
  let running = 0;

  const notifyIdle = () => {
    if (running > 0 || pending.length > 0) return;
    for (const resolve of idleWaiters.splice(0)) resolve();
  };

  /**
   * Run one task under its soft time limit. Past the limit the slot is
   * released and the task keeps running detached; its outcome is still
   * logged.
   */
  const execute = async (task: PendingTask, bound: TaskHandlers): Promise<void> => {
    const work = task.run(bound).catch((error: unknown) => {
      logger.error(`[tasks] ${task.key} failed:`, error);
    });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const limit = new Promise<typeof SOFT_LIMIT>((resolve) => {
      timer = setTimeout(() => resolve(SOFT_LIMIT), config.softTimeLimitMs[task.type]);
    });

    const outcome = await Promise.race([work, limit]);
    clearTimeout(timer);
    if (outcome === SOFT_LIMIT) {
      logger.warn(
        `[tasks] ${task.key} exceeded its soft time limit of ${config.softTimeLimitMs[task.type]}ms`
      );
    }
  };

  const pump = () => {
    const bound = handlers;
    if (!bound) return;
    while (running < config.concurrency && pending.length > 0) {
      const task = pending.shift();
      if (!task) break;
      queuedKeys.delete(task.key);
      running += 1;
      void execute(task, bound).finally(() => {
        running -= 1;
        pump();
        notifyIdle();
      });
    }
  };

  const enqueue: TaskQueue["enqueue"] = (type, payload) => {
    const key = `${type}:${JSON.stringify(payload)}`;
    if (queuedKeys.has(key)) return;
    queuedKeys.add(key);
    pending.push({ key, type, run: (bound) => bound[type](payload) });
    queueMicrotask(pump);
  };

  const bind: InProcessTaskQueue["bind"] = (taskHandlers) => {
    handlers = taskHandlers;
    pump();
  };

  const drain: InProcessTaskQueue["drain"] = () =>
    new Promise<void>((resolve) => {
      idleWaiters.push(resolve);
      pump();
      notifyIdle();
    });

  return { enqueue, bind, drain, size: () => pending.length };
};
