/**
 * Lanes — one queue per conversation.
 *
 * Messages from the same conversation are handled in arrival order;
 * different conversations run concurrently. A failing task is logged
 * and the lane moves on.
 */

import { describeError } from './errors.js';

export interface Lanes {
  run(key: string | number, task: () => Promise<unknown>): Promise<void>;
  /** Resolves once every lane has emptied */
  idle(): Promise<void>;
  /** Number of lanes with queued or running work */
  size(): number;
}

export function createLanes(): Lanes {
  const tails = new Map<string, Promise<void>>();

  return {
    run(key, task) {
      const lane = String(key);
      const previous = tails.get(lane) ?? Promise.resolve();

      const next: Promise<void> = previous
        .then(task)
        .then(
          () => undefined,
          (error: unknown) => {
            console.error(`[relay] Lane ${lane} task failed: ${describeError(error)}`);
          },
        )
        .finally(() => {
          if (tails.get(lane) === next) tails.delete(lane);
        });

      tails.set(lane, next);
      return next;
    },

    async idle() {
      while (tails.size > 0) {
        await Promise.all([...tails.values()]);
      }
    },

    size() {
      return tails.size;
    },
  };
}
