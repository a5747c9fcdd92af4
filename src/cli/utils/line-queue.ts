/**
 * Line Queue
 *
 * Feeds input lines to an async handler one at a time, in arrival order.
 * Lines that arrive while an earlier one is still being handled (typed or
 * pasted while the tutor is answering) wait their turn instead of being
 * dropped.
 */

export interface LineQueueOptions {
  handle: (line: string) => Promise<void>;
  /** Called with any error the handler throws; the queue keeps going */
  onError: (error: unknown) => void;
  /** Called when a line has to wait, with the number now waiting */
  onQueued?: (waiting: number) => void;
  /** Called each time the queue runs empty */
  onIdle?: () => void;
}

export interface LineQueue {
  push(line: string): void;
  /** Lines received but not yet handed to the handler */
  readonly waiting: number;
}

export function createLineQueue(options: LineQueueOptions): LineQueue {
  const queue: string[] = [];
  let running = false;

  const drain = async (): Promise<void> => {
    let next = queue.shift();
    while (next !== undefined) {
      try {
        await options.handle(next);
      } catch (error) {
        options.onError(error);
      }
      next = queue.shift();
    }
    // Cleared in the same tick as the empty shift, so no push can slip between
    running = false;
    options.onIdle?.();
  };

  return {
    push(line: string): void {
      queue.push(line);
      if (running) {
        options.onQueued?.(queue.length);
        return;
      }
      running = true;
      drain().catch(options.onError);
    },
    get waiting(): number {
      return queue.length;
    },
  };
}
