export type TimerHandle = number;

/**
 * Fires callbacks at wall-clock instants.
 */
export interface TimerQueue {
  scheduleAt(time: Date, callback: () => void): TimerHandle;

  /** Returns false if the handle already fired or was cancelled */
  cancel(handle: TimerHandle): boolean;

  /** Drop every pending callback */
  clear(): void;
}

export const TIMER_QUEUE = Symbol('TIMER_QUEUE');
