import { Injectable, Logger } from '@nestjs/common';

import { describeError } from '../common/utils/describe-error';

import { TimerHandle, TimerQueue } from './interfaces';

/** Longest delay setTimeout accepts */
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

interface WaitEntry {
  handle: TimerHandle;
  at: number;
  callback: () => void;
}

/**
 * Time-ordered wait queue with a single armed setTimeout for its head.
 * Entries due at the same instant fire in insertion order.
 */
@Injectable()
export class WaitQueueTimer implements TimerQueue {
  private readonly logger = new Logger(WaitQueueTimer.name);

  /** Sorted by `at`, ties in insertion order */
  private entries: WaitEntry[] = [];
  private armed: { at: number; timeout: NodeJS.Timeout } | null = null;
  private nextHandle = 1;

  scheduleAt(time: Date, callback: () => void): TimerHandle {
    const entry: WaitEntry = { handle: this.nextHandle++, at: time.getTime(), callback };

    const index = this.entries.findIndex((e) => e.at > entry.at);
    if (index === -1) {
      this.entries.push(entry);
    } else {
      this.entries.splice(index, 0, entry);
    }

    this.arm();
    return entry.handle;
  }

  cancel(handle: TimerHandle): boolean {
    const index = this.entries.findIndex((e) => e.handle === handle);
    if (index === -1) {
      return false;
    }

    this.entries.splice(index, 1);
    this.arm();
    return true;
  }

  clear(): void {
    this.entries = [];
    this.disarm();
  }

  /** Number of callbacks waiting */
  get size(): number {
    return this.entries.length;
  }

  private arm(): void {
    const head = this.entries[0];

    if (!head) {
      this.disarm();
      return;
    }

    if (this.armed?.at === head.at) {
      return;
    }

    this.disarm();
    const delay = Math.min(Math.max(0, head.at - Date.now()), MAX_TIMEOUT_MS);
    this.armed = { at: head.at, timeout: setTimeout(() => this.onTimeout(), delay) };
  }

  private disarm(): void {
    if (this.armed) {
      clearTimeout(this.armed.timeout);
      this.armed = null;
    }
  }

  private onTimeout(): void {
    this.armed = null;

    const now = Date.now();
    const due: WaitEntry[] = [];
    while (this.entries.length > 0 && this.entries[0].at <= now) {
      const entry = this.entries.shift();
      if (entry) due.push(entry);
    }

    // Clamped delays wake early with nothing due; re-arm either way
    this.arm();

    for (const entry of due) {
      try {
        entry.callback();
      } catch (error) {
        this.logger.error(`Timer callback ${entry.handle} threw: ${describeError(error)}`);
      }
    }
  }
}
