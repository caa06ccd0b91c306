/**
 * FIFO between the terminal's keypress events and the application loop.
 * Keys pressed while an action is still running wait here.
 */

import type { KeyEvent } from "../keymap.js";

export class KeyQueue {
  private readonly pending: KeyEvent[] = [];
  private readonly waiters: Array<(key: KeyEvent) => void> = [];

  push(key: KeyEvent): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(key);
      return;
    }
    this.pending.push(key);
  }

  next(): Promise<KeyEvent> {
    const key = this.pending.shift();
    if (key !== undefined) {
      return Promise.resolve(key);
    }
    return new Promise<KeyEvent>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  get size(): number {
    return this.pending.length;
  }
}
