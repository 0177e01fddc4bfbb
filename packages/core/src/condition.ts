/**
 * Condition - block-until-notified waiting for async tasks.
 *
 * A task calls `wait(predicate)` and stays suspended until the predicate
 * holds. The predicate is checked before suspending and again after every
 * wake-up, so a notification that happened before the wait is never lost
 * and a wake-up with the predicate still false just suspends again.
 */

interface PendingWaiter {
  resolve: () => void
}

export class Condition {
  private pendingWaiters: Array<PendingWaiter> = []

  /**
   * Number of tasks currently suspended on this condition.
   */
  get waiting(): number {
    return this.pendingWaiters.length
  }

  /**
   * Suspend until `predicate` returns true.
   */
  async wait(predicate: () => boolean): Promise<void> {
    while (!predicate()) {
      await this.suspend()
    }
  }

  /**
   * Wake the longest-waiting task, if any.
   */
  notifyOne(): void {
    const pending = this.pendingWaiters.shift()
    pending?.resolve()
  }

  /**
   * Wake every waiting task.
   */
  notifyAll(): void {
    const toNotify = this.pendingWaiters
    this.pendingWaiters = []

    for (const pending of toNotify) {
      pending.resolve()
    }
  }

  private suspend(): Promise<void> {
    return new Promise((resolve) => {
      this.pendingWaiters.push({ resolve })
    })
  }
}
