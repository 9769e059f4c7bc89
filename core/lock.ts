/**
 * Advisory per-stream lock
 *
 * Mirrors flockfile/ftrylockfile/funlockfile for a single-threaded owner:
 * the lock is recursive, so the owner always acquires it and every
 * acquisition nests one level deeper. Nothing blocks and nothing enforces
 * exclusion; the lock only records intent.
 *
 * @module core/lock
 */

export class RecursiveLock {
  private depth = 0

  /** Nesting depth; 0 when unlocked */
  get level(): number {
    return this.depth
  }

  get locked(): boolean {
    return this.depth > 0
  }

  /**
   * Acquire one level. Always succeeds for the owner.
   */
  tryLock(): boolean {
    this.depth++
    return true
  }

  lock(): void {
    this.depth++
  }

  /**
   * Release one level. Releasing an unlocked lock does nothing.
   */
  unlock(): void {
    if (this.depth > 0) {
      this.depth--
    }
  }

  /** Drop every level, e.g. when the stream closes */
  reset(): void {
    this.depth = 0
  }
}
