/**
 * Guildforge — src/lib/keyedLock.ts
 * WHAT: In-process locks keyed by string.
 * FLOWS:
 *  - tryAcquire(key) → release fn, or null if someone holds it (reject, don't queue)
 *  - runExclusive(key, fn) → fn runs after every earlier fn for the same key settles
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

const noop = (): void => {};

export class KeyedLock {
  private readonly held = new Set<string>();
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Non-blocking acquire. Returns a release function that is safe to call twice.
   */
  tryAcquire(key: string): (() => void) | null {
    if (this.held.has(key)) return null;
    this.held.add(key);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held.delete(key);
    };
  }

  isHeld(key: string): boolean {
    return this.held.has(key);
  }

  /**
   * Serialize fn behind earlier work on the same key. Different keys run
   * concurrently. A rejected fn does not poison the queue.
   */
  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail: Promise<void> = run.then(noop, noop).then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    this.tails.set(key, tail);
    return run;
  }

  /** Keys with queued or running exclusive work */
  get activeKeys(): number {
    return this.tails.size;
  }
}
