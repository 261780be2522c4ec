/**
 * Promise-chained mutual exclusion.
 *
 * @module packet-link/mutex
 */

/**
 * Runs critical sections one at a time, in call order. A section that throws
 * releases the lock and rethrows to its own caller only.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()
  private held = 0

  /**
   * True while a section is running or waiting.
   */
  get isLocked (): boolean {
    return this.held > 0
  }

  async runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    this.held++
    const previous = this.tail
    let release: () => void = () => {}
    this.tail = new Promise<void>((resolve) => {
      release = resolve
    })

    await previous
    try {
      return await section()
    } finally {
      this.held--
      release()
    }
  }
}
