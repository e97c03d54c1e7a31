/**
 * Per-key promise-chain mutex. Work queued under the same key runs one at a
 * time in arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()
  private readonly holders = new Map<string, number>()

  isLocked(key: string): boolean {
    return (this.holders.get(key) ?? 0) > 0
  }

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    let release: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    this.tails.set(key, previous.then(() => current))
    this.holders.set(key, (this.holders.get(key) ?? 0) + 1)

    try {
      await previous
      return await fn()
    } finally {
      release()
      const remaining = (this.holders.get(key) ?? 1) - 1
      if (remaining === 0) {
        this.holders.delete(key)
        this.tails.delete(key)
      } else {
        this.holders.set(key, remaining)
      }
    }
  }
}
