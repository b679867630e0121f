export class Mutex {
  private locked = false
  private waiters: Array<() => void> = []

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.lock()
    try {
      return await fn()
    } finally {
      this.unlock()
    }
  }

  get isLocked(): boolean {
    return this.locked
  }

  private lock(): Promise<void> {
    if (!this.locked) {
      this.locked = true
      return Promise.resolve()
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve)
    })
  }

  private unlock(): void {
    const next = this.waiters.shift()
    if (next) {
      next()
      return
    }
    this.locked = false
  }
}

/** One lazily created mutex per key; idle mutexes are dropped. */
export class MutexMap<Key> {
  private map = new Map<Key, Mutex>()

  async runExclusive<T>(key: Key, fn: () => Promise<T>): Promise<T> {
    let m = this.map.get(key)
    if (!m) {
      m = new Mutex()
      this.map.set(key, m)
    }
    const mutex = m
    try {
      return await mutex.runExclusive(fn)
    } finally {
      if (!mutex.isLocked && this.map.get(key) === mutex) this.map.delete(key)
    }
  }
}
