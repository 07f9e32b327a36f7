/**
 * Cola de promesas por clave: las tareas con la misma clave se ejecutan una
 * detrás de otra, las de claves distintas en paralelo.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>()

  /**
   * Espera el turno para `key` y devuelve la función que lo libera
   */
  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous

    let released = false
    return () => {
      if (released) return
      released = true
      release()
      if (this.tails.get(key) === tail) this.tails.delete(key)
    }
  }

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key)
    try {
      return await task()
    }
    finally {
      release()
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}
