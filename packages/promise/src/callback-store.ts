/**
 * Per-promise storage of pending reactions.
 *
 * Most promises have exactly one subscriber, so index 0 lives in an inline
 * slot and only later subscribers allocate entries in the overflow map.
 */

/**
 * Maximum number of reactions a single store holds before it wraps.
 */
export const MAX_SUBSCRIBERS = 0xffff

export class CallbackStore<R> {
  #first: R | undefined
  #overflow = new Map<number, R>()
  #length = 0

  /**
   * Number of registered reactions, including ones already taken during
   * settlement.
   */
  get length(): number {
    return this.#length
  }

  /**
   * Append a reaction and return the index it was stored at.
   *
   * A store that is already full wraps: the reactions it holds are dropped
   * and the new one takes index 0.
   */
  add(reaction: R): number {
    let index = this.#length
    if (index >= MAX_SUBSCRIBERS) {
      console.warn(
        `[CallbackStore] Subscriber limit of ${MAX_SUBSCRIBERS} reached, dropping ${index} pending reactions`
      )
      this.reset()
      index = 0
    }

    if (index === 0) {
      this.#first = reaction
    } else {
      this.#overflow.set(index, reaction)
    }
    this.#length = index + 1
    return index
  }

  at(index: number): R | undefined {
    return index === 0 ? this.#first : this.#overflow.get(index)
  }

  /**
   * Read the reaction at `index` and clear its slot.
   */
  take(index: number): R | undefined {
    if (index === 0) {
      const reaction = this.#first
      this.#first = undefined
      return reaction
    }
    const reaction = this.#overflow.get(index)
    this.#overflow.delete(index)
    return reaction
  }

  /**
   * Remove every reaction in registration order.
   */
  *drain(): Generator<R, void, undefined> {
    const length = this.#length
    for (let index = 0; index < length; index++) {
      const reaction = this.take(index)
      if (reaction !== undefined) {
        yield reaction
      }
    }
    this.reset()
  }

  reset(): void {
    this.#first = undefined
    this.#overflow.clear()
    this.#length = 0
  }
}
