/**
 * Decrement-to-zero counter used by `all()` to spot the last input settling.
 *
 * JavaScript objects never cross threads (workers exchange copies), so each
 * `dec()` observes and updates the count without interleaving.
 */
export class CountdownLatch {
  #count: number

  constructor(count: number) {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(
        `count needs to be an integer greater or equal to 0. Got: ${count}`
      )
    }
    this.#count = count
  }

  get count(): number {
    return this.#count
  }

  /**
   * Decrement the count and return what is left.
   */
  dec(): number {
    if (this.#count <= 0) {
      throw new RangeError(`Latch is already open`)
    }
    this.#count--
    return this.#count
  }
}
