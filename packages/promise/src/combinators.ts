/**
 * Combinators that turn collections of promises into a promise of a
 * collection.
 */

import { CountdownLatch } from "./latch"
import { APromise } from "./promise"

function isMap(
  mapping: ReadonlyMap<unknown, unknown> | Record<string, unknown>
): mapping is ReadonlyMap<unknown, unknown> {
  return mapping instanceof Map
}

/**
 * Turn a list of values and promises into a promise of the list of values.
 *
 * The result keeps input order whatever order the inputs settle in. The first
 * rejection rejects the result; later ones are ignored.
 *
 * @example
 * ```typescript
 * const [user, posts] = await all([loadUser(id), loadPosts(id)])
 * ```
 */
export function all<T extends ReadonlyArray<unknown> | []>(
  values: T
): APromise<{ -readonly [P in keyof T]: Awaited<T[P]> }>
export function all(values: ReadonlyArray<unknown>): APromise<Array<unknown>> {
  if (values.length === 0) {
    return APromise.resolve([])
  }

  const inputs = values.map((value) => APromise.resolve(value))
  return new APromise<Array<unknown>>((resolve, reject) => {
    const latch = new CountdownLatch(inputs.length)
    const results = new Array<unknown>(inputs.length)

    inputs.forEach((input, index) => {
      input.done((value) => {
        results[index] = value
        if (latch.dec() === 0) {
          resolve(results)
        }
      }, reject)
    })
  })
}

/**
 * Turn a mapping of values and promises into a promise of the mapping of
 * values, built atop `all()`. Maps resolve to Maps and plain objects to plain
 * objects, with keys in their original order.
 *
 * @example
 * ```typescript
 * const { user, posts } = await forDict({
 *   user: loadUser(id),
 *   posts: loadPosts(id),
 * })
 * ```
 */
export function forDict<K, V>(
  mapping: ReadonlyMap<K, V>
): APromise<Map<K, Awaited<V>>>
export function forDict<T extends Record<string, unknown>>(
  mapping: T
): APromise<{ [P in keyof T]: Awaited<T[P]> }>
export function forDict(
  mapping: ReadonlyMap<unknown, unknown> | Record<string, unknown>
): APromise<unknown>
export function forDict(
  mapping: ReadonlyMap<unknown, unknown> | Record<string, unknown>
): APromise<unknown> {
  if (isMap(mapping)) {
    const keys = Array.from(mapping.keys())
    if (keys.length === 0) {
      return APromise.resolve(new Map<unknown, unknown>())
    }
    return all(Array.from(mapping.values())).then(
      (values) =>
        new Map(keys.map((key, index): [unknown, unknown] => [key, values[index]]))
    )
  }

  const keys = Object.keys(mapping)
  if (keys.length === 0) {
    return APromise.resolve({})
  }
  return all(keys.map((key) => mapping[key])).then((values) =>
    Object.fromEntries(
      keys.map((key, index): [string, unknown] => [key, values[index]])
    )
  )
}
