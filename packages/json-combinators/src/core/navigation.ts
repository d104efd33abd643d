import * as Either from "effect/Either"

import type { Decoder } from "./decoder.js"
import { badField, badPath, badPrimitive, badType, tooSmallArray } from "./errors.js"
import type { Json } from "./json.js"
import { isJsonArray, isJsonObject, lookupKey } from "./json.js"

// CHANGE: navigate into objects and arrays before delegating to an inner decoder
// WHY: failure messages must say where in the tree the decode went wrong
// SOURCE: n/a
// FORMAT THEOREM: at([a,b], d) ≡ field(a, field(b, d)) on inputs where both keys exist
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a missing key is a presence error; a non-object on the way is a shape error
// COMPLEXITY: O(k) where k = path length

/**
 * Decode the field `name` of an object with `decoder`.
 *
 * @pure true
 * @invariant absent key → BadField; non-object input → BadType; a present `null` reaches `decoder`
 */
export const field = <A>(name: string, decoder: Decoder<A>): Decoder<A> => (input) => {
  if (!isJsonObject(input)) {
    return Either.left(badType("an object", input))
  }
  const fieldValue = lookupKey(input, name)
  if (fieldValue === undefined) {
    return Either.left(badField(`an object with a field named \`${name}\``, input))
  }
  return decoder(fieldValue)
}

/**
 * Walk `path` through nested objects, then decode the node found there.
 *
 * @pure true
 * @invariant BadType cites the segments walked so far; BadPath cites the full path and the missing segment
 * @complexity O(k)
 */
export const at = <A>(path: ReadonlyArray<string>, decoder: Decoder<A>): Decoder<A> => (input) => {
  let current: Json = input
  for (const [position, segment] of path.entries()) {
    if (!isJsonObject(current)) {
      const walked = path.slice(0, position).join(".")
      return Either.left(badType(`an object at \`${walked}\``, current))
    }
    const next = lookupKey(current, segment)
    if (next === undefined) {
      return Either.left(badPath(`an object with path \`${path.join(".")}\``, input, segment))
    }
    current = next
  }
  return decoder(current)
}

/**
 * Decode the element at `requestedIndex` of an array.
 *
 * @pure true
 * @invariant index outside 0..length-1 → TooSmallArray; non-array input → BadPrimitive
 */
export const index = <A>(requestedIndex: number, decoder: Decoder<A>): Decoder<A> => (input) => {
  if (!isJsonArray(input)) {
    return Either.left(badPrimitive("an array", input))
  }
  const element = Number.isInteger(requestedIndex) && requestedIndex >= 0 ? input[requestedIndex] : undefined
  if (element === undefined) {
    return Either.left(
      tooSmallArray(
        `a longer array. Need index \`${requestedIndex}\` but there are only \`${input.length}\` entries`,
        input
      )
    )
  }
  return decoder(element)
}
