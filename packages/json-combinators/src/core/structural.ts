import * as Either from "effect/Either"

import type { Decoder } from "./decoder.js"
import type { DecoderError } from "./errors.js"
import { badPrimitive } from "./errors.js"
import type { Json } from "./json.js"
import { isJsonArray, isJsonObject } from "./json.js"

// CHANGE: decode homogeneous arrays and objects element by element
// WHY: collections either decode completely or report the first element that does not
// SOURCE: n/a
// FORMAT THEOREM: ∀xs: array(d)(xs) = Right(ys) → |ys| = |xs|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: fail-fast; no partial results escape
// COMPLEXITY: O(n) where n = number of elements

const decodeElements = <A>(
  elements: ReadonlyArray<Json>,
  decoder: Decoder<A>
): Either.Either<ReadonlyArray<A>, DecoderError> => {
  const result: Array<A> = []
  for (const element of elements) {
    const decoded = decoder(element)
    if (Either.isLeft(decoded)) {
      return Either.left(decoded.left)
    }
    result.push(decoded.right)
  }
  return Either.right(result)
}

export const array = <A>(decoder: Decoder<A>): Decoder<ReadonlyArray<A>> => (input) =>
  isJsonArray(input) ? decodeElements(input, decoder) : Either.left(badPrimitive("an array", input))

/** Same as {@link array}; kept under its own name for the "a list" message. */
export const list = <A>(decoder: Decoder<A>): Decoder<ReadonlyArray<A>> => (input) =>
  isJsonArray(input) ? decodeElements(input, decoder) : Either.left(badPrimitive("a list", input))

/**
 * Decode every value of an object, keeping its keys in their original order.
 *
 * @pure true
 * @invariant arrays are rejected even though they are objects at runtime
 * @complexity O(n)
 */
export const keyValuePairs = <A>(
  decoder: Decoder<A>
): Decoder<ReadonlyArray<readonly [string, A]>> =>
(input) => {
  if (!isJsonObject(input)) {
    return Either.left(badPrimitive("an object", input))
  }
  const result: Array<readonly [string, A]> = []
  for (const [key, entry] of Object.entries(input)) {
    const decoded = decoder(entry)
    if (Either.isLeft(decoded)) {
      return Either.left(decoded.left)
    }
    result.push([key, decoded.right])
  }
  return Either.right(result)
}

export const dict = <A>(decoder: Decoder<A>): Decoder<ReadonlyMap<string, A>> => (input) =>
  Either.map(keyValuePairs(decoder)(input), (pairs) => new Map(pairs))
