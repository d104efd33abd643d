import * as Either from "effect/Either"

import type { Decoder } from "./decoder.js"
import { badPrimitive, badPrimitiveExtra } from "./errors.js"

// CHANGE: narrow JSON scalars to their TypeScript counterparts
// WHY: primitive decoders are the leaves every composite decoder bottoms out in
// SOURCE: n/a
// FORMAT THEOREM: ∀v: int(v) = Right(n) → n ∈ ℤ ∧ -2^31 ≤ n ≤ 2^31-1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a primitive decoder either returns its input unchanged or a BadPrimitive*
// COMPLEXITY: O(1)/O(1)

const INT_MIN = -2147483648
const INT_MAX = 2147483647

export const string: Decoder<string> = (input) =>
  typeof input === "string" ? Either.right(input) : Either.left(badPrimitive("a string", input))

export const bool: Decoder<boolean> = (input) =>
  typeof input === "boolean" ? Either.right(input) : Either.left(badPrimitive("a boolean", input))

export const float: Decoder<number> = (input) =>
  typeof input === "number" ? Either.right(input) : Either.left(badPrimitive("a float", input))

/**
 * Decode a 32-bit signed integer.
 *
 * Numbers that are fractional or outside the int32 range fail with
 * BadPrimitiveExtra, which tells "numeric but invalid" apart from "not a number".
 */
export const int: Decoder<number> = (input) => {
  if (typeof input !== "number") {
    return Either.left(badPrimitive("an int", input))
  }
  if (Number.isFinite(input) && !Number.isInteger(input)) {
    return Either.left(badPrimitiveExtra("an int", input, "Value is not an integral value"))
  }
  if (!Number.isInteger(input) || input < INT_MIN || input > INT_MAX) {
    return Either.left(
      badPrimitiveExtra("an int", input, "Value was either too large or too small for an int")
    )
  }
  return Either.right(input)
}
