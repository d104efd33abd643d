import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Decoder } from "./decoder.js"
import type { DecoderError } from "./errors.js"
import { badOneOf, isPresenceError } from "./errors.js"

// CHANGE: add alternation, optionality and value-dependent chaining
// WHY: real payloads have inconsistent structure that a single decoder cannot describe
// SOURCE: n/a
// FORMAT THEOREM: oneOf([d1..dn])(v) = first Right of di(v), else BadOneOf([e1..en])
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: only presence errors turn into None; everything else propagates
// COMPLEXITY: O(n) where n = number of alternatives

/**
 * Wrap a decoder so that an absent field, path or element yields `None`.
 *
 * A value that is present but malformed still fails, and so does any
 * logical failure raised inside `decoder` (`fail`, an exhausted `oneOf`).
 *
 * @pure true
 * @invariant Left(e) ∧ isPresenceError(e) → Right(None)
 */
export const option = <A>(decoder: Decoder<A>): Decoder<Option.Option<A>> => (input) => {
  const decoded = decoder(input)
  if (Either.isRight(decoded)) {
    return Either.right(Option.some(decoded.right))
  }
  return isPresenceError(decoded.left) ? Either.right(Option.none()) : Either.left(decoded.left)
}

/**
 * Try each decoder in order against the same input; the first success wins.
 *
 * @pure true
 * @invariant on exhaustion every sub-error is kept, in trial order
 * @complexity O(n)
 */
export const oneOf = <A>(decoders: ReadonlyArray<Decoder<A>>): Decoder<A> => (input) => {
  const errors: Array<DecoderError> = []
  for (const decoder of decoders) {
    const decoded = decoder(input)
    if (Either.isRight(decoded)) {
      return decoded
    }
    errors.push(decoded.left)
  }
  return Either.left(badOneOf(errors))
}

/**
 * Run `decoder`, then pick the next decoder from its result and apply it to
 * the same input (e.g. a discriminator field selecting the variant decoder).
 *
 * @pure true
 */
export const andThen = <A, B>(f: (a: A) => Decoder<B>, decoder: Decoder<A>): Decoder<B> => (input) => {
  const decoded = decoder(input)
  return Either.isLeft(decoded) ? Either.left(decoded.left) : f(decoded.right)(input)
}
