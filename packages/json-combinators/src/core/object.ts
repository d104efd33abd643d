import * as Either from "effect/Either"

import type { Decoder } from "./decoder.js"
import { value } from "./decoder.js"
import type { DecoderError } from "./errors.js"
import { withFallback } from "./fallback.js"
import type { Json } from "./json.js"
import { at, field, index } from "./navigation.js"

// CHANGE: declarative object construction with required/optional getters
// WHY: assemble a record in one flat expression while each getter stays a full decoder
// SOURCE: n/a
// FORMAT THEOREM: object(b)(v) = Right(b(get)) ⟺ every getter call made by b succeeds on v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first failing getter aborts the builder; later getters are never evaluated
// COMPLEXITY: O(g) where g = number of getter calls

export interface RequiredGetter {
  readonly field: <A>(name: string, decoder: Decoder<A>) => A
  readonly at: <A>(path: ReadonlyArray<string>, decoder: Decoder<A>) => A
  readonly index: <A>(requestedIndex: number, decoder: Decoder<A>) => A
}

export interface OptionalGetter {
  readonly field: <A>(name: string, decoder: Decoder<A>, fallback: A) => A
  readonly at: <A>(path: ReadonlyArray<string>, decoder: Decoder<A>, fallback: A) => A
  readonly index: <A>(requestedIndex: number, decoder: Decoder<A>, fallback: A) => A
}

export interface Getters {
  readonly required: RequiredGetter
  readonly optional: OptionalGetter
}

/** Thrown by a getter to unwind the builder; caught only by the `object` call that created it. */
class GetterAbort extends Error {
  override readonly name = "GetterAbort"

  constructor(readonly owner: symbol, readonly error: DecoderError) {
    super(error._tag)
  }
}

const makeGetters = (root: Json, owner: symbol): Getters => {
  const orAbort = <A>(decoded: Either.Either<A, DecoderError>): A => {
    if (Either.isLeft(decoded)) {
      throw new GetterAbort(owner, decoded.left)
    }
    return decoded.right
  }
  return {
    required: {
      field: (name, decoder) => orAbort(field(name, decoder)(root)),
      at: (path, decoder) => orAbort(at(path, decoder)(root)),
      index: (requestedIndex, decoder) => orAbort(index(requestedIndex, decoder)(root))
    },
    optional: {
      field: (name, decoder, fallback) => orAbort(withFallback(field(name, value), decoder, fallback)(root)),
      at: (path, decoder, fallback) => orAbort(withFallback(at(path, value), decoder, fallback)(root)),
      index: (requestedIndex, decoder, fallback) =>
        orAbort(withFallback(index(requestedIndex, value), decoder, fallback)(root))
    }
  }
}

/**
 * Build a decoder from a function that pulls fields out of the input.
 *
 * @example
 * ```ts
 * const user = object((get) => ({
 *   name: get.required.field("firstname", string),
 *   age: get.required.field("age", int),
 *   nickname: get.optional.field("nickname", string, "")
 * }))
 * ```
 *
 * @param builder - Receives fresh getters bound to the input of each decode call.
 * @returns Decoder yielding whatever the builder returns.
 *
 * @pure true
 * @invariant exceptions other than this call's getter aborts propagate unchanged
 */
export const object = <A>(builder: (get: Getters) => A): Decoder<A> => (input) => {
  const owner = Symbol("object")
  try {
    return Either.right(builder(makeGetters(input, owner)))
  } catch (error) {
    if (error instanceof GetterAbort && error.owner === owner) {
      return Either.left(error.error)
    }
    throw error
  }
}
