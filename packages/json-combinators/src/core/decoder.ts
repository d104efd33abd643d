import * as Either from "effect/Either"

import type { DecoderError } from "./errors.js"
import { badPrimitive, failMessage } from "./errors.js"
import type { Json } from "./json.js"

// CHANGE: define the decoder contract and the constant decoders
// WHY: every combinator is a plain function from the JSON tree to Either
// SOURCE: n/a
// FORMAT THEOREM: ∀d,v: d(v) = d(v) (referential transparency)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: decoders never mutate their input
// COMPLEXITY: O(1)/O(1)

export type Decoder<A> = (value: Json) => Either.Either<A, DecoderError>

/** Extracts the decoded type of a decoder. */
export type DecoderType<D> = D extends Decoder<infer A> ? A : never

/**
 * Apply a decoder to a value.
 *
 * @pure true
 * @complexity O(d)
 */
export const run = <A>(decoder: Decoder<A>, value: Json): Either.Either<A, DecoderError> => decoder(value)

/** Ignores the input and always succeeds with `output`. */
export const succeed = <A>(output: A): Decoder<A> => () => Either.right(output)

/** Ignores the input and always fails with a FailMessage. */
export const fail = <A = never>(message: string): Decoder<A> => () => Either.left(failMessage(message))

/** Hands back the raw JSON value. */
export const value: Decoder<Json> = (input) => Either.right(input)

/**
 * Succeeds only on a literal `null`, yielding `output`.
 */
export const nil = <A>(output: A): Decoder<A> => (input) =>
  input === null ? Either.right(output) : Either.left(badPrimitive("null", input))

/**
 * Defer building a decoder until it runs, so a decoder can refer to itself.
 *
 * @example
 * ```ts
 * type Tree = { readonly label: string; readonly children: ReadonlyArray<Tree> }
 * const tree: Decoder<Tree> = object((get) => ({
 *   label: get.required.field("label", string),
 *   children: get.required.field("children", array(lazy(() => tree)))
 * }))
 * ```
 */
export const lazy = <A>(thunk: () => Decoder<A>): Decoder<A> => (input) => thunk()(input)
