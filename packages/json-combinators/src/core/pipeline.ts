import * as Either from "effect/Either"

import { andThen } from "./combinators.js"
import type { Decoder } from "./decoder.js"
import { succeed, value } from "./decoder.js"
import { badType } from "./errors.js"
import { withFallback } from "./fallback.js"
import { isJsonObject } from "./json.js"
import { map2 } from "./map.js"
import { at, field } from "./navigation.js"

// CHANGE: pipeline-style record decoding over a curried constructor
// WHY: `pipe(decode(ctor), required(...), optional(...))` reads top to bottom like the record
// SOURCE: n/a
// FORMAT THEOREM: pipe(decode(f), required(k, d))(v) = Right(f(a)) ⟺ field(k, d)(v) = Right(a)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: steps run in the order they appear in the pipe; the first failure wins
// COMPLEXITY: O(n) where n = number of steps

/** Start a pipeline with the (curried) constructor. */
export const decode = <F>(ctor: F): Decoder<F> => succeed(ctor)

/**
 * Feed the result of `valueDecoder` to the function decoded so far.
 */
export const custom = <A>(valueDecoder: Decoder<A>) => <B>(decoder: Decoder<(a: A) => B>): Decoder<B> =>
  map2((f: (a: A) => B, a: A) => f(a), decoder, valueDecoder)

/** Feed a constant instead of a decoded value. */
export const hardcoded = <A>(output: A) => custom(succeed(output))

export const required = <A>(key: string, valueDecoder: Decoder<A>) => custom(field(key, valueDecoder))

export const requiredAt = <A>(path: ReadonlyArray<string>, valueDecoder: Decoder<A>) =>
  custom(at(path, valueDecoder))

/**
 * Decode `key` when present; use `fallback` when it is absent or `null`.
 * A present value of the wrong shape still fails.
 */
export const optional = <A>(key: string, valueDecoder: Decoder<A>, fallback: A) =>
  custom(withFallback(field(key, value), valueDecoder, fallback))

export const optionalAt = <A>(path: ReadonlyArray<string>, valueDecoder: Decoder<A>, fallback: A) => {
  const located = withFallback(at(path, value), valueDecoder, fallback)
  return custom<A>((input) => isJsonObject(input) ? located(input) : Either.left(badType("an object", input)))
}

/** Flatten a decoder that produces a decoder, applying the inner one to the same input. */
export const resolve = <A>(decoder: Decoder<Decoder<A>>): Decoder<A> => andThen((inner: Decoder<A>) => inner, decoder)
