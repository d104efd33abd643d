import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { DecodeOptions } from "../core/config.js"
import { resolveDecodeOptions } from "../core/config.js"
import type { Decoder } from "../core/decoder.js"
import type { DecoderError } from "../core/errors.js"
import type { Json } from "../core/json.js"
import { errorToString } from "../core/render.js"
import { decodeValueError } from "../core/runners.js"
import { decodeStringError } from "./json-text.js"

// CHANGE: expose decoders as Effects for programs built on the Effect runtime
// WHY: let callers compose decoding with their own typed error channel and logger
// SOURCE: n/a
// FORMAT THEOREM: ∀d,v: decodeEffect(d)(v) fails with e ⟺ decodeValueError(d, v) = Left(e)
// PURITY: SHELL
// EFFECT: Effect<A, DecoderError>
// INVARIANT: every failure is logged once at DEBUG before it reaches the error channel
// COMPLEXITY: O(n)

const LOG_SPAN = "json-combinators.decode"

const logFailure = (error: DecoderError, indent: number): Effect.Effect<void> =>
  Effect.logDebug(errorToString(error, indent)).pipe(
    Effect.annotateLogs("decoder.error", error._tag)
  )

const fromDecoded = <A>(
  decoded: Either.Either<A, DecoderError>,
  indent: number
): Effect.Effect<A, DecoderError> =>
  Either.isLeft(decoded)
    ? logFailure(decoded.left, indent).pipe(Effect.zipRight(Effect.fail(decoded.left)))
    : Effect.succeed(decoded.right)

/**
 * Lift a decoder into an Effect-returning function.
 *
 * @pure false
 * @effect Logger
 */
export const decodeEffect = <A>(decoder: Decoder<A>, options?: DecodeOptions) => {
  const { indent } = resolveDecodeOptions(options)
  return (value: Json): Effect.Effect<A, DecoderError> =>
    Effect.suspend(() => fromDecoded(decodeValueError(decoder, value, options), indent)).pipe(
      Effect.withLogSpan(LOG_SPAN)
    )
}

export const decodeStringEffect = <A>(decoder: Decoder<A>, options?: DecodeOptions) => {
  const { indent } = resolveDecodeOptions(options)
  return (text: string): Effect.Effect<A, DecoderError> =>
    Effect.suspend(() => fromDecoded(decodeStringError(decoder, text, options), indent)).pipe(
      Effect.withLogSpan(LOG_SPAN)
    )
}
