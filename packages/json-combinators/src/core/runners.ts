import * as Either from "effect/Either"

import type { DecodeOptions } from "./config.js"
import { resolveDecodeOptions } from "./config.js"
import type { Decoder } from "./decoder.js"
import type { DecoderError } from "./errors.js"
import { depthExceeded, direct } from "./errors.js"
import type { Json } from "./json.js"
import { exceedsDepth } from "./json.js"
import { errorToString } from "./render.js"

// CHANGE: entry points that run a decoder and hand back data, text or a thrown error
// WHY: library callers want the structured error; application code often wants a message
// SOURCE: n/a
// FORMAT THEOREM: decodeValue(d, v) = mapLeft(decodeValueError(d, v), render)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: decodeValueError never throws
// COMPLEXITY: O(n) where n = size of the input

/**
 * Thrown by {@link unwrap}; carries the structured error next to its rendered message.
 */
export class DecodeError extends Error {
  override readonly name = "DecodeError"

  constructor(readonly error: DecoderError, message: string) {
    super(message)
    Object.setPrototypeOf(this, DecodeError.prototype)
  }
}

const describeThrown = (thrown: unknown): string => thrown instanceof Error ? thrown.message : String(thrown)

/**
 * Run a decoder, keeping the structured error.
 *
 * Inputs nested deeper than `maxDepth` are rejected before decoding, and an
 * exception thrown from user code inside the decoder becomes `Direct`.
 *
 * @pure true
 * @invariant result is always an Either
 * @complexity O(n)
 */
export const decodeValueError = <A>(
  decoder: Decoder<A>,
  value: Json,
  options?: DecodeOptions
): Either.Either<A, DecoderError> => {
  const { maxDepth } = resolveDecodeOptions(options)
  if (exceedsDepth(value, maxDepth)) {
    return Either.left(depthExceeded(maxDepth))
  }
  try {
    return decoder(value)
  } catch (thrown) {
    return Either.left(direct(describeThrown(thrown)))
  }
}

/**
 * Run a decoder and render a failure to its message.
 */
export const decodeValue = <A>(
  decoder: Decoder<A>,
  value: Json,
  options?: DecodeOptions
): Either.Either<A, string> => {
  const { indent } = resolveDecodeOptions(options)
  return Either.mapLeft(decodeValueError(decoder, value, options), (error) => errorToString(error, indent))
}

/**
 * Run a decoder and return its value, throwing {@link DecodeError} on failure.
 *
 * Input deeper than `maxDepth` (a cyclic value included) fails like any other decode.
 */
export const unwrap = <A>(decoder: Decoder<A>, value: Json, options?: DecodeOptions): A => {
  const { indent } = resolveDecodeOptions(options)
  const decoded = decodeValueError(decoder, value, options)
  if (Either.isLeft(decoded)) {
    throw new DecodeError(decoded.left, errorToString(decoded.left, indent))
  }
  return decoded.right
}
