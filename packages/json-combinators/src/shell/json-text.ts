import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { DecodeOptions } from "../core/config.js"
import { resolveDecodeOptions } from "../core/config.js"
import type { Decoder } from "../core/decoder.js"
import type { DecoderError } from "../core/errors.js"
import { depthExceeded, direct } from "../core/errors.js"
import type { Json } from "../core/json.js"
import { exceedsDepth } from "../core/json.js"
import { errorToString } from "../core/render.js"
import { decodeValueError } from "../core/runners.js"

// CHANGE: parse JSON text at the boundary and feed the tree to a decoder
// WHY: keep text parsing out of the pure decoder core
// SOURCE: n/a
// FORMAT THEOREM: ∀t: decodeStringError(d, t) = Left(Direct(_)) when t is not valid JSON
// PURITY: SHELL
// EFFECT: n/a
// INVARIANT: parse failures surface as Direct, never as a thrown exception
// COMPLEXITY: O(n) where n = length of the text

const JsonSchema: Schema.Schema<Json> = Schema.suspend(() =>
  Schema.Union(
    Schema.Null,
    Schema.Boolean,
    Schema.Number,
    Schema.String,
    Schema.Array(JsonSchema),
    Schema.Record({ key: Schema.String, value: JsonSchema })
  )
)

const isJson = Schema.is(JsonSchema)

const notJson = (input: unknown): DecoderError =>
  direct(
    `Given value is not JSON: ${
      Either.match(Schema.decodeUnknownEither(JsonSchema)(input), {
        onLeft: (error) => TreeFormatter.formatErrorSync(error),
        onRight: () => "unsupported value"
      })
    }`
  )

/**
 * Accept a value as a JSON tree without rebuilding it.
 *
 * Depth is checked before the recursive schema guard runs.
 * The tree returned is the caller's own, so keys such as `__proto__` stay own properties.
 */
const checkTree = (input: unknown, maxDepth: number): Either.Either<Json, DecoderError> => {
  if (exceedsDepth(input, maxDepth)) {
    return Either.left(depthExceeded(maxDepth))
  }
  return isJson(input) ? Either.right(input) : Either.left(notJson(input))
}

/**
 * Parse text into the JSON tree.
 *
 * @returns Either with the tree, or Direct for malformed or over-deep text.
 */
export const parseJsonText = (raw: string, options?: DecodeOptions): Either.Either<Json, DecoderError> => {
  const { maxDepth } = resolveDecodeOptions(options)
  return pipe(
    Schema.decodeUnknownEither(Schema.parseJson())(raw),
    Either.mapLeft((error) => direct(`Given an invalid JSON: ${TreeFormatter.formatErrorSync(error)}`)),
    Either.flatMap((parsed) => checkTree(parsed, maxDepth))
  )
}

/**
 * Check that an unknown value (e.g. from `JSON.parse` or a framework) is a JSON tree.
 */
export const toJson = (input: unknown, options?: DecodeOptions): Either.Either<Json, DecoderError> =>
  checkTree(input, resolveDecodeOptions(options).maxDepth)

export const decodeStringError = <A>(
  decoder: Decoder<A>,
  text: string,
  options?: DecodeOptions
): Either.Either<A, DecoderError> =>
  Either.flatMap(parseJsonText(text, options), (tree) => decodeValueError(decoder, tree, options))

/**
 * Parse `text` and decode it, rendering any failure to its message.
 *
 * @pure true
 * @complexity O(n)
 */
export const decodeString = <A>(
  decoder: Decoder<A>,
  text: string,
  options?: DecodeOptions
): Either.Either<A, string> => {
  const { indent } = resolveDecodeOptions(options)
  return Either.mapLeft(decodeStringError(decoder, text, options), (error) => errorToString(error, indent))
}
