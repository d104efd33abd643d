import * as BigDecimal from "effect/BigDecimal"
import * as Brand from "effect/Brand"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Decoder } from "./decoder.js"
import { badPrimitive, badPrimitiveExtra } from "./errors.js"
import type { Json } from "./json.js"

// CHANGE: decode values that JSON numbers cannot carry without loss
// WHY: 64-bit integers, decimals, dates and GUIDs travel as strings (or numbers) on the wire
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Int64: int64(encodeInt64(x)) = Right(x)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: parse failures are BadPrimitiveExtra with the reason; wrong kinds are BadPrimitive
// COMPLEXITY: O(n) where n = length of the textual form

export type Guid = string & Brand.Brand<"Guid">

export const Guid = Brand.nominal<Guid>()

/** An instant together with the UTC offset it was written in. */
export interface DateTimeOffset {
  readonly instant: Date
  readonly offsetMinutes: number
}

const INTEGER_PATTERN = /^[+-]?\d+$/u
const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/iu
const ISO_DATE_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/u
const OFFSET_PATTERN = /(Z|([+-])(\d{2}):(\d{2}))$/u

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
const UINT64_MAX = 2n ** 64n - 1n

const parseInteger = (input: Json): Option.Option<bigint> => {
  if (typeof input === "number") {
    return Number.isInteger(input) ? Option.some(BigInt(input)) : Option.none()
  }
  if (typeof input === "string" && INTEGER_PATTERN.test(input)) {
    return Option.some(BigInt(input))
  }
  return Option.none()
}

const boundedInteger = (
  expected: string,
  min: bigint,
  max: bigint
): Decoder<bigint> =>
(input) => {
  if (typeof input !== "number" && typeof input !== "string") {
    return Either.left(badPrimitive(expected, input))
  }
  const parsed = parseInteger(input)
  if (Option.isNone(parsed)) {
    return Either.left(badPrimitiveExtra(expected, input, "Value is not a valid integer"))
  }
  if (parsed.value < min || parsed.value > max) {
    return Either.left(
      badPrimitiveExtra(expected, input, `Value was either too large or too small for ${expected}`)
    )
  }
  return Either.right(parsed.value)
}

export const bigint: Decoder<bigint> = (input) => {
  if (typeof input !== "number" && typeof input !== "string") {
    return Either.left(badPrimitive("a bigint", input))
  }
  const parsed = parseInteger(input)
  return Option.isSome(parsed)
    ? Either.right(parsed.value)
    : Either.left(badPrimitiveExtra("a bigint", input, "Value is not a valid integer"))
}

export const int64: Decoder<bigint> = boundedInteger("an int64", INT64_MIN, INT64_MAX)

export const uint64: Decoder<bigint> = boundedInteger("an uint64", 0n, UINT64_MAX)

export const decimal: Decoder<BigDecimal.BigDecimal> = (input) => {
  if (typeof input !== "number" && typeof input !== "string") {
    return Either.left(badPrimitive("a decimal", input))
  }
  const text = typeof input === "number" ? String(input) : input.trim()
  const parsed = text.length === 0 ? Option.none() : BigDecimal.fromString(text)
  return Option.isSome(parsed)
    ? Either.right(parsed.value)
    : Either.left(badPrimitiveExtra("a decimal", input, "Value is not a valid decimal"))
}

const parseIsoInstant = (text: string): Option.Option<{ readonly instant: Date; readonly zoned: boolean }> => {
  const match = ISO_DATE_PATTERN.exec(text)
  if (match === null) {
    return Option.none()
  }
  const zoned = match[1] !== undefined
  // date-only forms already parse as UTC; date-time forms without a zone are read as UTC too
  const normalized = !zoned && text.includes("T") ? `${text}Z` : text
  const instant = new Date(normalized)
  return Number.isNaN(instant.getTime()) ? Option.none() : Option.some({ instant, zoned })
}

/**
 * Decode an ISO-8601 string (read as UTC when it carries no zone) or epoch milliseconds.
 */
export const datetime: Decoder<Date> = (input) => {
  if (typeof input === "number") {
    return Number.isFinite(input)
      ? Either.right(new Date(input))
      : Either.left(badPrimitiveExtra("a datetime", input, "Value is not a valid timestamp"))
  }
  if (typeof input !== "string") {
    return Either.left(badPrimitive("a datetime", input))
  }
  const parsed = parseIsoInstant(input)
  return Option.isSome(parsed)
    ? Either.right(parsed.value.instant)
    : Either.left(badPrimitiveExtra("a datetime", input, "Value is not a valid ISO-8601 date"))
}

const parseOffsetMinutes = (text: string): Option.Option<number> => {
  const match = OFFSET_PATTERN.exec(text)
  if (match === null) {
    return Option.none()
  }
  if (match[1] === "Z") {
    return Option.some(0)
  }
  const sign = match[2] === "-" ? -1 : 1
  const hours = Number(match[3])
  const minutes = Number(match[4])
  if (hours > 23 || minutes > 59) {
    return Option.none()
  }
  return Option.some(sign * (hours * 60 + minutes))
}

/**
 * Decode an ISO-8601 string that states its offset explicitly (`Z` or `±hh:mm`).
 */
export const datetimeOffset: Decoder<DateTimeOffset> = (input) => {
  if (typeof input !== "string") {
    return Either.left(badPrimitive("a datetimeoffset", input))
  }
  const parsed = parseIsoInstant(input)
  if (Option.isNone(parsed)) {
    return Either.left(badPrimitiveExtra("a datetimeoffset", input, "Value is not a valid ISO-8601 date"))
  }
  const offset = parseOffsetMinutes(input)
  if (!parsed.value.zoned || Option.isNone(offset)) {
    return Either.left(badPrimitiveExtra("a datetimeoffset", input, "Value has no valid UTC offset"))
  }
  return Either.right({ instant: parsed.value.instant, offsetMinutes: offset.value })
}

export const guid: Decoder<Guid> = (input) => {
  if (typeof input !== "string") {
    return Either.left(badPrimitive("a guid", input))
  }
  return GUID_PATTERN.test(input)
    ? Either.right(Guid(input.toLowerCase()))
    : Either.left(badPrimitiveExtra("a guid", input, "Value is not a valid GUID"))
}
