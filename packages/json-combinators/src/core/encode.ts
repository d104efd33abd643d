import * as BigDecimal from "effect/BigDecimal"
import * as Option from "effect/Option"

import type { DateTimeOffset, Guid } from "./extended.js"
import type { Json, JsonObject } from "./json.js"
import { printJson } from "./json.js"

// CHANGE: build JSON trees from typed values and print them
// WHY: mirror the decoders so values written here decode back to themselves
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Int32: int(encodeInt(x)) = Right(x)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object entries keep the order they were given in
// COMPLEXITY: O(n)

export type Encoder<A> = (input: A) => Json

export const string: Encoder<string> = (input) => input

export const int: Encoder<number> = (input) => input

export const float: Encoder<number> = (input) => input

export const bool: Encoder<boolean> = (input) => input

export const nil: Json = null

export const value: Encoder<Json> = (input) => input

export const object = (entries: ReadonlyArray<readonly [string, Json]>): JsonObject => Object.fromEntries(entries)

export const keyValuePairs = object

export const dict = (entries: ReadonlyMap<string, Json>): JsonObject => Object.fromEntries(entries)

export const array = (values: ReadonlyArray<Json>): Json => values

export const list = array

/** `Some(x)` encodes `x`; `None` encodes `null`. */
export const option = <A>(encoder: Encoder<A>): Encoder<Option.Option<A>> => (input) =>
  Option.match(input, { onNone: () => nil, onSome: encoder })

export const bigint: Encoder<bigint> = (input) => input.toString()

export const int64: Encoder<bigint> = bigint

export const uint64: Encoder<bigint> = bigint

export const decimal: Encoder<BigDecimal.BigDecimal> = (input) => BigDecimal.format(input)

/** ISO-8601 in UTC, e.g. `2018-10-01T11:12:55.000Z`. */
export const datetime: Encoder<Date> = (input) => input.toISOString()

const pad2 = (n: number): string => n.toString().padStart(2, "0")

const formatOffset = (offsetMinutes: number): string => {
  const sign = offsetMinutes < 0 ? "-" : "+"
  const magnitude = Math.abs(offsetMinutes)
  return `${sign}${pad2(Math.floor(magnitude / 60))}:${pad2(magnitude % 60)}`
}

/** Wall-clock time at the stored offset, e.g. `2018-07-02T12:23:45.000+02:00`. */
export const datetimeOffset: Encoder<DateTimeOffset> = ({ instant, offsetMinutes }) => {
  const local = new Date(instant.getTime() + offsetMinutes * 60_000).toISOString()
  return `${local.slice(0, -1)}${formatOffset(offsetMinutes)}`
}

export const guid: Encoder<Guid> = (input) => input

export const tuple2 = <A, B>(ea: Encoder<A>, eb: Encoder<B>) => ([a, b]: readonly [A, B]): Json => [ea(a), eb(b)]

export const tuple3 = <A, B, C>(ea: Encoder<A>, eb: Encoder<B>, ec: Encoder<C>) =>
([a, b, c]: readonly [A, B, C]): Json => [ea(a), eb(b), ec(c)]

export const tuple4 = <A, B, C, D>(ea: Encoder<A>, eb: Encoder<B>, ec: Encoder<C>, ed: Encoder<D>) =>
([a, b, c, d]: readonly [A, B, C, D]): Json => [ea(a), eb(b), ec(c), ed(d)]

export const tuple5 = <A, B, C, D, E>(
  ea: Encoder<A>,
  eb: Encoder<B>,
  ec: Encoder<C>,
  ed: Encoder<D>,
  ee: Encoder<E>
) =>
([a, b, c, d, e]: readonly [A, B, C, D, E]): Json => [ea(a), eb(b), ec(c), ed(d), ee(e)]

export const tuple6 = <A, B, C, D, E, F>(
  ea: Encoder<A>,
  eb: Encoder<B>,
  ec: Encoder<C>,
  ed: Encoder<D>,
  ee: Encoder<E>,
  ef: Encoder<F>
) =>
([a, b, c, d, e, f]: readonly [A, B, C, D, E, F]): Json => [ea(a), eb(b), ec(c), ed(d), ee(e), ef(f)]

export const tuple7 = <A, B, C, D, E, F, G>(
  ea: Encoder<A>,
  eb: Encoder<B>,
  ec: Encoder<C>,
  ed: Encoder<D>,
  ee: Encoder<E>,
  ef: Encoder<F>,
  eg: Encoder<G>
) =>
([a, b, c, d, e, f, g]: readonly [A, B, C, D, E, F, G]): Json => [
  ea(a),
  eb(b),
  ec(c),
  ed(d),
  ee(e),
  ef(f),
  eg(g)
]

export const tuple8 = <A, B, C, D, E, F, G, H>(
  ea: Encoder<A>,
  eb: Encoder<B>,
  ec: Encoder<C>,
  ed: Encoder<D>,
  ee: Encoder<E>,
  ef: Encoder<F>,
  eg: Encoder<G>,
  eh: Encoder<H>
) =>
([a, b, c, d, e, f, g, h]: readonly [A, B, C, D, E, F, G, H]): Json => [
  ea(a),
  eb(b),
  ec(c),
  ed(d),
  ee(e),
  ef(f),
  eg(g),
  eh(h)
]

/**
 * Print a tree as JSON text.
 *
 * @param space - 0 for a single line; N > 0 for N spaces per nesting level.
 * @param input - Tree to print.
 *
 * @pure true
 * @complexity O(n)
 */
export const toString = (space: number, input: Json): string => printJson(input, Math.max(0, Math.floor(space)))
