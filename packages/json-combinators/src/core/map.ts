import * as Either from "effect/Either"

import type { Decoder } from "./decoder.js"

// CHANGE: combine independent decoders over one input with a constructor
// WHY: build records from several decoders that all read the same value
// SOURCE: n/a
// FORMAT THEOREM: mapN(f, d1..dn)(v) = Right(f(a1..an)) ⟺ ∀i: di(v) = Right(ai)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: sub-decoders run left to right and the first Left is returned
// COMPLEXITY: O(n) decoder applications

export const map = <A, R>(ctor: (a: A) => R, d1: Decoder<A>): Decoder<R> => (input) => Either.map(d1(input), ctor)

export const map2 = <A, B, R>(
  ctor: (a: A, b: B) => R,
  d1: Decoder<A>,
  d2: Decoder<B>
): Decoder<R> =>
(input) =>
  Either.gen(function*(_) {
    const a = yield* _(d1(input))
    const b = yield* _(d2(input))
    return ctor(a, b)
  })

export const map3 = <A, B, C, R>(
  ctor: (a: A, b: B, c: C) => R,
  d1: Decoder<A>,
  d2: Decoder<B>,
  d3: Decoder<C>
): Decoder<R> =>
(input) =>
  Either.gen(function*(_) {
    const a = yield* _(d1(input))
    const b = yield* _(d2(input))
    const c = yield* _(d3(input))
    return ctor(a, b, c)
  })

export const map4 = <A, B, C, D, R>(
  ctor: (a: A, b: B, c: C, d: D) => R,
  d1: Decoder<A>,
  d2: Decoder<B>,
  d3: Decoder<C>,
  d4: Decoder<D>
): Decoder<R> =>
(input) =>
  Either.gen(function*(_) {
    const a = yield* _(d1(input))
    const b = yield* _(d2(input))
    const c = yield* _(d3(input))
    const d = yield* _(d4(input))
    return ctor(a, b, c, d)
  })

export const map5 = <A, B, C, D, E, R>(
  ctor: (a: A, b: B, c: C, d: D, e: E) => R,
  d1: Decoder<A>,
  d2: Decoder<B>,
  d3: Decoder<C>,
  d4: Decoder<D>,
  d5: Decoder<E>
): Decoder<R> =>
(input) =>
  Either.gen(function*(_) {
    const a = yield* _(d1(input))
    const b = yield* _(d2(input))
    const c = yield* _(d3(input))
    const d = yield* _(d4(input))
    const e = yield* _(d5(input))
    return ctor(a, b, c, d, e)
  })

export const map6 = <A, B, C, D, E, F, R>(
  ctor: (a: A, b: B, c: C, d: D, e: E, f: F) => R,
  d1: Decoder<A>,
  d2: Decoder<B>,
  d3: Decoder<C>,
  d4: Decoder<D>,
  d5: Decoder<E>,
  d6: Decoder<F>
): Decoder<R> =>
(input) =>
  Either.gen(function*(_) {
    const a = yield* _(d1(input))
    const b = yield* _(d2(input))
    const c = yield* _(d3(input))
    const d = yield* _(d4(input))
    const e = yield* _(d5(input))
    const f = yield* _(d6(input))
    return ctor(a, b, c, d, e, f)
  })

export const map7 = <A, B, C, D, E, F, G, R>(
  ctor: (a: A, b: B, c: C, d: D, e: E, f: F, g: G) => R,
  d1: Decoder<A>,
  d2: Decoder<B>,
  d3: Decoder<C>,
  d4: Decoder<D>,
  d5: Decoder<E>,
  d6: Decoder<F>,
  d7: Decoder<G>
): Decoder<R> =>
(input) =>
  Either.gen(function*(_) {
    const a = yield* _(d1(input))
    const b = yield* _(d2(input))
    const c = yield* _(d3(input))
    const d = yield* _(d4(input))
    const e = yield* _(d5(input))
    const f = yield* _(d6(input))
    const g = yield* _(d7(input))
    return ctor(a, b, c, d, e, f, g)
  })

export const map8 = <A, B, C, D, E, F, G, H, R>(
  ctor: (a: A, b: B, c: C, d: D, e: E, f: F, g: G, h: H) => R,
  d1: Decoder<A>,
  d2: Decoder<B>,
  d3: Decoder<C>,
  d4: Decoder<D>,
  d5: Decoder<E>,
  d6: Decoder<F>,
  d7: Decoder<G>,
  d8: Decoder<H>
): Decoder<R> =>
(input) =>
  Either.gen(function*(_) {
    const a = yield* _(d1(input))
    const b = yield* _(d2(input))
    const c = yield* _(d3(input))
    const d = yield* _(d4(input))
    const e = yield* _(d5(input))
    const f = yield* _(d6(input))
    const g = yield* _(d7(input))
    const h = yield* _(d8(input))
    return ctor(a, b, c, d, e, f, g, h)
  })
